import { CleanupHandle } from "./CleanupHandle";
import { Handler, HandlerSubscriber } from "./Event";
import { HandlerStorage, removeEntryAction } from "./HandlerStorage";
import { getFullOptions, RegistryOptions } from "./options";


/**
 * Holds handlers that are called at most once.
 *
 * A call takes every registered handler out of the bag before running any of them,
 * so a second call right after the first one finds the bag empty.
 * Handles of handlers that were already called become no-ops.
 */
export class BagOnce<T extends unknown[] = []> implements HandlerSubscriber<T> {

	constructor(options?: Partial<RegistryOptions>) {
		this.#storage = new HandlerStorage<Handler<T>>(getFullOptions("bagOnce", options));
	}

	#storage: HandlerStorage<Handler<T>>;

	get handlersCount() { return this.#storage.size; }

	add(handler: Handler<T>) {
		const key = this.#storage.insert(handler);
		return new CleanupHandle(removeEntryAction(new WeakRef(this.#storage), key));
	}

	/**
	 * Calls `applicator` with each handler and removes the handlers from the bag.
	 * If a handler throws, the handlers drained with it that have not run yet are dropped.
	 */
	call(applicator: (handler: Handler<T>) => void) {
		for (const handler of this.#storage.drain()) {
			applicator(handler);
		}
	}

	callSimple(...event: T) {
		this.call(handler => handler(...event));
	}

	clone() {
		const bag = new BagOnce<T>();
		bag.#storage = this.#storage;
		return bag;
	}

	asSubscriber(): HandlerSubscriber<T> {
		return { add: handler => this.add(handler) };
	}
}

import { CleanupHandle } from "./CleanupHandle";
import { Handler, HandlerSubscriber, SharedHandler, shareHandler } from "./Event";
import { HandlerStorage, removeEntryAction } from "./HandlerStorage";
import { getFullOptions, RegistryOptions } from "./options";


/**
 * Holds handlers that may be called any number of times.
 * A handler stays registered until its {@link CleanupHandle} is disposed or collected.
 *
 * Handlers can add, remove or call handlers of the same bag while it is calling them.
 * Such changes take effect from the next call on.
 */
export class Bag<T extends unknown[] = []> implements HandlerSubscriber<T> {

	constructor(options?: Partial<RegistryOptions>) {
		this.#storage = new HandlerStorage<SharedHandler<T>>(getFullOptions("bag", options));
	}

	#storage: HandlerStorage<SharedHandler<T>>;

	get handlersCount() { return this.#storage.size; }

	add(handler: Handler<T>) {
		return this.addShared(shareHandler(handler));
	}

	addShared(handler: SharedHandler<T>) {
		const key = this.#storage.insert(handler);
		return new CleanupHandle(removeEntryAction(new WeakRef(this.#storage), key));
	}

	/** Calls `applicator` with each handler, handlers stay in the bag. */
	call(applicator: (handler: Handler<T>) => void) {
		this.#storage.forEachSnapshot(shared => applicator(shared.invoke));
	}

	callSimple(...event: T) {
		this.call(handler => handler(...event));
	}

	/** Another bag over the same handlers. */
	clone() {
		const bag = new Bag<T>();
		bag.#storage = this.#storage;
		return bag;
	}

	asSubscriber(): HandlerSubscriber<T> {
		return { add: handler => this.add(handler) };
	}
}

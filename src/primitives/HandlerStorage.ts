import { RegistryOptions } from "./options";


/**
 * Map of registered handlers shared by all clones of a registry.
 *
 * Mutations are short synchronous sections that never run handler code.
 * Iteration goes over a snapshot: while {@link forEachSnapshot} walks a map,
 * mutations are applied to a copy of it.
 */
export class HandlerStorage<H> {

	constructor(readonly options: RegistryOptions) {
	}

	#handlers = new Map<number, H>();
	#invoking?: Map<number, H>;
	#nextKey = 0;

	get size() { return this.#handlers.size; }

	insert(handler: H) {
		const key = this.#nextKey;
		if (!Number.isSafeInteger(key + 1)) {
			throw new Error("handler key space exhausted");
		}

		this.#nextKey = key + 1;
		this.#writableHandlers().set(key, handler);
		this.log(`handler ${key} added`);
		return key;
	}

	/** Removing an absent key does nothing. */
	remove(key: number) {
		if (!this.#handlers.has(key)) return false;

		this.#writableHandlers().delete(key);
		this.log(`handler ${key} removed`);
		return true;
	}

	forEachSnapshot(action: (handler: H) => void) {
		const previous = this.#invoking;
		const handlers = this.#invoking = this.#handlers;
		this.log(`calling ${handlers.size} handlers`);
		try {

			for (const handler of handlers.values()) {
				action(handler);
			}

		} finally {
			this.#invoking = previous;
		}
	}

	/** Takes every handler out at once, leaving the storage empty. */
	drain() {
		const handlers = this.#handlers;
		this.#handlers = new Map();
		this.log(`drained ${handlers.size} handlers`);
		return handlers.values();
	}

	log(message: string) {
		if (this.options.verbose) {
			console.log(`${this.options.name}: ${message}`);
		}
	}

	#writableHandlers() {
		if (this.#invoking === this.#handlers) {
			this.#handlers = new Map(this.#handlers);
		}

		return this.#handlers;
	}
}


/**
 * Builds the deferred action of a cleanup handle.
 * Only a weak reference to the storage is captured, so a pending handle never keeps a registry alive.
 */
export function removeEntryAction<H>(storage: WeakRef<HandlerStorage<H>>, key: number) {
	return () => {
		storage.deref()?.remove(key);
	};
}


const finalizer = new FinalizationRegistry<() => void>(cleanup => cleanup());


/**
 * Token returned when a handler is registered.
 *
 * Disposing the handle removes its handler. A handle that is garbage collected
 * without being released removes its handler as well, so discarding the token is enough to unsubscribe.
 * Call {@link release} to keep the handler registered for the lifetime of the registry.
 *
 * Copies of the reference share one cleanup action, which runs at most once.
 */
export class CleanupHandle {

	constructor(cleanup: () => void) {
		this.#cleanup = cleanup;
		finalizer.register(this, cleanup, this);
	}

	#cleanup?: () => void;
	#released = false;
	#disposed = false;

	get released() { return this.#released; }

	get disposed() { return this.#disposed; }

	release() {
		if (!this.#cleanup) return;

		this.#cleanup = undefined;
		this.#released = true;
		finalizer.unregister(this);
	}

	dispose() {
		const cleanup = this.#cleanup;
		if (!cleanup) return;

		this.#cleanup = undefined;
		this.#disposed = true;
		finalizer.unregister(this);
		cleanup();
	}

	[Symbol.dispose]() {
		this.dispose();
	}
}

import { CleanupHandle } from "./CleanupHandle";


export type Handler<T extends unknown[] = []> = (...event: T) => void;


/**
 * Subscribe side of a registry.
 * Hosts expose this and keep the registry itself, with its `call` methods, private.
 */
export interface HandlerSubscriber<T extends unknown[] = []> {
	add(handler: Handler<T>): CleanupHandle;
}


/**
 * Handler wrapped once so it can be added to several bags without wrapping it again.
 */
export interface SharedHandler<T extends unknown[] = []> {
	readonly invoke: Handler<T>;
}

export function shareHandler<T extends unknown[]>(handler: Handler<T>): SharedHandler<T> {
	return Object.freeze({ invoke: handler });
}

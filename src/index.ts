export { Bag } from "./primitives/Bag";
export { BagOnce } from "./primitives/BagOnce";
export { CleanupHandle } from "./primitives/CleanupHandle";
export { shareHandler } from "./primitives/Event";
export type { Handler, HandlerSubscriber, SharedHandler } from "./primitives/Event";
export type { RegistryOptions } from "./primitives/options";

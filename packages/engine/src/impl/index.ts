/**
 * @fileoverview Implementation barrel exports
 *
 * Concrete implementations of engine contracts.
 *
 * @module @review-intake/engine/impl
 */

export { ConsoleSink } from "./ConsoleSink.js";
export { MemorySink } from "./MemorySink.js";
export {
    RemoteSink,
    DEFAULT_REMOTE_TIMEOUT_MS,
    type RemoteSinkConfig,
    type FetchFn,
} from "./RemoteSink.js";
export {
    FanOutEmitter,
    createSink,
    type FanOutEmitterConfig,
} from "./FanOutEmitter.js";

/**
 * @fileoverview Fan-Out Emitter
 *
 * Structured logger that writes every event to each configured sink.
 *
 * @module @review-intake/engine/impl/FanOutEmitter
 */

import type {
    EventFields,
    EventLogger,
    LogLevel,
    Sink,
    SinkConfig,
} from "../contracts/EventSink.js";
import { LOG_LEVEL_PRIORITY, createLogEvent } from "../contracts/EventSink.js";
import { ConsoleSink } from "./ConsoleSink.js";
import { RemoteSink, type FetchFn } from "./RemoteSink.js";

/**
 * Emitter configuration.
 */
export interface FanOutEmitterConfig {
    /** Logger identity written into each event */
    readonly name: string;

    /** Destinations (default: a single console sink) */
    readonly sinks?: readonly Sink[];

    /** Events below this level are dropped (default: "info") */
    readonly minLevel?: LogLevel;
}

/**
 * Build a sink from its configuration.
 *
 * @param config - Sink configuration
 * @param fetchFn - Fetch implementation for remote sinks
 */
export function createSink(config: SinkConfig, fetchFn?: FetchFn): Sink {
    switch (config.kind) {
        case "console":
            return new ConsoleSink();
        case "remote":
            return new RemoteSink({
                endpoint : config.endpoint,
                timeoutMs: config.timeoutMs,
                apiKey   : config.apiKey,
                fetch    : fetchFn,
            });
    }
}

/**
 * Fan-out emitter.
 *
 * Features:
 * - Synchronous dispatch to every sink, in configuration order
 * - A sink that throws is reported and skipped; the caller never sees it
 * - Children share sinks and threshold, with their own name
 *
 * @example
 * ```typescript
 * const logger = new FanOutEmitter({
 *     name : "review-intake",
 *     sinks: [createSink({ kind: "console" }), createSink({ kind: "remote", endpoint })],
 * });
 *
 * logger.info("Review committed", { movie_id: 3, sentiment: "positive" });
 * await logger.flush();
 * ```
 */
export class FanOutEmitter implements EventLogger {
    readonly name: string;

    /** Events below this level are dropped */
    readonly minLevel: LogLevel;

    private readonly sinks: readonly Sink[];

    constructor(config: FanOutEmitterConfig) {
        this.name = config.name;
        this.minLevel = config.minLevel ?? "info";
        this.sinks = config.sinks ?? [new ConsoleSink()];
    }

    /**
     * Emit an event to all sinks.
     *
     * @param level - Severity
     * @param message - Message text
     * @param fields - Caller fields; envelope names are renamed
     */
    emit(level: LogLevel, message: string, fields?: EventFields): void {
        if (LOG_LEVEL_PRIORITY[level] < LOG_LEVEL_PRIORITY[this.minLevel]) {
            return;
        }

        this.dispatch(level, message, fields);
    }

    /**
     * Emit an event to all sinks regardless of the minimum level.
     *
     * Reserved for events downstream consumers key off.
     */
    record(level: LogLevel, message: string, fields?: EventFields): void {
        this.dispatch(level, message, fields);
    }

    private dispatch(level: LogLevel, message: string, fields?: EventFields): void {
        const event = createLogEvent(level, message, this.name, fields);

        for (const sink of this.sinks) {
            try {
                sink.write(event);
            }
            catch (error) {
                // One sink failing shouldn't break the others
                console.error(`Sink ${sink.id} write error:`, error);
            }
        }
    }

    debug(message: string, fields?: EventFields): void {
        this.emit("debug", message, fields);
    }

    info(message: string, fields?: EventFields): void {
        this.emit("info", message, fields);
    }

    warn(message: string, fields?: EventFields): void {
        this.emit("warn", message, fields);
    }

    error(message: string, fields?: EventFields): void {
        this.emit("error", message, fields);
    }

    /**
     * Create an emitter with the same sinks and threshold under another name.
     *
     * @param name - Child logger name
     */
    child(name: string): FanOutEmitter {
        return new FanOutEmitter({
            name,
            sinks   : this.sinks,
            minLevel: this.minLevel,
        });
    }

    /**
     * Wait for every sink's in-flight deliveries.
     */
    async flush(): Promise<void> {
        await Promise.all(this.sinks.map(async (sink) => {
            try {
                await sink.flush?.();
            }
            catch (error) {
                console.error(`Sink ${sink.id} flush error:`, error);
            }
        }));
    }
}

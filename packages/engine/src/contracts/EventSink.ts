/**
 * @fileoverview Event Sink Contract
 *
 * Defines the structured log event that flows out of the intake core
 * and the sinks that receive it.
 *
 * Design decisions:
 * - Fixed envelope (timestamp, level, message, logger) plus open fields
 * - Caller fields never overwrite the envelope
 * - Sinks are independent failure domains
 *
 * @module @review-intake/engine/contracts/EventSink
 */

/**
 * Severity levels, lowest first.
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Numeric priority of each level, used for threshold filtering.
 */
export const LOG_LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = Object.freeze({
    debug: 10,
    info : 20,
    warn : 30,
    error: 40,
});

/**
 * Envelope keys a caller field may not use.
 */
export const RESERVED_FIELDS: readonly string[] = Object.freeze([
    "timestamp",
    "level",
    "message",
    "logger",
]);

/**
 * Prefix applied to caller fields that collide with the envelope.
 */
const kRENAMED_FIELD_PREFIX = "ctx_";

/**
 * Caller-supplied context attached to a single event.
 */
export type EventFields = Readonly<Record<string, unknown>>;

/**
 * Structured log event.
 *
 * The envelope is fixed; `fields` never contains a reserved name.
 */
export interface LogEvent {
    /** ISO timestamp (UTC) when the event was created */
    readonly timestamp: string;

    /** Severity */
    readonly level: LogLevel;

    /** Human-readable message */
    readonly message: string;

    /** Name of the emitting logger */
    readonly logger: string;

    /** Additional per-call-site fields */
    readonly fields: EventFields;
}

/**
 * Destination for structured events.
 *
 * `write` must return without waiting on I/O. Sinks that deliver
 * asynchronously expose `flush` to await in-flight work.
 */
export interface Sink {
    /** Sink identifier, used when reporting sink errors */
    readonly id: string;

    /**
     * Accept one event.
     *
     * @param event - The event to write
     */
    write(event: LogEvent): void;

    /**
     * Wait for pending deliveries. Never rejects.
     */
    flush?(): Promise<void>;
}

/**
 * Sink configuration.
 *
 * - `console`: synchronous local sink
 * - `remote`: best-effort search-index sink
 */
export type SinkConfig =
    | { readonly kind: "console" }
    | {
        readonly kind: "remote";
        readonly endpoint: string;
        readonly timeoutMs?: number;
        readonly apiKey?: string;
    };

/**
 * Logger interface handed to intake components.
 */
export interface EventLogger {
    /** Logger identity written into every event */
    readonly name: string;

    emit(level: LogLevel, message: string, fields?: EventFields): void;

    /**
     * Emit without applying the minimum level.
     */
    record(level: LogLevel, message: string, fields?: EventFields): void;

    debug(message: string, fields?: EventFields): void;
    info(message: string, fields?: EventFields): void;
    warn(message: string, fields?: EventFields): void;
    error(message: string, fields?: EventFields): void;

    /**
     * Create a logger sharing the same sinks under another name.
     */
    child(name: string): EventLogger;

    /**
     * Wait for in-flight deliveries on every sink. Never rejects.
     */
    flush(): Promise<void>;
}

/**
 * Type guard for log level strings.
 */
export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Copy caller fields, renaming any that collide with the envelope.
 *
 * @param fields - Caller fields
 * @returns Frozen fields object without reserved keys
 *
 * @example
 * ```typescript
 * sanitizeFields({ level: 3, movie_id: 7 });
 * // => { ctx_level: 3, movie_id: 7 }
 * ```
 */
export function sanitizeFields(fields: EventFields = {}): EventFields {
    const sanitized: Record<string, unknown> = {};

    // Unreserved keys first so a renamed key can detect a real collision
    for (const [key, value] of Object.entries(fields)) {
        if (!RESERVED_FIELDS.includes(key)) {
            sanitized[key] = value;
        }
    }

    for (const [key, value] of Object.entries(fields)) {
        if (!RESERVED_FIELDS.includes(key)) {
            continue;
        }

        let renamed = `${kRENAMED_FIELD_PREFIX}${key}`;
        while (Object.prototype.hasOwnProperty.call(sanitized, renamed)) {
            renamed = `${kRENAMED_FIELD_PREFIX}${renamed}`;
        }
        sanitized[renamed] = value;
    }

    return Object.freeze(sanitized);
}

/**
 * Factory function to create a log event.
 *
 * @param level - Severity
 * @param message - Message text
 * @param logger - Logger name
 * @param fields - Optional caller fields
 * @returns Frozen LogEvent with a UTC timestamp
 */
export function createLogEvent(
    level: LogLevel,
    message: string,
    logger: string,
    fields?: EventFields
): LogEvent {
    return Object.freeze({
        timestamp: new Date().toISOString(),
        level,
        message,
        logger,
        fields   : sanitizeFields(fields),
    });
}

/**
 * Flatten an event into the single JSON document sinks transmit.
 *
 * Envelope keys are written last, so they always win.
 */
export function toEventDocument(event: LogEvent): Record<string, unknown> {
    return {
        ...event.fields,
        timestamp: event.timestamp,
        level    : event.level,
        message  : event.message,
        logger   : event.logger,
    };
}

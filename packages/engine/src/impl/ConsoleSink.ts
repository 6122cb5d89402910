/**
 * @fileoverview Console Sink
 *
 * Local, synchronous sink. Writes one JSON line per event.
 *
 * @module @review-intake/engine/impl/ConsoleSink
 */

import type { LogEvent, Sink } from "../contracts/EventSink.js";
import { toEventDocument } from "../contracts/EventSink.js";

/**
 * Console sink.
 *
 * `warn` goes to console.warn, `error` to console.error, everything else
 * to console.log. Lines are appended in emission order.
 */
export class ConsoleSink implements Sink {
    readonly id = "console";

    /**
     * Write an event as a JSON line.
     *
     * Falls back to the bare envelope when the fields cannot be
     * serialised (circular structures, BigInt values).
     *
     * @param event - The event to write
     */
    write(event: LogEvent): void {
        const line = serialize(event);

        switch (event.level) {
            case "error":
                console.error(line);
                break;
            case "warn":
                console.warn(line);
                break;
            default:
                console.log(line);
        }
    }
}

/**
 * Serialise an event, dropping its fields if they are not serialisable.
 */
function serialize(event: LogEvent): string {
    try {
        return JSON.stringify(toEventDocument(event));
    }
    catch (error) {
        return JSON.stringify({
            timestamp      : event.timestamp,
            level          : event.level,
            message        : event.message,
            logger         : event.logger,
            fields_dropped : error instanceof Error ? error.message : String(error),
        });
    }
}

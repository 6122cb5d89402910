/**
 * @fileoverview Memory Sink
 *
 * Keeps every event in an array. Used for local inspection and tests.
 *
 * @module @review-intake/engine/impl/MemorySink
 */

import type { LogEvent, Sink } from "../contracts/EventSink.js";

export class MemorySink implements Sink {
    readonly id = "memory";
    readonly events: LogEvent[] = [];

    write(event: LogEvent): void {
        this.events.push(event);
    }

    /**
     * Events whose fields match every given key/value pair.
     */
    matching(fields: Record<string, unknown>): LogEvent[] {
        return this.events.filter(event =>
            Object.entries(fields).every(([key, value]) => event.fields[key] === value)
        );
    }

    messages(): string[] {
        return this.events.map(event => event.message);
    }

    clear(): void {
        this.events.length = 0;
    }
}

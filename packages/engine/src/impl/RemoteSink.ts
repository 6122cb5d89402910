/**
 * @fileoverview Remote Search-Index Sink
 *
 * Best-effort delivery of events to a search index write endpoint.
 * One JSON document per POST. Delivery is at most once: network
 * errors, timeouts and non-2xx responses are counted and dropped.
 *
 * @module @review-intake/engine/impl/RemoteSink
 */

import type { LogEvent, Sink } from "../contracts/EventSink.js";
import { toEventDocument } from "../contracts/EventSink.js";

/**
 * Fetch-compatible function, injectable for tests.
 */
export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Remote sink configuration.
 */
export interface RemoteSinkConfig {
    /** Write endpoint, e.g. https://search.example.com/reviews-logs/_doc */
    readonly endpoint: string;

    /** Abort each request after this many milliseconds (default: 1000) */
    readonly timeoutMs?: number;

    /** Sent as `Authorization: ApiKey <key>` when set */
    readonly apiKey?: string;

    /** Fetch implementation (default: global fetch) */
    readonly fetch?: FetchFn;
}

/**
 * Default request timeout in milliseconds.
 */
export const DEFAULT_REMOTE_TIMEOUT_MS = 1000;

/**
 * Remote sink.
 *
 * @example
 * ```typescript
 * const sink = new RemoteSink({ endpoint: "http://localhost:9200/intake-logs/_doc" });
 * sink.write(createLogEvent("info", "Review committed", "intake", { movie_id: 3 }));
 * await sink.flush();
 * ```
 */
export class RemoteSink implements Sink {
    readonly id = "remote";

    private readonly endpoint: string;
    private readonly timeoutMs: number;
    private readonly headers: Record<string, string>;
    private readonly fetchFn: FetchFn;
    private readonly pending: Set<Promise<void>> = new Set();

    private delivered = 0;
    private failed = 0;

    constructor(config: RemoteSinkConfig) {
        this.endpoint = config.endpoint;
        this.timeoutMs = config.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS;
        this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
        this.headers = {
            "Content-Type": "application/json",
            ...(config.apiKey ? { Authorization: `ApiKey ${config.apiKey}` } : {}),
        };
    }

    /**
     * Start delivery of an event and return immediately.
     *
     * @param event - The event to send
     */
    write(event: LogEvent): void {
        const delivery = this.deliver(event).finally(() => {
            this.pending.delete(delivery);
        });
        this.pending.add(delivery);
    }

    /**
     * Wait until every delivery started so far has settled.
     */
    async flush(): Promise<void> {
        await Promise.all(Array.from(this.pending));
    }

    /** Deliveries acknowledged with a 2xx response */
    get deliveredCount(): number {
        return this.delivered;
    }

    /** Deliveries dropped after an error, timeout or non-2xx response */
    get failures(): number {
        return this.failed;
    }

    /** Deliveries still in flight */
    get pendingCount(): number {
        return this.pending.size;
    }

    /**
     * POST one document, bounded by the timeout. Never rejects.
     */
    private async deliver(event: LogEvent): Promise<void> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        try {
            const response = await this.fetchFn(this.endpoint, {
                method : "POST",
                headers: this.headers,
                body   : JSON.stringify(toEventDocument(event)),
                signal : controller.signal,
            });

            if (response.ok) {
                this.delivered++;
            }
            else {
                this.failed++;
            }
        }
        catch {
            // Dropped; only counted
            this.failed++;
        }
        finally {
            clearTimeout(timer);
        }
    }
}

/**
 * @fileoverview Shared test helpers
 *
 * @module __tests__/helpers
 */

import { mkdirSync, writeFileSync } from "fs";
import { join } from "path";
import { FanOutEmitter, MemorySink } from "@review-intake/engine";

/**
 * Emitter that records everything down to debug level.
 */
export function createRecordingLogger(name = "test"): { logger: FanOutEmitter; sink: MemorySink } {
    const sink = new MemorySink();
    return { logger: new FanOutEmitter({ name, sinks: [sink], minLevel: "debug" }), sink };
}

/**
 * Two-word sentiment model: "great" pushes positive, "terrible" negative.
 */
export const FIXTURE_MODEL = {
    format    : "linear-text/v1",
    classes   : ["negative", "positive"],
    intercept : 0,
    vocabulary: {
        great   : { idf: 1, weight: 2 },
        terrible: { idf: 1, weight: -2 },
    },
};

/**
 * Write a model document under root/...segments/model.json.
 *
 * @returns The artifact directory
 */
export function writeModel(root: string, segments: string[], document: unknown = FIXTURE_MODEL): string {
    const dir = join(root, ...segments);
    mkdirSync(dir, { recursive: true });
    writeFileSync(join(dir, "model.json"), JSON.stringify(document));
    return dir;
}

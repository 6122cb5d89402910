/**
 * @fileoverview Unit tests for ReviewIntakePipeline
 *
 * Tests cover:
 * - Committed submissions and their canonical event
 * - Classifier unavailable: no persistence
 * - Classification failures (ok: false and thrown)
 * - Persistence failures after a successful classification
 * - Interaction with the score aggregator
 *
 * @module @review-intake/engine/__tests__/ReviewIntakePipeline
 */

import { describe, it, expect, vi, beforeEach } from "vitest";
import { ReviewIntakePipeline } from "../engine/ReviewIntakePipeline.js";
import { ScoreAggregator } from "../engine/ScoreAggregator.js";
import type { ClassifierPort } from "../contracts/ClassifierPort.js";
import { createPrediction, createPredictionFailure } from "../contracts/ClassifierPort.js";
import type { ClassifierArtifact } from "../contracts/ClassifierArtifact.js";
import { unavailableArtifact } from "../contracts/ClassifierArtifact.js";
import { InMemoryReviewStore, createRecordingLogger } from "./fakes.js";
import { MemorySink } from "../impl/MemorySink.js";
import { FanOutEmitter } from "../impl/FanOutEmitter.js";

/**
 * Classifier that calls anything mentioning "good" positive.
 */
const keywordClassifier: ClassifierPort = {
    predict: (text: string) => createPrediction(/good/i.test(text) ? "Positive" : "negative", 0.9),
};

function loaded(classifier: ClassifierPort, version = "m-test01"): ClassifierArtifact {
    return Object.freeze({
        status: "loaded" as const,
        classifier,
        version,
        path  : "/artifacts/m-test01/artifacts",
    });
}

describe("ReviewIntakePipeline", () => {
    let store: InMemoryReviewStore;
    let logger: FanOutEmitter;
    let sink: MemorySink;

    beforeEach(() => {
        store = new InMemoryReviewStore();
        ({ logger, sink } = createRecordingLogger("intake"));
    });

    describe("committed submissions", () => {
        // Scenario: Positive review is classified and stored
        it("should persist the review and return label and version", async () => {
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger });

            const result = await pipeline.submit(3, "A good, warm film");

            expect(result).toEqual({
                success: true,
                review : {
                    reviewId    : 1,
                    movieId     : 3,
                    sentiment   : "Positive",
                    isPositive  : true,
                    modelVersion: "m-test01",
                },
            });
            expect(store.reviews).toEqual([
                { id: 1, movieId: 3, text: "A good, warm film", isPositive: true },
            ]);
        });

        // Scenario: Any non-positive label is stored as negative
        it("should store non-positive labels as negative", async () => {
            const neutral: ClassifierPort = { predict: () => createPrediction("neutral") };
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(neutral), store, logger });

            const result = await pipeline.submit(3, "It exists");

            expect(result.success).toBe(true);
            expect(store.reviews[0].isPositive).toBe(false);
        });

        // Scenario: Canonical downstream event, exactly once
        it("should emit exactly one committed event with stable field names", async () => {
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger });

            await pipeline.submit(5, "Good pacing throughout");

            const committed = sink.matching({ stage: "committed" });
            expect(committed).toHaveLength(1);
            expect(committed[0].level).toBe("info");
            expect(committed[0].message).toBe("Review committed");
            expect(committed[0].fields).toMatchObject({
                movie_id     : 5,
                review_id    : 1,
                sentiment    : "Positive",
                is_positive  : true,
                model_version: "m-test01",
            });
        });

        // Scenario: Committed event survives a strict threshold
        it("should emit the committed event even when the logger only passes errors", async () => {
            const strictSink = new MemorySink();
            const strict = new FanOutEmitter({ name: "intake", sinks: [strictSink], minLevel: "error" });
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger: strict });

            const result = await pipeline.submit(1, "good");

            expect(result.success).toBe(true);
            expect(strictSink.messages()).toEqual(["Review committed"]);
            expect(strictSink.matching({ stage: "committed", review_id: 1 })).toHaveLength(1);
        });

        // Scenario: Stage transitions carry one trace ID
        it("should report each stage with the same trace ID", async () => {
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger });

            await pipeline.submit(5, "Good");

            expect(sink.events.map(event => event.fields.stage)).toEqual([
                "received",
                "classifying",
                "persisting",
                "committed",
            ]);
            const traceIds = new Set(sink.events.map(event => event.fields.trace_id));
            expect(traceIds.size).toBe(1);
            expect(String([...traceIds][0])).toMatch(/^sub_/);
        });
    });

    describe("classifier unavailable", () => {
        // Scenario: No artifact was resolved at startup
        it("should fail with ModelUnavailable and never touch the store", async () => {
            const createReview = vi.spyOn(store, "createReview");
            const pipeline = new ReviewIntakePipeline({
                artifact: unavailableArtifact("no model.json found under mlruns"),
                store,
                logger,
            });

            const result = await pipeline.submit(1, "Good film");

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("ModelUnavailable");
            }
            expect(createReview).not.toHaveBeenCalled();
            expect(pipeline.modelVersion).toBe("unknown");
        });

        it("should emit an error event with reason 'not loaded'", async () => {
            const pipeline = new ReviewIntakePipeline({ artifact: unavailableArtifact("missing"), store, logger });

            await pipeline.submit(1, "Good film");

            const errors = sink.events.filter(event => event.level === "error");
            expect(errors).toHaveLength(1);
            expect(errors[0].fields).toMatchObject({ reason: "not loaded", stage: "model_unavailable" });
        });
    });

    describe("classification failures", () => {
        // Scenario: Artifact reports an internal failure
        it("should fail with ClassificationFailed and persist nothing", async () => {
            const failing: ClassifierPort = { predict: () => createPredictionFailure("empty input") };
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(failing), store, logger });

            const result = await pipeline.submit(2, "");

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("ClassificationFailed");
                expect(result.error.details).toEqual({ error: "empty input" });
            }
            expect(store.reviews).toHaveLength(0);
            expect(sink.matching({ stage: "classification_failed" })).toHaveLength(1);
        });

        // Scenario: Artifact throws despite the contract
        it("should treat a thrown error as a classification failure", async () => {
            const throwing: ClassifierPort = {
                predict: async () => {
                    throw new Error("tensor shape mismatch");
                },
            };
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(throwing), store, logger });

            const result = await pipeline.submit(2, "Good");

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("ClassificationFailed");
            }
            expect(store.reviews).toHaveLength(0);
        });
    });

    describe("persistence failures", () => {
        // Scenario: Classified, but the write fails
        it("should fail with PersistenceFailed after a successful classification", async () => {
            vi.spyOn(store, "createReview").mockRejectedValue(new Error("database is locked"));
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger });

            const result = await pipeline.submit(4, "Good");

            expect(result.success).toBe(false);
            if (!result.success) {
                expect(result.error.kind).toBe("PersistenceFailed");
                expect(result.error.details).toEqual({
                    sentiment: "Positive",
                    error    : "database is locked",
                });
            }
        });

        // Scenario: Observers can tell "classified but not stored" apart
        it("should emit exactly one event recording prediction success and storage failure", async () => {
            vi.spyOn(store, "createReview").mockRejectedValue(new Error("database is locked"));
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger });

            await pipeline.submit(4, "Good");

            const recorded = sink.matching({ prediction_succeeded: true, storage_succeeded: false });
            expect(recorded).toHaveLength(1);
            expect(recorded[0].level).toBe("error");
            expect(recorded[0].fields).toMatchObject({
                movie_id : 4,
                sentiment: "Positive",
                error    : "database is locked",
                stage    : "persistence_failed",
            });
            expect(sink.matching({ stage: "committed" })).toHaveLength(0);
        });
    });

    describe("with the score aggregator", () => {
        // Scenario: A committed positive review moves both counts by one
        it("should raise total and positive counts by exactly one", async () => {
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger });
            const aggregator = new ScoreAggregator(store, logger);

            await pipeline.submit(8, "Meh");
            const before = await aggregator.score(8);
            await pipeline.submit(8, "So good");
            const after = await aggregator.score(8);

            expect(after.totalReviews).toBe(before.totalReviews + 1);
            expect(after.positiveCount).toBe(before.positiveCount + 1);
        });

        // Scenario: Concurrent submissions all land
        it("should commit concurrent submissions independently", async () => {
            const pipeline = new ReviewIntakePipeline({ artifact: loaded(keywordClassifier), store, logger });

            const results = await Promise.all([
                pipeline.submit(9, "good one"),
                pipeline.submit(9, "bad one"),
                pipeline.submit(9, "good two"),
            ]);

            expect(results.every(result => result.success)).toBe(true);
            expect(await new ScoreAggregator(store, logger).score(9)).toEqual({
                totalReviews : 3,
                positiveCount: 2,
                score        : 66.67,
                rating       : "fresh",
            });
        });
    });
});

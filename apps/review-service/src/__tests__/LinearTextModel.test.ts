/**
 * @fileoverview Unit tests for LinearTextModel
 *
 * Tests cover:
 * - Decision function and label choice
 * - Confidence for each class
 * - Document validation
 * - Loading from an artifact directory
 *
 * @module __tests__/LinearTextModel
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import {
    LinearTextModel,
    createLinearTextLoader,
    loadLinearTextModel,
    parseLinearTextDefinition,
} from "../domain/model/LinearTextModel.js";
import { FIXTURE_MODEL, writeModel } from "./helpers.js";

function model(overrides: Record<string, unknown> = {}): LinearTextModel {
    return new LinearTextModel(parseLinearTextDefinition({ ...FIXTURE_MODEL, ...overrides }));
}

describe("LinearTextModel", () => {
    describe("decision", () => {
        it("should L2-normalise token weights", () => {
            expect(model().decision("great great film")).toBe(2);
        });

        it("should scale by idf before normalising", () => {
            const withIdf = model({
                vocabulary: {
                    great : { idf: 1, weight: 2 },
                    superb: { idf: 2, weight: 1 },
                },
            });

            expect(withIdf.decision("great superb")).toBeCloseTo(4 / Math.sqrt(5), 10);
        });

        it("should return the intercept when no token is known", () => {
            expect(model({ intercept: 0.5 }).decision("a film")).toBe(0.5);
        });

        it("should lowercase by default", () => {
            expect(model().decision("GREAT")).toBe(2);
        });

        it("should keep case when lowercase is false", () => {
            expect(model({ lowercase: false }).decision("GREAT")).toBe(0);
        });
    });

    describe("predict", () => {
        // Scenario: Positive decision
        it("should return the positive class when the decision is above zero", () => {
            const prediction = model().predict("A great film");

            expect(prediction.ok).toBe(true);
            if (prediction.ok) {
                expect(prediction.label).toBe("positive");
                expect(prediction.confidence).toBeCloseTo(1 / (1 + Math.exp(-2)), 10);
            }
        });

        it("should return the negative class with its own confidence", () => {
            const prediction = model().predict("terrible");

            expect(prediction.ok).toBe(true);
            if (prediction.ok) {
                expect(prediction.label).toBe("negative");
                expect(prediction.confidence).toBeCloseTo(1 - 1 / (1 + Math.exp(2)), 10);
            }
        });

        // Scenario: Decision exactly zero
        it("should return the negative class when the decision is zero", () => {
            expect(model().predict("great but terrible")).toEqual({
                ok        : true,
                label     : "negative",
                confidence: 0.5,
            });
        });

        it("should fail on non-string input", () => {
            expect(model().predict(42)).toEqual({ ok: false, error: "expected text, got number" });
        });
    });

    describe("parseLinearTextDefinition", () => {
        it("should reject an unknown format", () => {
            expect(() => parseLinearTextDefinition({ ...FIXTURE_MODEL, format: "bag-of-words" }))
                .toThrow("unsupported format: bag-of-words");
        });

        it("should require exactly two classes", () => {
            expect(() => parseLinearTextDefinition({ ...FIXTURE_MODEL, classes: ["a", "b", "c"] }))
                .toThrow("'classes' must list exactly two labels");
        });

        it("should reject a non-numeric weight", () => {
            expect(() => parseLinearTextDefinition({
                ...FIXTURE_MODEL,
                vocabulary: { great: { idf: 1, weight: "high" } },
            })).toThrow("invalid vocabulary entry for 'great'");
        });

        it("should reject a non-finite intercept", () => {
            expect(() => parseLinearTextDefinition({ ...FIXTURE_MODEL, intercept: null }))
                .toThrow("'intercept' must be a finite number");
        });
    });

    describe("loading", () => {
        let root: string;

        beforeEach(() => {
            root = mkdtempSync(join(tmpdir(), "linear-model-"));
        });

        afterEach(() => {
            rmSync(root, { recursive: true, force: true });
        });

        it("should load the marker file from an artifact directory", async () => {
            const dir = writeModel(root, ["artifacts"]);

            const classifier = await createLinearTextLoader("model.json")(dir);

            expect(await classifier.predict("great")).toMatchObject({ ok: true, label: "positive" });
        });

        it("should name the file when the JSON is malformed", () => {
            const file = join(root, "model.json");
            writeFileSync(file, "{ not json");

            expect(() => loadLinearTextModel(file)).toThrow(`Invalid model file ${file}:`);
        });

        it("should name the file when the document is invalid", () => {
            const file = join(root, "model.json");
            writeFileSync(file, JSON.stringify({ format: "linear-text/v0" }));

            expect(() => loadLinearTextModel(file))
                .toThrow(`Invalid model file ${file}: unsupported format: linear-text/v0`);
        });
    });
});

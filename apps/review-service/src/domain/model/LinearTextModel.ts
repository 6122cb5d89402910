/**
 * @fileoverview Linear Text Classifier
 *
 * Loads the deployed sentiment artifact: a tf-idf vocabulary with one
 * weight per token and an intercept, exported by the training job as
 * a single JSON document.
 *
 * Prediction:
 * 1. Tokenize into runs of two or more letters, digits or underscores
 * 2. Weight each known token by count x idf, then L2-normalise
 * 3. decision = intercept + sum(tfidf x weight)
 * 4. decision > 0 gives the positive class
 *
 * @module domain/model/LinearTextModel
 */

import { readFileSync } from "fs";
import { join } from "path";
import {
    createPrediction,
    createPredictionFailure,
    type ArtifactLoader,
    type ClassifierPort,
    type Prediction,
} from "@review-intake/engine";

/**
 * Format identifier written by the training job.
 */
export const LINEAR_TEXT_FORMAT = "linear-text/v1";

const TOKEN_PATTERN = /[\p{L}\p{N}_]{2,}/gu;

/**
 * Per-token parameters.
 */
export interface VocabularyEntry {
    readonly idf: number;
    readonly weight: number;
}

/**
 * Validated model document.
 */
export interface LinearTextDefinition {
    /** [negativeLabel, positiveLabel] */
    readonly classes: readonly [string, string];
    readonly intercept: number;
    readonly vocabulary: ReadonlyMap<string, VocabularyEntry>;
    readonly lowercase: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
    return typeof value === "number" && Number.isFinite(value);
}

/**
 * Validate a parsed model document.
 *
 * @param document - Parsed JSON
 * @throws Error naming the first invalid field
 */
export function parseLinearTextDefinition(document: unknown): LinearTextDefinition {
    if (!isRecord(document)) {
        throw new Error("expected a JSON object");
    }

    const { format, classes, intercept, vocabulary, lowercase } = document;

    if (format !== LINEAR_TEXT_FORMAT) {
        throw new Error(`unsupported format: ${String(format)}`);
    }

    if (!Array.isArray(classes) || classes.length !== 2) {
        throw new Error("'classes' must list exactly two labels");
    }

    const [negative, positive]: unknown[] = classes;
    if (typeof negative !== "string" || typeof positive !== "string") {
        throw new Error("'classes' must list exactly two labels");
    }

    if (!isFiniteNumber(intercept)) {
        throw new Error("'intercept' must be a finite number");
    }

    if (!isRecord(vocabulary)) {
        throw new Error("'vocabulary' must map tokens to { idf, weight }");
    }

    if (lowercase !== undefined && typeof lowercase !== "boolean") {
        throw new Error("'lowercase' must be a boolean");
    }

    const entries = new Map<string, VocabularyEntry>();
    for (const [token, entry] of Object.entries(vocabulary)) {
        if (!isRecord(entry) || !isFiniteNumber(entry.idf) || !isFiniteNumber(entry.weight)) {
            throw new Error(`invalid vocabulary entry for '${token}'`);
        }
        entries.set(token, { idf: entry.idf, weight: entry.weight });
    }

    return {
        classes   : [negative, positive],
        intercept,
        vocabulary: entries,
        lowercase : lowercase ?? true,
    };
}

/**
 * LinearTextModel - tf-idf linear sentiment classifier.
 *
 * @example
 * ```typescript
 * const model = loadLinearTextModel("mlruns/1/m-3fa2/artifacts/model.json");
 * model.predict("A great film");
 * // => { ok: true, label: "positive", confidence: 0.88 }
 * ```
 */
export class LinearTextModel implements ClassifierPort {
    private readonly definition: LinearTextDefinition;

    constructor(definition: LinearTextDefinition) {
        this.definition = definition;
    }

    /**
     * Signed distance from the decision boundary.
     */
    decision(text: string): number {
        const { intercept, vocabulary, lowercase } = this.definition;
        const source = lowercase ? text.toLowerCase() : text;

        const counts = new Map<string, number>();
        for (const token of source.match(TOKEN_PATTERN) ?? []) {
            if (vocabulary.has(token)) {
                counts.set(token, (counts.get(token) ?? 0) + 1);
            }
        }

        let norm = 0;
        const weighted: Array<[number, number]> = [];
        for (const [token, count] of counts) {
            const entry = vocabulary.get(token);
            if (!entry) {
                continue;
            }
            const tfidf = count * entry.idf;
            norm += tfidf * tfidf;
            weighted.push([tfidf, entry.weight]);
        }

        if (norm === 0) {
            return intercept;
        }

        const length = Math.sqrt(norm);
        return weighted.reduce((sum, [tfidf, weight]) => sum + (tfidf / length) * weight, intercept);
    }

    predict(text: unknown): Prediction {
        if (typeof text !== "string") {
            return createPredictionFailure(`expected text, got ${typeof text}`);
        }

        const decision = this.decision(text);
        const [negative, positive] = this.definition.classes;
        const probability = 1 / (1 + Math.exp(-decision));

        return decision > 0
            ? createPrediction(positive, probability)
            : createPrediction(negative, 1 - probability);
    }
}

/**
 * Load a model from its JSON file.
 *
 * @param filePath - Path to the model document
 * @throws Error if the file cannot be read or is not a valid model
 */
export function loadLinearTextModel(filePath: string): LinearTextModel {
    const content = readFileSync(filePath, "utf-8");

    let document: unknown;
    try {
        document = JSON.parse(content);
    }
    catch (error) {
        throw new Error(`Invalid model file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }

    try {
        return new LinearTextModel(parseLinearTextDefinition(document));
    }
    catch (error) {
        throw new Error(`Invalid model file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
}

/**
 * Artifact loader reading `markerFile` from the resolved directory.
 */
export function createLinearTextLoader(markerFile: string): ArtifactLoader {
    return (artifactDir: string) => loadLinearTextModel(join(artifactDir, markerFile));
}

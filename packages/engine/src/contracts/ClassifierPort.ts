/**
 * Classifier Port Contract
 *
 * Wraps a loaded artifact's predict operation. One instance is shared
 * by every concurrent submission, so implementations hold no mutable
 * state once loaded.
 *
 * Design principles:
 * - Failures are values: `ok: false`, never a thrown error
 * - Labels are opaque; only "positive" is interpreted
 */

/**
 * Successful prediction.
 */
export interface PredictionSuccess {
    readonly ok: true;

    /** Label produced by the artifact */
    readonly label: string;

    /** Probability of the returned label, when the artifact reports one */
    readonly confidence?: number;
}

/**
 * Prediction the artifact could not produce.
 */
export interface PredictionFailure {
    readonly ok: false;

    /** What went wrong inside the artifact */
    readonly error: string;
}

export type Prediction = PredictionSuccess | PredictionFailure;

/**
 * ClassifierPort interface.
 *
 * @example
 * ```typescript
 * const prediction = await classifier.predict("A gorgeous, moving film");
 * if (prediction.ok && isPositiveLabel(prediction.label)) {
 *     // positive
 * }
 * ```
 */
export interface ClassifierPort {
    /**
     * Classify a review text.
     *
     * @param text - Review text
     * @returns Prediction; `ok: false` on malformed input or artifact error
     */
    predict(text: string): Promise<Prediction> | Prediction;
}

/**
 * Whether a label denotes the positive class.
 *
 * Any label other than a case-insensitive "positive" counts as negative,
 * including multi-class or abstention labels.
 */
export function isPositiveLabel(label: string): boolean {
    return label.trim().toLowerCase() === "positive";
}

/**
 * Factory for a successful prediction.
 */
export function createPrediction(label: string, confidence?: number): PredictionSuccess {
    return Object.freeze({
        ok: true as const,
        label,
        ...(confidence !== undefined && { confidence }),
    });
}

/**
 * Factory for a failed prediction.
 */
export function createPredictionFailure(error: string): PredictionFailure {
    return Object.freeze({ ok: false as const, error });
}

/**
 * Intake Error Contract
 *
 * Every failure surfaced by the intake core carries a stable kind.
 * Nothing is retried inside the core.
 */

import type { Review } from "./Review.js";

/**
 * Stable error kinds.
 *
 * - ModelUnavailable: no artifact resolved or loaded
 * - ClassificationFailed: the artifact failed on this input
 * - PersistenceFailed: the write failed after a successful classification
 * - SeedingFailed: bootstrap data missing or malformed
 * - QueryFailed: a read from the store failed
 */
export type IntakeErrorKind =
    | "ModelUnavailable"
    | "ClassificationFailed"
    | "PersistenceFailed"
    | "SeedingFailed"
    | "QueryFailed";

/**
 * Error with a stable kind and optional structured details.
 */
export class IntakeError extends Error {
    readonly kind: IntakeErrorKind;
    readonly details: Readonly<Record<string, unknown>>;

    constructor(kind: IntakeErrorKind, message: string, details: Record<string, unknown> = {}) {
        super(message);
        this.name = "IntakeError";
        this.kind = kind;
        this.details = Object.freeze({ ...details });
    }
}

/**
 * Type guard for IntakeError.
 */
export function isIntakeError(error: unknown): error is IntakeError {
    return error instanceof IntakeError;
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

/**
 * What the caller gets back for a committed submission.
 */
export interface SubmittedReview {
    /** Store-assigned review id */
    readonly reviewId: Review["id"];

    readonly movieId: number;

    /** Label as produced by the classifier */
    readonly sentiment: string;

    /** Sentiment flag that was persisted */
    readonly isPositive: boolean;

    /** Version tag of the classifier that produced the label */
    readonly modelVersion: string;
}

/**
 * Result of a submission.
 */
export type SubmissionResult =
    | { readonly success: true; readonly review: SubmittedReview }
    | { readonly success: false; readonly error: IntakeError };

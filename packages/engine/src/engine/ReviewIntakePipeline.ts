/**
 * @fileoverview ReviewIntakePipeline
 *
 * Orchestrates a single review submission.
 *
 * Pipeline flow:
 * 1. Check the classifier artifact is loaded
 * 2. Classify the review text
 * 3. Persist the review with the computed sentiment flag
 * 4. Report the committed review
 *
 * Every failure is terminal for the submission and is returned to the
 * caller with a stable kind. Nothing is retried.
 *
 * @module @review-intake/engine/engine/ReviewIntakePipeline
 */

import type { ClassifierArtifact, LoadedArtifact } from "../contracts/ClassifierArtifact.js";
import { isArtifactLoaded } from "../contracts/ClassifierArtifact.js";
import type { Prediction } from "../contracts/ClassifierPort.js";
import { isPositiveLabel } from "../contracts/ClassifierPort.js";
import type { PersistencePort } from "../contracts/PersistencePort.js";
import type { EventFields, EventLogger } from "../contracts/EventSink.js";
import type { SubmissionResult, SubmittedReview } from "../contracts/IntakeError.js";
import { IntakeError, describeError } from "../contracts/IntakeError.js";

/**
 * Stages of a submission. The last four are terminal.
 */
export type SubmissionStage =
    | "received"
    | "classifying"
    | "persisting"
    | "model_unavailable"
    | "classification_failed"
    | "persistence_failed"
    | "committed";

/**
 * Field names of the committed-review event. Downstream sentiment
 * reporting keys off these, so they must not change.
 */
export const COMMITTED_EVENT_FIELDS = Object.freeze({
    movieId     : "movie_id",
    reviewId    : "review_id",
    sentiment   : "sentiment",
    isPositive  : "is_positive",
    modelVersion: "model_version",
} as const);

/**
 * Pipeline dependencies.
 */
export interface IntakePipelineConfig {
    /** Artifact resolved at startup */
    readonly artifact: ClassifierArtifact;

    /** Review store */
    readonly store: PersistencePort;

    /** Event emitter */
    readonly logger: EventLogger;
}

/**
 * Generate a unique trace ID for a submission.
 */
function generateTraceId(): string {
    const timestamp = Date.now().toString(36);
    const random = Math.random().toString(36).substring(2, 8);
    return `sub_${timestamp}_${random}`;
}

/**
 * ReviewIntakePipeline - classify, persist, report.
 *
 * Stateless across submissions; safe to call concurrently.
 *
 * @example
 * ```typescript
 * const pipeline = new ReviewIntakePipeline({ artifact, store, logger });
 *
 * const result = await pipeline.submit(3, "An absolute triumph of a film");
 * if (result.success) {
 *     console.log(result.review.sentiment, result.review.modelVersion);
 * }
 * else {
 *     console.log(result.error.kind);
 * }
 * ```
 */
export class ReviewIntakePipeline {
    private readonly artifact: ClassifierArtifact;
    private readonly store: PersistencePort;
    private readonly logger: EventLogger;

    constructor(config: IntakePipelineConfig) {
        this.artifact = config.artifact;
        this.store = config.store;
        this.logger = config.logger;
    }

    /**
     * Version tag of the classifier in use ("unknown" when unavailable).
     */
    get modelVersion(): string {
        return this.artifact.version;
    }

    /**
     * Submit a review.
     *
     * @param movieId - Movie the review is about (not checked for existence)
     * @param text - Review text
     * @returns The committed review, or the terminal failure
     */
    async submit(movieId: number, text: string): Promise<SubmissionResult> {
        const traceId = generateTraceId();

        this.report("debug", "Review received", "received", traceId, { movie_id: movieId });

        if (!isArtifactLoaded(this.artifact)) {
            this.report("error", "Review rejected: classifier not loaded", "model_unavailable", traceId, {
                movie_id     : movieId,
                reason       : "not loaded",
                model_version: this.artifact.version,
            });

            return this.fail(new IntakeError("ModelUnavailable", "Classifier not loaded", {
                reason: this.artifact.reason,
            }));
        }

        const artifact = this.artifact;

        this.report("debug", "Classifying review", "classifying", traceId, {
            movie_id     : movieId,
            model_version: artifact.version,
        });

        const prediction = await this.classify(artifact, text);

        if (!prediction.ok) {
            this.report("error", "Review classification failed", "classification_failed", traceId, {
                movie_id     : movieId,
                model_version: artifact.version,
                error        : prediction.error,
            });

            return this.fail(new IntakeError("ClassificationFailed", "Classifier failed on the review text", {
                error: prediction.error,
            }));
        }

        const sentiment = prediction.label;
        const isPositive = isPositiveLabel(sentiment);

        this.report("debug", "Persisting review", "persisting", traceId, {
            movie_id     : movieId,
            sentiment,
            model_version: artifact.version,
        });

        let reviewId: number;
        try {
            reviewId = await this.store.createReview(movieId, text, isPositive);
        }
        catch (error) {
            // Classified but never recorded; the caller still gets a failure
            this.report("error", "Review classified but not stored", "persistence_failed", traceId, {
                movie_id            : movieId,
                sentiment,
                is_positive         : isPositive,
                model_version       : artifact.version,
                prediction_succeeded: true,
                storage_succeeded   : false,
                error               : describeError(error),
            });

            return this.fail(new IntakeError("PersistenceFailed", "Review could not be stored", {
                sentiment,
                error: describeError(error),
            }));
        }

        const review: SubmittedReview = Object.freeze({
            reviewId,
            movieId,
            sentiment,
            isPositive,
            modelVersion: artifact.version,
        });

        this.report("info", "Review committed", "committed", traceId, {
            [COMMITTED_EVENT_FIELDS.movieId]     : movieId,
            [COMMITTED_EVENT_FIELDS.reviewId]    : reviewId,
            [COMMITTED_EVENT_FIELDS.sentiment]   : sentiment,
            [COMMITTED_EVENT_FIELDS.isPositive]  : isPositive,
            [COMMITTED_EVENT_FIELDS.modelVersion]: artifact.version,
        });

        return { success: true, review };
    }

    /**
     * Run the classifier, mapping a thrown error to a failed prediction.
     */
    private async classify(artifact: LoadedArtifact, text: string): Promise<Prediction> {
        try {
            return await artifact.classifier.predict(text);
        }
        catch (error) {
            return { ok: false, error: describeError(error) };
        }
    }

    private fail(error: IntakeError): SubmissionResult {
        return { success: false, error };
    }

    /**
     * Emit a pipeline event tagged with its stage and trace ID.
     *
     * The committed event is recorded regardless of the logger's level.
     */
    private report(
        level: "debug" | "info" | "error",
        message: string,
        stage: SubmissionStage,
        traceId: string,
        fields: EventFields
    ): void {
        const tagged = { ...fields, stage, trace_id: traceId };

        if (stage === "committed") {
            this.logger.record(level, message, tagged);
        }
        else {
            this.logger.emit(level, message, tagged);
        }
    }
}

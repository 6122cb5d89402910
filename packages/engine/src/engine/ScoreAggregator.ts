/**
 * @fileoverview ScoreAggregator
 *
 * Computes a movie's freshness score from the persisted reviews.
 * Read-only; computed fresh on every call.
 *
 * @module @review-intake/engine/engine/ScoreAggregator
 */

import type { FreshnessRating, ScoreSnapshot } from "../contracts/Review.js";
import type { PersistencePort } from "../contracts/PersistencePort.js";
import type { EventLogger } from "../contracts/EventSink.js";
import { IntakeError, describeError } from "../contracts/IntakeError.js";

/**
 * Score thresholds for the freshness tiers.
 */
export const RATING_THRESHOLDS = Object.freeze({
    certifiedHot: 75,
    fresh       : 60,
});

/**
 * Percentage of positive reviews, rounded to two decimals.
 *
 * @returns 0 when there are no reviews
 */
export function freshnessPercentage(positiveCount: number, totalReviews: number): number {
    if (totalReviews <= 0) {
        return 0;
    }

    const ratio = Math.min(Math.max(positiveCount / totalReviews, 0), 1);
    return Math.round(ratio * 100 * 100) / 100;
}

/**
 * Freshness tier for a score.
 */
export function freshnessRating(score: number, totalReviews: number): FreshnessRating {
    if (totalReviews === 0) {
        return "unrated";
    }
    if (score >= RATING_THRESHOLDS.certifiedHot) {
        return "certified_hot";
    }
    if (score >= RATING_THRESHOLDS.fresh) {
        return "fresh";
    }
    return "rotten";
}

/**
 * ScoreAggregator - freshness score per movie.
 */
export class ScoreAggregator {
    private readonly store: PersistencePort;
    private readonly logger: EventLogger;

    constructor(store: PersistencePort, logger: EventLogger) {
        this.store = store;
        this.logger = logger;
    }

    /**
     * Compute the score snapshot of a movie.
     *
     * @param movieId - Movie to score
     * @throws IntakeError with kind "QueryFailed" if the store cannot be read
     */
    async score(movieId: number): Promise<ScoreSnapshot> {
        let totalReviews: number;
        let positiveCount: number;

        try {
            [totalReviews, positiveCount] = await Promise.all([
                this.store.countReviews(movieId),
                this.store.countPositiveReviews(movieId),
            ]);
        }
        catch (error) {
            throw new IntakeError("QueryFailed", "Could not read review counts", {
                movieId,
                error: describeError(error),
            });
        }

        const score = freshnessPercentage(positiveCount, totalReviews);
        const snapshot: ScoreSnapshot = Object.freeze({
            totalReviews,
            positiveCount,
            score,
            rating: freshnessRating(score, totalReviews),
        });

        this.logger.debug("Score computed", {
            movie_id      : movieId,
            total_reviews : totalReviews,
            positive_count: positiveCount,
            score,
        });

        return snapshot;
    }
}

/**
 * @fileoverview ReviewCatalog
 *
 * Read-only listings over the store: movies, and the latest reviews
 * of a movie.
 *
 * @module @review-intake/engine/engine/ReviewCatalog
 */

import type { Movie, Review } from "../contracts/Review.js";
import type { PersistencePort } from "../contracts/PersistencePort.js";
import { IntakeError, describeError } from "../contracts/IntakeError.js";

/**
 * Number of recent reviews returned when no limit is given.
 */
export const DEFAULT_RECENT_LIMIT = 5;

/**
 * ReviewCatalog - movie and review listings.
 */
export class ReviewCatalog {
    private readonly store: PersistencePort;
    private readonly defaultLimit: number;

    constructor(store: PersistencePort, defaultLimit: number = DEFAULT_RECENT_LIMIT) {
        this.store = store;
        this.defaultLimit = defaultLimit;
    }

    /**
     * All movies.
     *
     * @throws IntakeError with kind "QueryFailed"
     */
    async movies(): Promise<readonly Movie[]> {
        try {
            return await this.store.listMovies();
        }
        catch (error) {
            throw new IntakeError("QueryFailed", "Could not list movies", {
                error: describeError(error),
            });
        }
    }

    /**
     * Latest reviews of a movie, newest first.
     *
     * @param movieId - Movie
     * @param limit - Maximum reviews; non-positive or fractional values are clamped to at least 1; NaN and infinities use the default
     * @throws IntakeError with kind "QueryFailed"
     */
    async recentReviews(movieId: number, limit: number = this.defaultLimit): Promise<readonly Review[]> {
        const bounded = Number.isFinite(limit)
            ? Math.max(1, Math.floor(limit))
            : this.defaultLimit;

        try {
            return await this.store.listRecentReviews(movieId, bounded);
        }
        catch (error) {
            throw new IntakeError("QueryFailed", "Could not list reviews", {
                movieId,
                error: describeError(error),
            });
        }
    }
}

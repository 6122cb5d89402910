/**
 * Persistence Port Contract
 *
 * The store is an external collaborator. This core never defines a
 * schema; it only calls these operations.
 *
 * Implementations provide their own isolation. Each `createReview`
 * call is one atomic write.
 */

import type { Movie, Review } from "./Review.js";

/**
 * Movie row supplied by the seeder.
 */
export type SeedMovie = Movie;

/**
 * Review row supplied by the seeder.
 */
export interface SeedReview {
    readonly movieId: number;
    readonly text: string;
    readonly isPositive: boolean;
}

/**
 * Result of a seeding attempt.
 */
export interface SeedOutcome {
    /** False when the store already held data and nothing was written */
    readonly seeded: boolean;

    /** Movies written */
    readonly movies: number;

    /** Reviews written */
    readonly reviews: number;
}

/**
 * PersistencePort interface.
 *
 * @example
 * ```typescript
 * const id = await store.createReview(3, "Loved every minute of it", true);
 * const total = await store.countReviews(3);
 * ```
 */
export interface PersistencePort {
    /**
     * Append a review.
     *
     * @returns The store-assigned review id
     */
    createReview(movieId: number, text: string, isPositive: boolean): Promise<number>;

    /** Count all reviews of a movie */
    countReviews(movieId: number): Promise<number>;

    /** Count the positive reviews of a movie */
    countPositiveReviews(movieId: number): Promise<number>;

    /**
     * Most recent reviews of a movie, newest first by id.
     *
     * @param limit - Maximum number of reviews returned
     */
    listRecentReviews(movieId: number, limit: number): Promise<readonly Review[]>;

    /** All movies, ordered by id */
    listMovies(): Promise<readonly Movie[]>;

    /**
     * Write the given data only if the store holds no movies.
     */
    seedIfEmpty(movies: readonly SeedMovie[], reviews: readonly SeedReview[]): Promise<SeedOutcome>;

    /**
     * Release resources. Optional.
     */
    close?(): void | Promise<void>;
}

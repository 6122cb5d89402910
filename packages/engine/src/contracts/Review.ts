/**
 * Review Contract
 *
 * The records that flow through the intake core. Movies and reviews
 * are owned by the persistence store; this core only reads movies and
 * appends reviews.
 *
 * Records are immutable. A review's sentiment flag is the one the
 * classifier produced when the review was submitted.
 */

/**
 * A movie as stored.
 */
export interface Movie {
    /** Store identifier */
    readonly id: number;

    /** Unique display name */
    readonly name: string;

    /** Free-text description */
    readonly description: string;
}

/**
 * A persisted review.
 */
export interface Review {
    /** Store-assigned identifier; higher means newer */
    readonly id: number;

    /** Referenced movie (not checked for existence) */
    readonly movieId: number;

    /** Review text as submitted */
    readonly text: string;

    /** Sentiment flag produced by the classifier */
    readonly isPositive: boolean;
}

/**
 * Freshness tier shown next to a score.
 */
export type FreshnessRating = "unrated" | "certified_hot" | "fresh" | "rotten";

/**
 * Derived, never stored.
 */
export interface ScoreSnapshot {
    /** Number of reviews for the movie */
    readonly totalReviews: number;

    /** Number of those flagged positive */
    readonly positiveCount: number;

    /** positive / total * 100, two decimals; 0 when there are no reviews */
    readonly score: number;

    /** Tier derived from the score */
    readonly rating: FreshnessRating;
}

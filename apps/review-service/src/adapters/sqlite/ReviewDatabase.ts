/**
 * SQLite Review Store
 *
 * Persistence port backed by a local SQLite database (better-sqlite3).
 * The schema is created on first open.
 *
 * Every write is a single statement; seeding runs in one transaction.
 */

import Database from "better-sqlite3";
import type {
    Movie,
    PersistencePort,
    Review,
    SeedMovie,
    SeedOutcome,
    SeedReview,
} from "@review-intake/engine";

/**
 * Raw movie row from the database
 */
interface MovieRow {
    id: number;
    name: string;
    description: string;
}

/**
 * Raw review row from the database
 */
interface ReviewRow {
    id: number;
    movie_id: number;
    review: string;
    is_positive: number;
}

const SCHEMA = `
    CREATE TABLE IF NOT EXISTS movies (
        id          INTEGER PRIMARY KEY,
        name        TEXT NOT NULL UNIQUE,
        description TEXT NOT NULL DEFAULT ''
    );

    CREATE TABLE IF NOT EXISTS reviews (
        id          INTEGER PRIMARY KEY AUTOINCREMENT,
        movie_id    INTEGER NOT NULL,
        review      TEXT NOT NULL,
        is_positive INTEGER NOT NULL CHECK (is_positive IN (0, 1))
    );

    CREATE INDEX IF NOT EXISTS idx_reviews_movie ON reviews (movie_id, id);
`;

/**
 * Review store on SQLite
 *
 * @example
 * ```typescript
 * const store = new ReviewDatabase("reviews.db");
 * const id = await store.createReview(1, "Great fun", true);
 * store.close();
 * ```
 */
export class ReviewDatabase implements PersistencePort {
    private db: Database.Database | null = null;
    private readonly dbPath: string;

    /**
     * @param dbPath - Database file, or ":memory:"
     */
    constructor(dbPath: string) {
        this.dbPath = dbPath;
    }

    /**
     * Open the database connection and create the schema
     */
    open(): void {
        this.ensureOpen();
    }

    /**
     * Close the database connection
     */
    close(): void {
        if (this.db) {
            this.db.close();
            this.db = null;
        }
    }

    /**
     * Ensure database is open
     */
    private ensureOpen(): Database.Database {
        if (!this.db) {
            const db = new Database(this.dbPath);
            db.exec(SCHEMA);
            this.db = db;
        }
        return this.db;
    }

    async createReview(movieId: number, text: string, isPositive: boolean): Promise<number> {
        const db = this.ensureOpen();
        const stmt = db.prepare<[number, string, number]>(`
            INSERT INTO reviews (movie_id, review, is_positive)
            VALUES (?, ?, ?)
        `);
        const result = stmt.run(movieId, text, isPositive ? 1 : 0);
        return Number(result.lastInsertRowid);
    }

    async countReviews(movieId: number): Promise<number> {
        const db = this.ensureOpen();
        const row = db.prepare<[number], { total: number }>(`
            SELECT COUNT(*) AS total
            FROM reviews
            WHERE movie_id = ?
        `).get(movieId);
        return row?.total ?? 0;
    }

    async countPositiveReviews(movieId: number): Promise<number> {
        const db = this.ensureOpen();
        const row = db.prepare<[number], { total: number }>(`
            SELECT COUNT(*) AS total
            FROM reviews
            WHERE movie_id = ? AND is_positive = 1
        `).get(movieId);
        return row?.total ?? 0;
    }

    async listRecentReviews(movieId: number, limit: number): Promise<readonly Review[]> {
        const db = this.ensureOpen();
        const rows = db.prepare<[number, number], ReviewRow>(`
            SELECT id, movie_id, review, is_positive
            FROM reviews
            WHERE movie_id = ?
            ORDER BY id DESC
            LIMIT ?
        `).all(movieId, limit);
        return rows.map(row => this.rowToReview(row));
    }

    async listMovies(): Promise<readonly Movie[]> {
        const db = this.ensureOpen();
        return db.prepare<[], MovieRow>(`
            SELECT id, name, description
            FROM movies
            ORDER BY id ASC
        `).all();
    }

    async seedIfEmpty(movies: readonly SeedMovie[], reviews: readonly SeedReview[]): Promise<SeedOutcome> {
        const db = this.ensureOpen();

        const countMovies = db.prepare<[], { total: number }>("SELECT COUNT(*) AS total FROM movies");
        const insertMovie = db.prepare<[number, string, string]>(
            "INSERT INTO movies (id, name, description) VALUES (?, ?, ?)"
        );
        const insertReview = db.prepare<[number, string, number]>(
            "INSERT INTO reviews (movie_id, review, is_positive) VALUES (?, ?, ?)"
        );

        const seed = db.transaction((): SeedOutcome => {
            const existing = countMovies.get()?.total ?? 0;
            if (existing > 0) {
                return { seeded: false, movies: 0, reviews: 0 };
            }

            for (const movie of movies) {
                insertMovie.run(movie.id, movie.name, movie.description);
            }
            for (const review of reviews) {
                insertReview.run(review.movieId, review.text, review.isPositive ? 1 : 0);
            }

            return { seeded: true, movies: movies.length, reviews: reviews.length };
        });

        return seed();
    }

    /**
     * Convert a database row to a Review
     */
    private rowToReview(row: ReviewRow): Review {
        return {
            id        : row.id,
            movieId   : row.movie_id,
            text      : row.review,
            isPositive: row.is_positive === 1,
        };
    }
}

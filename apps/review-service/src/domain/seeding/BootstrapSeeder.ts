/**
 * @fileoverview Bootstrap Seeder
 *
 * Populates an empty review store from the bundled dataset at startup.
 * Running it against a store that already holds movies changes nothing.
 *
 * A failure is logged and reported; it never stops the service.
 *
 * @module domain/seeding/BootstrapSeeder
 */

import {
    IntakeError,
    describeError,
    type EventLogger,
    type PersistencePort,
} from "@review-intake/engine";
import type { SeedDataset } from "../../config/index.js";

/**
 * Outcome of a seeding run.
 */
export type SeedReport =
    | { readonly success: true; readonly seeded: boolean; readonly movies: number; readonly reviews: number }
    | { readonly success: false; readonly error: IntakeError };

/**
 * Seeder dependencies.
 */
export interface BootstrapSeederConfig {
    store: PersistencePort;
    logger: EventLogger;

    /** Reads the dataset; may throw */
    loadDataset: () => SeedDataset | Promise<SeedDataset>;
}

export class BootstrapSeeder {
    private readonly store: PersistencePort;
    private readonly logger: EventLogger;
    private readonly loadDataset: () => SeedDataset | Promise<SeedDataset>;

    constructor(config: BootstrapSeederConfig) {
        this.store = config.store;
        this.logger = config.logger;
        this.loadDataset = config.loadDataset;
    }

    /**
     * Seed the store if it is empty. Never rejects.
     */
    async run(): Promise<SeedReport> {
        let dataset: SeedDataset;
        try {
            dataset = await this.loadDataset();
        }
        catch (error) {
            return this.fail("Seed data could not be loaded", error);
        }

        try {
            const outcome = await this.store.seedIfEmpty(dataset.movies, dataset.reviews);

            if (outcome.seeded) {
                this.logger.info("Store seeded", { movies: outcome.movies, reviews: outcome.reviews });
            }
            else {
                this.logger.info("Seeding skipped: store not empty");
            }

            return { success: true, ...outcome };
        }
        catch (error) {
            return this.fail("Seed data could not be written", error);
        }
    }

    private fail(message: string, cause: unknown): SeedReport {
        const error = new IntakeError("SeedingFailed", message, { error: describeError(cause) });

        this.logger.error("Seeding failed", {
            error_kind: error.kind,
            reason    : message,
            error     : describeError(cause),
        });

        return { success: false, error };
    }
}

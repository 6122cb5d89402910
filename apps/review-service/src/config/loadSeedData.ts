/**
 * @fileoverview Seed Data Loader
 *
 * Loads the bootstrap dataset (movies and their reviews) from a YAML file.
 *
 * @module config/loadSeedData
 */

import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import type { SeedMovie, SeedReview } from "@review-intake/engine";

/**
 * Movies and reviews ready for PersistencePort.seedIfEmpty
 */
export interface SeedDataset {
    movies: SeedMovie[];
    reviews: SeedReview[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Load the seed dataset from a YAML file.
 *
 * @param filePath - Path to the seed.yml file
 * @throws Error if the file doesn't exist or is invalid
 *
 * @example
 * ```yaml
 * movies:
 *   - id: 1
 *     name: Paper Orbit
 *     description: Two kids build a rocket from cardboard.
 *     reviews:
 *       - text: Charming from start to finish.
 *         positive: true
 * ```
 */
export function loadSeedData(filePath: string): SeedDataset {
    if (!existsSync(filePath)) {
        throw new Error(`Seed data file not found: ${filePath}`);
    }

    const content = readFileSync(filePath, "utf-8");
    const parsed: unknown = parseYaml(content);

    if (!isRecord(parsed) || !Array.isArray(parsed.movies)) {
        throw new Error("Invalid seed file format: expected { movies: [...] }");
    }

    const movies: SeedMovie[] = [];
    const reviews: SeedReview[] = [];
    const seenIds = new Set<number>();
    const seenNames = new Set<string>();

    parsed.movies.forEach((raw: unknown, index: number) => {
        if (!isRecord(raw)) {
            throw new Error(`Invalid movie at index ${index}: expected a mapping`);
        }

        const { id, name, description } = raw;

        if (typeof id !== "number" || !Number.isInteger(id) || id < 1) {
            throw new Error(`Invalid movie at index ${index}: missing or invalid 'id'`);
        }

        if (typeof name !== "string" || name.trim() === "") {
            throw new Error(`Invalid movie at index ${index}: missing or invalid 'name'`);
        }

        if (description !== undefined && typeof description !== "string") {
            throw new Error(`Invalid movie at index ${index}: invalid 'description'`);
        }

        if (seenIds.has(id)) {
            throw new Error(`Invalid movie at index ${index}: duplicate id ${id}`);
        }

        if (seenNames.has(name)) {
            throw new Error(`Invalid movie at index ${index}: duplicate name '${name}'`);
        }

        seenIds.add(id);
        seenNames.add(name);
        movies.push({ id, name, description: description ?? "" });

        if (raw.reviews === undefined) {
            return;
        }

        if (!Array.isArray(raw.reviews)) {
            throw new Error(`Invalid movie at index ${index}: 'reviews' must be a list`);
        }

        raw.reviews.forEach((review: unknown, reviewIndex: number) => {
            if (!isRecord(review)) {
                throw new Error(`Invalid review ${reviewIndex} of movie at index ${index}: expected a mapping`);
            }

            const { text, positive } = review;

            if (typeof text !== "string" || text.trim() === "") {
                throw new Error(`Invalid review ${reviewIndex} of movie at index ${index}: missing or invalid 'text'`);
            }

            if (typeof positive !== "boolean") {
                throw new Error(`Invalid review ${reviewIndex} of movie at index ${index}: missing or invalid 'positive'`);
            }

            reviews.push({ movieId: id, text, isPositive: positive });
        });
    });

    return { movies, reviews };
}

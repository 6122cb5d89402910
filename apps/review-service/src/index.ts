/**
 * @fileoverview Review Service - Command-line Entry Point
 *
 * Usage:
 *   review-service status
 *   review-service movies
 *   review-service score <movieId>
 *   review-service reviews <movieId> [limit]
 *   review-service submit <movieId> <text...>
 *
 * Every command prints one JSON document on stdout.
 *
 * @module review-service
 */

// Load .env before any other imports that depend on environment variables
import "dotenv/config";

import { fileURLToPath } from "url";
import { describeError, isArtifactLoaded, isIntakeError } from "@review-intake/engine";
import { loadConfig } from "./config/index.js";
import { createReviewService, type ReviewService } from "./service.js";

const USAGE = "Usage: review-service [status|movies|score <id>|reviews <id> [limit]|submit <id> <text...>]";

/**
 * Result of one command: the document to print and the exit code.
 */
export interface CommandOutput {
    body: unknown;
    exitCode: number;
}

function parseId(value: string | undefined): number | null {
    if (!value || !/^\d+$/.test(value)) {
        return null;
    }
    return Number.parseInt(value, 10);
}

function usage(message: string): CommandOutput {
    return { body: { error: message, usage: USAGE }, exitCode: 2 };
}

/**
 * Run a single command against a started service.
 *
 * @param service - Running service
 * @param args - Command-line arguments, without node and script
 */
export async function runCommand(service: ReviewService, args: string[]): Promise<CommandOutput> {
    const [command = "status", ...rest] = args;

    switch (command) {
        case "status":
            return {
                body: {
                    model_loaded : isArtifactLoaded(service.artifact),
                    model_version: service.artifact.version,
                    ...(isArtifactLoaded(service.artifact)
                        ? { artifact_path: service.artifact.path }
                        : { reason: service.artifact.reason }),
                    seeding: service.seedReport.success
                        ? { seeded: service.seedReport.seeded, movies: service.seedReport.movies, reviews: service.seedReport.reviews }
                        : { error: service.seedReport.error.message, kind: service.seedReport.error.kind },
                },
                exitCode: 0,
            };

        case "movies":
            return { body: await service.movies(), exitCode: 0 };

        case "score": {
            const movieId = parseId(rest[0]);
            if (movieId === null) {
                return usage("score requires a numeric movie id");
            }
            return { body: { movie_id: movieId, ...(await service.score(movieId)) }, exitCode: 0 };
        }

        case "reviews": {
            const movieId = parseId(rest[0]);
            if (movieId === null) {
                return usage("reviews requires a numeric movie id");
            }
            const limit = rest[1] === undefined ? undefined : parseId(rest[1]);
            if (limit === null) {
                return usage("limit must be a positive integer");
            }
            return { body: await service.recentReviews(movieId, limit), exitCode: 0 };
        }

        case "submit": {
            const movieId = parseId(rest[0]);
            const text = rest.slice(1).join(" ");
            if (movieId === null || text.trim() === "") {
                return usage("submit requires a numeric movie id and review text");
            }

            const result = await service.submit(movieId, text);
            if (result.success) {
                return { body: result.review, exitCode: 0 };
            }
            return {
                body    : { error: result.error.message, kind: result.error.kind, details: result.error.details },
                exitCode: 1,
            };
        }

        default:
            return usage(`unknown command: ${command}`);
    }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
    const service = await createReviewService(loadConfig());

    try {
        const output = await runCommand(service, process.argv.slice(2));
        console.log(JSON.stringify(output.body, null, 2));
        process.exitCode = output.exitCode;
    }
    catch (error) {
        const body = isIntakeError(error)
            ? { error: error.message, kind: error.kind, details: error.details }
            : { error: describeError(error) };
        console.error(JSON.stringify(body, null, 2));
        process.exitCode = 1;
    }
    finally {
        await service.close();
    }
}

// Run if this is the main module
if (process.argv[1] === fileURLToPath(import.meta.url)) {
    main().catch((error: unknown) => {
        console.error("[FATAL] Failed to start review service:", error);
        process.exitCode = 1;
    });
}

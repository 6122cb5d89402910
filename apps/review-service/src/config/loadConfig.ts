/**
 * @fileoverview Service Configuration
 *
 * Reads the service configuration from environment variables. Missing or
 * invalid values fall back to defaults; nothing here throws.
 *
 * @module config/loadConfig
 */

import { dirname, join } from "path";
import { fileURLToPath } from "url";
import { isLogLevel, type LogLevel } from "@review-intake/engine";

/**
 * Seed dataset bundled with the service.
 */
export const DEFAULT_SEED_DATA_PATH = join(
    dirname(fileURLToPath(import.meta.url)),
    "..",
    "..",
    "config",
    "seed.yml"
);

/**
 * Service configuration
 */
export interface ServiceConfig {
    artifact: {
        /** Root of the artifact tree searched at startup */
        root: string;

        /** File marking an artifact directory */
        markerFile: string;

        /** Ancestor level whose directory name is the version tag (0 = the artifact directory) */
        versionDepth: number;
    };

    database: {
        /** SQLite file, or ":memory:" */
        path: string;
    };

    seed: {
        /** YAML dataset loaded by the bootstrap seeder */
        path: string;
    };

    logging: {
        level: LogLevel;
        name: string;
    };

    searchIndex: {
        /** Document endpoint; the remote sink is off when unset */
        endpoint?: string;
        apiKey?: string;
        timeoutMs: number;
    };

    catalog: {
        /** Default number of reviews returned by recentReviews */
        recentLimit: number;
    };
}

const positiveIntegerFromEnv = (value: string | undefined, fallback: number): number => {
    if (!value) {
        return fallback;
    }

    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) || parsed < 1 ? fallback : parsed;
};

const nonNegativeIntegerFromEnv = (value: string | undefined, fallback: number): number => {
    if (!value) {
        return fallback;
    }

    const parsed = Number.parseInt(value, 10);
    return Number.isNaN(parsed) || parsed < 0 ? fallback : parsed;
};

const stringFromEnv = (value: string | undefined, fallback: string): string => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : fallback;
};

const optionalStringFromEnv = (value: string | undefined): string | undefined => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
};

const logLevelFromEnv = (value: string | undefined, fallback: LogLevel): LogLevel => {
    const normalized = value?.trim().toLowerCase();
    return isLogLevel(normalized) ? normalized : fallback;
};

/**
 * Build the service configuration from an environment.
 *
 * @param env - Environment variables (default: process.env)
 *
 * @example
 * ```typescript
 * const config = loadConfig({ ARTIFACT_ROOT: "/srv/mlruns", LOG_LEVEL: "debug" });
 * config.artifact.root; // "/srv/mlruns"
 * ```
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    return {
        artifact: {
            root        : stringFromEnv(env.ARTIFACT_ROOT, "mlruns"),
            markerFile  : stringFromEnv(env.ARTIFACT_MARKER, "model.json"),
            versionDepth: nonNegativeIntegerFromEnv(env.ARTIFACT_VERSION_DEPTH, 1),
        },
        database: {
            path: stringFromEnv(env.DATABASE_PATH, "reviews.db"),
        },
        seed: {
            path: stringFromEnv(env.SEED_DATA_PATH, DEFAULT_SEED_DATA_PATH),
        },
        logging: {
            level: logLevelFromEnv(env.LOG_LEVEL, "info"),
            name : stringFromEnv(env.LOGGER_NAME, "review-intake"),
        },
        searchIndex: {
            endpoint : optionalStringFromEnv(env.SEARCH_INDEX_URL),
            apiKey   : optionalStringFromEnv(env.SEARCH_INDEX_API_KEY),
            timeoutMs: positiveIntegerFromEnv(env.SEARCH_INDEX_TIMEOUT_MS, 1000),
        },
        catalog: {
            recentLimit: positiveIntegerFromEnv(env.RECENT_REVIEWS_LIMIT, 5),
        },
    };
}

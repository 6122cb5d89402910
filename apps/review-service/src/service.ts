/**
 * @fileoverview Review Service
 *
 * Composition root. Wires configuration, the store, the emitter and the
 * resolved classifier into one immutable service value.
 *
 * Startup order:
 * 1. Build the emitter (console sink, plus the search-index sink when configured)
 * 2. Open the store and run the bootstrap seeder
 * 3. Resolve the classifier artifact (a missing model does not stop startup)
 *
 * @module service
 */

import {
    FanOutEmitter,
    ReviewCatalog,
    ReviewIntakePipeline,
    ScoreAggregator,
    ancestorVersionTag,
    createSink,
    resolveArtifact,
    type ArtifactLoader,
    type ClassifierArtifact,
    type EventLogger,
    type FetchFn,
    type Movie,
    type PersistencePort,
    type Review,
    type ScoreSnapshot,
    type Sink,
    type SinkConfig,
    type SubmissionResult,
} from "@review-intake/engine";
import { ReviewDatabase } from "./adapters/sqlite/index.js";
import { loadSeedData, type SeedDataset, type ServiceConfig } from "./config/index.js";
import { BootstrapSeeder, createLinearTextLoader, type SeedReport } from "./domain/index.js";

/**
 * Overridable collaborators, mainly for tests.
 */
export interface ReviewServiceDependencies {
    /** Store (default: ReviewDatabase at config.database.path) */
    store?: PersistencePort;

    /** Sinks (default: built from config) */
    sinks?: Sink[];

    /** Fetch used by the search-index sink */
    fetch?: FetchFn;

    /** Artifact loader (default: linear text model) */
    loadClassifier?: ArtifactLoader;

    /** Seed dataset source (default: YAML at config.seed.path) */
    loadDataset?: () => SeedDataset | Promise<SeedDataset>;
}

/**
 * The running service.
 */
export interface ReviewService {
    /** Classifier resolved at startup */
    readonly artifact: ClassifierArtifact;

    /** Outcome of the startup seeding run */
    readonly seedReport: SeedReport;

    readonly logger: EventLogger;

    submit(movieId: number, text: string): Promise<SubmissionResult>;
    score(movieId: number): Promise<ScoreSnapshot>;
    movies(): Promise<readonly Movie[]>;
    recentReviews(movieId: number, limit?: number): Promise<readonly Review[]>;

    /**
     * Flush pending events and close the store.
     */
    close(): Promise<void>;
}

/**
 * Sink configurations for a service configuration.
 */
export function sinkConfigs(config: ServiceConfig): SinkConfig[] {
    const sinks: SinkConfig[] = [{ kind: "console" }];

    if (config.searchIndex.endpoint) {
        sinks.push({
            kind     : "remote",
            endpoint : config.searchIndex.endpoint,
            timeoutMs: config.searchIndex.timeoutMs,
            apiKey   : config.searchIndex.apiKey,
        });
    }

    return sinks;
}

/**
 * Start the service.
 *
 * @param config - Service configuration
 * @param deps - Optional collaborators
 *
 * @example
 * ```typescript
 * const service = await createReviewService(loadConfig());
 * const result = await service.submit(1, "What a great film");
 * await service.close();
 * ```
 */
export async function createReviewService(
    config: ServiceConfig,
    deps: ReviewServiceDependencies = {}
): Promise<ReviewService> {
    const logger = new FanOutEmitter({
        name    : config.logging.name,
        minLevel: config.logging.level,
        sinks   : deps.sinks ?? sinkConfigs(config).map(sinkConfig => createSink(sinkConfig, deps.fetch)),
    });

    const store = deps.store ?? new ReviewDatabase(config.database.path);

    const seeder = new BootstrapSeeder({
        store,
        logger     : logger.child(`${config.logging.name}.seed`),
        loadDataset: deps.loadDataset ?? (() => loadSeedData(config.seed.path)),
    });
    const seedReport = await seeder.run();

    const artifact = await resolveArtifact({
        root          : config.artifact.root,
        markerFile    : config.artifact.markerFile,
        loadClassifier: deps.loadClassifier ?? createLinearTextLoader(config.artifact.markerFile),
        versionTag    : ancestorVersionTag(config.artifact.versionDepth),
        logger        : logger.child(`${config.logging.name}.artifact`),
    });

    const pipeline = new ReviewIntakePipeline({
        artifact,
        store,
        logger: logger.child(`${config.logging.name}.pipeline`),
    });
    const aggregator = new ScoreAggregator(store, logger.child(`${config.logging.name}.score`));
    const catalog = new ReviewCatalog(store, config.catalog.recentLimit);

    return Object.freeze({
        artifact,
        seedReport,
        logger,
        submit       : (movieId: number, text: string) => pipeline.submit(movieId, text),
        score        : (movieId: number) => aggregator.score(movieId),
        movies       : () => catalog.movies(),
        recentReviews: (movieId: number, limit?: number) => catalog.recentReviews(movieId, limit),
        close        : async () => {
            await logger.flush();
            await store.close?.();
        },
    });
}

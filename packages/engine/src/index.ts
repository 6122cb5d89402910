/**
 * @fileoverview Review Intake Engine
 *
 * Classification, persistence and observability core for movie review
 * intake.
 *
 * The engine provides:
 * - Artifact resolution at startup, with a degraded "unavailable" state
 * - A submit pipeline: classify, persist, report
 * - Freshness scores and review listings over a persistence port
 * - A fan-out event emitter with console and search-index sinks
 *
 * @module @review-intake/engine
 * @example
 * ```typescript
 * import {
 *     FanOutEmitter,
 *     ReviewIntakePipeline,
 *     ScoreAggregator,
 *     resolveArtifact,
 * } from "@review-intake/engine";
 *
 * const logger = new FanOutEmitter({ name: "review-intake" });
 * const artifact = await resolveArtifact({ root: "mlruns", markerFile: "model.json", loadClassifier, logger });
 * const pipeline = new ReviewIntakePipeline({ artifact, store, logger });
 * ```
 */

// ============================================================================
// Contract exports
// ============================================================================

// Records
export type {
    Movie,
    Review,
    FreshnessRating,
    ScoreSnapshot,
} from "./contracts/index.js";

// Persistence port
export type {
    PersistencePort,
    SeedMovie,
    SeedReview,
    SeedOutcome,
} from "./contracts/index.js";

// Classifier port
export type {
    ClassifierPort,
    Prediction,
    PredictionSuccess,
    PredictionFailure,
} from "./contracts/index.js";
export {
    isPositiveLabel,
    createPrediction,
    createPredictionFailure,
} from "./contracts/index.js";

// Classifier artifact
export type {
    ClassifierArtifact,
    LoadedArtifact,
    UnavailableArtifact,
    VersionTagResolver,
    ArtifactLoader,
} from "./contracts/index.js";
export {
    UNKNOWN_VERSION,
    isArtifactLoaded,
    unavailableArtifact,
} from "./contracts/index.js";

// Errors and results
export type {
    IntakeErrorKind,
    SubmittedReview,
    SubmissionResult,
} from "./contracts/index.js";
export {
    IntakeError,
    isIntakeError,
    describeError,
} from "./contracts/index.js";

// Events and sinks
export type {
    LogLevel,
    LogEvent,
    EventFields,
    EventLogger,
    Sink,
    SinkConfig,
} from "./contracts/index.js";
export {
    LOG_LEVEL_PRIORITY,
    RESERVED_FIELDS,
    isLogLevel,
    sanitizeFields,
    createLogEvent,
    toEventDocument,
} from "./contracts/index.js";

// ============================================================================
// Implementation exports
// ============================================================================

export {
    ConsoleSink,
    MemorySink,
    RemoteSink,
    DEFAULT_REMOTE_TIMEOUT_MS,
    FanOutEmitter,
    createSink,
    type RemoteSinkConfig,
    type FetchFn,
    type FanOutEmitterConfig,
} from "./impl/index.js";

// ============================================================================
// Artifact exports
// ============================================================================

export {
    findArtifactDirectory,
    ancestorVersionTag,
    resolveArtifact,
    type ResolveArtifactOptions,
} from "./artifacts/index.js";

// ============================================================================
// Engine exports
// ============================================================================

export {
    ReviewIntakePipeline,
    COMMITTED_EVENT_FIELDS,
    ScoreAggregator,
    RATING_THRESHOLDS,
    freshnessPercentage,
    freshnessRating,
    ReviewCatalog,
    DEFAULT_RECENT_LIMIT,
    type IntakePipelineConfig,
    type SubmissionStage,
} from "./engine/index.js";

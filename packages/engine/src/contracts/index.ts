/**
 * @fileoverview Contract barrel exports
 *
 * All interfaces and types that define the review intake contract.
 *
 * @module @review-intake/engine/contracts
 */

// Records
export type {
    Movie,
    Review,
    FreshnessRating,
    ScoreSnapshot,
} from "./Review.js";

// Persistence port
export type {
    PersistencePort,
    SeedMovie,
    SeedReview,
    SeedOutcome,
} from "./PersistencePort.js";

// Classifier port
export type {
    ClassifierPort,
    Prediction,
    PredictionSuccess,
    PredictionFailure,
} from "./ClassifierPort.js";
export {
    isPositiveLabel,
    createPrediction,
    createPredictionFailure,
} from "./ClassifierPort.js";

// Classifier artifact
export type {
    ClassifierArtifact,
    LoadedArtifact,
    UnavailableArtifact,
    VersionTagResolver,
    ArtifactLoader,
} from "./ClassifierArtifact.js";
export {
    UNKNOWN_VERSION,
    isArtifactLoaded,
    unavailableArtifact,
} from "./ClassifierArtifact.js";

// Errors and results
export type {
    IntakeErrorKind,
    SubmittedReview,
    SubmissionResult,
} from "./IntakeError.js";
export {
    IntakeError,
    isIntakeError,
    describeError,
} from "./IntakeError.js";

// Events and sinks
export type {
    LogLevel,
    LogEvent,
    EventFields,
    EventLogger,
    Sink,
    SinkConfig,
} from "./EventSink.js";
export {
    LOG_LEVEL_PRIORITY,
    RESERVED_FIELDS,
    isLogLevel,
    sanitizeFields,
    createLogEvent,
    toEventDocument,
} from "./EventSink.js";

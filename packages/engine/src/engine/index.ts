/**
 * @fileoverview Engine barrel exports
 *
 * @module @review-intake/engine/engine
 */

export {
    ReviewIntakePipeline,
    COMMITTED_EVENT_FIELDS,
    type IntakePipelineConfig,
    type SubmissionStage,
} from "./ReviewIntakePipeline.js";
export {
    ScoreAggregator,
    RATING_THRESHOLDS,
    freshnessPercentage,
    freshnessRating,
} from "./ScoreAggregator.js";
export {
    ReviewCatalog,
    DEFAULT_RECENT_LIMIT,
} from "./ReviewCatalog.js";

/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    DEFAULT_SEED_DATA_PATH,
    type ServiceConfig,
} from "./loadConfig.js";
export {
    loadSeedData,
    type SeedDataset,
} from "./loadSeedData.js";

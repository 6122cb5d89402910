/**
 * @fileoverview Domain barrel exports
 *
 * @module domain
 */

export {
    LinearTextModel,
    LINEAR_TEXT_FORMAT,
    parseLinearTextDefinition,
    loadLinearTextModel,
    createLinearTextLoader,
    type LinearTextDefinition,
    type VocabularyEntry,
} from "./model/LinearTextModel.js";
export {
    BootstrapSeeder,
    type BootstrapSeederConfig,
    type SeedReport,
} from "./seeding/BootstrapSeeder.js";

/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadTaxonomy,
    loadExamples,
    readYamlFile,
    validateConfig,
} from "./loadTaxonomy.js";

export { loadPatterns } from "./loadPatterns.js";

export {
    loadSettings,
    kDEFAULT_CONFIG_DIR,
    type Settings,
    type ModelEndpoint,
    type StoreSettings,
} from "./settings.js";

/**
 * @fileoverview Configuration barrel exports
 *
 * @module config
 */

export {
    loadConfig,
    parseConfig,
    buildTargets,
    resolvePath,
    DEFAULT_FETCH_SETTINGS,
    type RuleboardConfig,
    type TargetConfig,
    type ReportConfig,
    type FetchSettings,
    type NormalizeSettings,
} from "./loadConfig.js";

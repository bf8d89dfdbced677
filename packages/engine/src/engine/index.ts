/**
 * @fileoverview Engine barrel exports
 *
 * @module @ruleboard/engine/engine
 */

export {
    RuleboardPipeline,
    type PipelineConfig,
    type RunSummary,
    type SourceReport,
    type SourceStatus,
} from "./RuleboardPipeline.js";
export { mapWithConcurrency } from "./pool.js";

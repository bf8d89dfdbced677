/**
 * @fileoverview Provider barrel exports
 *
 * @module providers
 */

export {
    HttpSourceFetcher,
    unwrapScriptHubUrl,
    type FetchFunction,
    type HttpSourceFetcherConfig,
} from "./HttpSourceFetcher.js";

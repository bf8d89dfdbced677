/**
 * SourceFetcher Contract
 *
 * Fetchers are the pipeline's only contact with the outside world.
 * The pipeline asks for one document per configured source.
 *
 * Design principles:
 * - Total: fetch() resolves for every source, failures become documents
 * - Independent: no state shared between two fetch() calls
 * - Bounded: every network call carries a timeout
 */

import type { RawDocument, RuleSource } from "./RuleSource.js";

/**
 * SourceFetcher interface.
 *
 * @example
 * ```typescript
 * class FileFetcher implements SourceFetcher {
 *     readonly id = "file-fetcher";
 *
 *     async fetch(source: RuleSource): Promise<RawDocument> {
 *         try {
 *             const body = await readFile(source.urls[0], "utf-8");
 *             return { source, body, fetchedAt: new Date(), status: "success" };
 *         }
 *         catch (error) {
 *             return createFailedDocument(source, String(error));
 *         }
 *     }
 * }
 * ```
 */
export interface SourceFetcher {
    /** Unique identifier for this fetcher */
    readonly id: string;

    /**
     * Retrieve the document for a source.
     *
     * Must not reject: network errors, timeouts and non-success
     * statuses resolve to a document with status "failure".
     */
    fetch(source: RuleSource): Promise<RawDocument>;
}

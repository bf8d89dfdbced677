/**
 * @fileoverview Line helpers shared by format handlers and the detector.
 *
 * @module @ruleboard/engine/formats/lines
 */

import { isCommentLine } from "../contracts/Format.js";

/**
 * Split a document into lines, accepting LF and CRLF endings.
 */
export function splitLines(body: string): string[] {
    return body.split(/\r?\n/);
}

/**
 * Drop a trailing `# comment` and surrounding whitespace.
 */
export function stripInlineComment(line: string): string {
    const hash = line.indexOf("#");
    return (hash === -1 ? line : line.slice(0, hash)).trim();
}

/**
 * Trimmed lines that are neither blank nor comments.
 */
export function candidateLines(body: string): string[] {
    const result: string[] = [];
    for (const raw of splitLines(body)) {
        const line = raw.trim();
        if (line && !isCommentLine(line)) {
            result.push(line);
        }
    }
    return result;
}

/**
 * @fileoverview Atomic file replacement
 *
 * Writes to a temporary file beside the destination, then renames it
 * over the destination. Readers see either the previous file or the
 * complete new one.
 *
 * @module @ruleboard/engine/emit/atomicWrite
 */

import { mkdir, rename, rm, writeFile } from "fs/promises";
import { basename, dirname, join } from "path";
import { randomUUID } from "crypto";
import { WriteError, errorMessage } from "../contracts/errors.js";

/**
 * Replace a file's content atomically. Creates missing parent directories.
 *
 * @throws WriteError if the directory, temporary file or rename fails;
 *         the temporary file is removed and the destination is untouched
 */
export async function writeFileAtomic(destination: string, content: string): Promise<number> {
    const directory = dirname(destination);
    // Same directory as the destination, so rename stays on one filesystem
    const tempPath = join(directory, `.${basename(destination)}.${process.pid}.${randomUUID()}.tmp`);
    const data = Buffer.from(content, "utf-8");

    try {
        await mkdir(directory, { recursive: true });
        await writeFile(tempPath, data);
        await rename(tempPath, destination);
    }
    catch (error) {
        await rm(tempPath, { force: true });
        throw new WriteError(`Failed to write ${destination}: ${errorMessage(error)}`, destination, { cause: error });
    }

    return data.length;
}

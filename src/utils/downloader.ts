import fs from "fs";
import { Readable } from "stream";
import { pipeline } from "stream/promises";
import { WRITE_CHUNK_SIZE } from "../config.js";
import { ProgressStream, ProgressCallback } from "@utils/stream-utils.js";

/**
 * Write a response body to `dest`, truncating an existing file. Resolves with
 * the number of bytes written. A partially written file is removed before the
 * error is rethrown.
 */
export async function writeStreamToFile(source: Readable, dest: string, onProgress?: ProgressCallback): Promise<number> {
    const progressStream = new ProgressStream(onProgress);

    const writer = fs.createWriteStream(dest, {
        flags: "w",
        highWaterMark: WRITE_CHUNK_SIZE,
    });

    try {
        // pipeline closes every stream on success and failure alike
        await pipeline(source, progressStream, writer);
    } catch (error) {
        await fs.promises.rm(dest, { force: true });
        throw error;
    }

    return progressStream.transferred;
}

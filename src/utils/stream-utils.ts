import { Transform, TransformCallback } from "stream";

export type ProgressCallback = (transferred: number) => void;

/**
 * A pass-through stream that counts the bytes flowing through it
 */
export class ProgressStream extends Transform {
    private bytes = 0;

    constructor(private onProgress?: ProgressCallback) {
        super();
    }

    get transferred(): number {
        return this.bytes;
    }

    _transform(chunk: Buffer, encoding: BufferEncoding, callback: TransformCallback): void {
        this.bytes += chunk.length;
        this.onProgress?.(this.bytes);
        callback(null, chunk);
    }
}

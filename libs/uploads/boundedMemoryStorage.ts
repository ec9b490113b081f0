import type { Request } from 'express';
import type { StorageEngine } from 'multer';

/**
 * multer storage that buffers a part only while it stays within `maxBytes`.
 * Larger parts are drained and counted, so `size` is the real length and
 * `buffer` is empty; the route decides what an oversized file means.
 */
export class BoundedMemoryStorage implements StorageEngine {
    constructor(private readonly maxBytes: number) {}

    public _handleFile(
        _req: Request,
        file: Express.Multer.File,
        callback: (error?: Error | null, info?: Partial<Express.Multer.File>) => void
    ): void {
        let chunks: Buffer[] = [];
        let size = 0;

        file.stream.on('data', (chunk: Buffer) => {
            size += chunk.length;
            if (size <= this.maxBytes) {
                chunks.push(chunk);
            } else if (chunks.length > 0) {
                chunks = [];
            }
        });
        file.stream.on('error', (error: Error) => callback(error));
        file.stream.on('end', () => {
            callback(null, {
                size,
                buffer: size <= this.maxBytes ? Buffer.concat(chunks) : Buffer.alloc(0),
            });
        });
    }

    public _removeFile(
        _req: Request,
        file: Express.Multer.File,
        callback: (error: Error | null) => void
    ): void {
        file.buffer = Buffer.alloc(0);
        callback(null);
    }
}

import crypto from 'crypto';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { logger } from '../logging/logger.js';

export interface FileStore {
    /**
     * Persist `content` and return the generated stored name.
     */
    save(extension: string, content: Buffer): Promise<string>;
}

/**
 * Stores uploads under a random UUID name in one directory.
 */
export class DiskFileStore implements FileStore {
    constructor(readonly directory: string) { }

    public async save(extension: string, content: Buffer): Promise<string> {
        const storedName = `${crypto.randomUUID()}${extension}`;

        await mkdir(this.directory, { recursive: true });
        await writeFile(path.join(this.directory, storedName), content);

        logger.info({ storedName, size: content.length }, 'Upload stored');
        return storedName;
    }
}

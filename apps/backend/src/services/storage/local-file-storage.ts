import path from 'path';
import fs from 'fs/promises';
import { constants as fsConstants } from 'fs';
import type { IFileStorage, IStoredFile } from './file-storage.js';

/**
 * Local filesystem storage.
 *
 * Stores files flat in one directory, e.g. `static/uploads/media`, which the
 * Express static middleware serves under `/static`. URLs are built from a
 * configured public prefix such as `http://localhost:8000/static/uploads/media`.
 *
 * @example
 * const storage = new LocalFileStorage('static/uploads/media', 'http://localhost:8000/static/uploads/media');
 * const stored = await storage.save(buffer, '0b6f...e1.png');
 * // stored.url === 'http://localhost:8000/static/uploads/media/0b6f...e1.png'
 */
export class LocalFileStorage implements IFileStorage {
    private readonly baseDir: string;
    private readonly urlPrefix: string;

    /**
     * @param baseDir - Directory files are written to, relative to the working directory or absolute
     * @param urlPrefix - Public URL of that directory
     */
    constructor(baseDir: string, urlPrefix: string) {
        this.baseDir = path.resolve(baseDir);
        this.urlPrefix = urlPrefix.replace(/\/+$/, '');
    }

    async prepare(): Promise<void> {
        try {
            await fs.mkdir(this.baseDir, { recursive: true });
        } catch (error) {
            throw new Error(
                `Failed to create upload directory: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }
    }

    async save(file: Buffer, filename: string): Promise<IStoredFile> {
        const filePath = this.resolve(filename);

        try {
            await fs.writeFile(filePath, file);
        } catch (error) {
            // Drop a partially written file
            await fs.rm(filePath, { force: true });
            throw new Error(
                `Failed to write file to disk: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }

        return { filename, path: filePath, url: this.getUrl(filename) };
    }

    async delete(filename: string): Promise<boolean> {
        try {
            await fs.unlink(this.resolve(filename));
            return true;
        } catch (error) {
            if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
                return false;
            }
            throw new Error(
                `Failed to delete file: ${error instanceof Error ? error.message : 'Unknown error'}`
            );
        }
    }

    async isWritable(): Promise<boolean> {
        try {
            await fs.access(this.baseDir, fsConstants.W_OK);
            return true;
        } catch {
            return false;
        }
    }

    getUrl(filename: string): string {
        return `${this.urlPrefix}/${encodeURIComponent(filename)}`;
    }

    private resolve(filename: string): string {
        const resolved = path.resolve(this.baseDir, filename);
        if (path.dirname(resolved) !== this.baseDir) {
            throw new Error(`Invalid file name: ${filename}`);
        }
        return resolved;
    }
}

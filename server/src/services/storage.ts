import { readFile } from 'fs/promises';
import { basename, extname, isAbsolute, join, resolve } from 'path';
import { loadConfig } from '../config.js';

export interface StoredFile {
    filename: string;
    contentType: string;
    data: Buffer;
}

export interface StorageService {
    /** The stored thumbnail for an image, or null when none was rendered. */
    getThumbnail(imageId: number): Promise<StoredFile | null>;
    /** The file an image record points at, or null when it is gone from disk. */
    getOriginal(filePath: string): Promise<StoredFile | null>;
}

const mimeMap: Record<string, string> = {
    '.jpg': 'image/jpeg',
    '.jpeg': 'image/jpeg',
    '.png': 'image/png',
    '.webp': 'image/webp',
    '.tif': 'image/tiff',
    '.tiff': 'image/tiff',
    '.nef': 'image/x-nikon-nef',
    '.cr2': 'image/x-canon-cr2',
    '.dng': 'image/x-adobe-dng',
};

export function contentTypeFor(filename: string): string {
    return mimeMap[extname(filename).toLowerCase()] ?? 'application/octet-stream';
}

function isMissingFile(e: unknown): boolean {
    return e instanceof Error && 'code' in e && (e.code === 'ENOENT' || e.code === 'ENOTDIR');
}

// Local File System Storage (Node.js)
export class LocalStorageService implements StorageService {
    constructor(
        private readonly thumbnailsDir: string,
        private readonly archiveRoot: string,
    ) {}

    async getThumbnail(imageId: number): Promise<StoredFile | null> {
        return this.read(join(this.thumbnailsDir, `${imageId}.png`));
    }

    async getOriginal(filePath: string): Promise<StoredFile | null> {
        const path = isAbsolute(filePath) ? filePath : resolve(this.archiveRoot, filePath);
        return this.read(path);
    }

    private async read(path: string): Promise<StoredFile | null> {
        try {
            const data = await readFile(path);
            return { filename: basename(path), contentType: contentTypeFor(path), data };
        } catch (e) {
            if (isMissingFile(e)) return null;
            console.error(`[LocalStorage] Failed to read ${path}`, e);
            throw e;
        }
    }
}

export function getStorage(): StorageService {
    // Directories come from the environment on every call so tests can point them elsewhere
    const { thumbnailsDir, archiveRoot } = loadConfig();
    return new LocalStorageService(thumbnailsDir, archiveRoot);
}

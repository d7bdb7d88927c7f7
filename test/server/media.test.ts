import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import app from '../../server/src/app.js';
import { insertImage } from '../../server/src/services/images.js';
import { contentTypeFor } from '../../server/src/services/storage.js';
import { rawImage } from './fixtures.js';

describe('media routes', () => {
    let root: string;

    beforeEach(async () => {
        root = await mkdtemp(join(tmpdir(), 'archive-media-'));
        await mkdir(join(root, 'thumbnails'));
        await mkdir(join(root, 'raw'));
        await writeFile(join(root, 'thumbnails', '1.png'), Buffer.from([0x89, 0x50, 0x4e, 0x47]));
        await writeFile(join(root, 'raw', 'DSC_0001.NEF'), 'raw bytes');
        vi.stubEnv('THUMBNAILS_DIR', join(root, 'thumbnails'));
        vi.stubEnv('ARCHIVE_ROOT', root);
    });

    afterEach(async () => {
        await rm(root, { recursive: true, force: true });
    });

    it('serves stored thumbnails', async () => {
        const res = await app.request('/media/thumbnails/1');
        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('image/png');
        expect(new Uint8Array(await res.arrayBuffer())).toEqual(new Uint8Array([0x89, 0x50, 0x4e, 0x47]));
    });

    it('answers 404 for a missing thumbnail', async () => {
        const res = await app.request('/media/thumbnails/2');
        expect(res.status).toBe(404);
    });

    it('serves the original inline, resolving relative paths against the archive root', async () => {
        await insertImage(rawImage(1));
        const res = await app.request('/media/images/1');
        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('image/x-nikon-nef');
        expect(res.headers.get('content-disposition')).toBe('inline; filename="DSC_0001.NEF"');
        expect(await res.text()).toBe('raw bytes');
    });

    it('offers the original as a download', async () => {
        await insertImage(rawImage(1, { filePath: join(root, 'raw', 'DSC_0001.NEF') }));
        const res = await app.request('/media/images/1?download=1');
        expect(res.headers.get('content-disposition')).toBe('attachment; filename="DSC_0001.NEF"');
    });

    it('answers 404 for unknown images and files gone from disk', async () => {
        expect((await app.request('/media/images/5')).status).toBe(404);

        await insertImage(rawImage(2));
        const res = await app.request('/media/images/1');
        expect(res.status).toBe(404);
        expect(await res.text()).toBe('File not found on disk');
    });

    it('maps extensions to content types', () => {
        expect(contentTypeFor('photo.JPG')).toBe('image/jpeg');
        expect(contentTypeFor('scan.dng')).toBe('image/x-adobe-dng');
        expect(contentTypeFor('notes.bin')).toBe('application/octet-stream');
    });
});

import { describe, test, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import app from '../../server/src/app.js';
import { getImage, insertImage } from '../../server/src/services/images.js';
import { derivedImage, formRequest, rawImage } from './fixtures.js';

async function seedRaw(count: number) {
    for (let n = 1; n <= count; n++) {
        await insertImage(rawImage(n));
    }
}

describe('admin dashboard', () => {
    test('redirects the site root to the dashboard', async () => {
        const res = await app.request('/');
        expect(res.status).toBe(302);
        expect(res.headers.get('location')).toBe('/admin');
    });

    test('summarises the archive', async () => {
        await seedRaw(2);
        await insertImage(derivedImage(3, 1));

        const res = await app.request('/admin');
        expect(res.status).toBe(200);
        const page = await res.text();
        expect(page).toContain('<tr><th scope="row">Images</th><td>3</td></tr>');
        expect(page).toContain('<tr><th scope="row">Raw images</th><td>2</td></tr>');
        expect(page).toContain('<tr><th scope="row">Processed images</th><td>1</td></tr>');
        expect(page).not.toContain('Log out');
    });
});

describe('image list page', () => {
    test('explains an empty archive', async () => {
        const res = await app.request('/admin/images');
        expect(res.status).toBe(200);
        expect(await res.text()).toContain('<div class="banner info" role="status">No images found in the archive.</div>');
    });

    test('explains when filters match nothing', async () => {
        await seedRaw(3);
        const res = await app.request('/admin/images?filename=nothing-like-this');
        expect(await res.text()).toContain('<div class="banner info" role="status">No images match your filters.</div>');
    });

    test('explains a page past the end', async () => {
        await seedRaw(3);
        const res = await app.request('/admin/images?page=9');
        expect(await res.text()).toContain('<div class="banner info" role="status">No images on this page.</div>');
    });

    test('answers an enormous page number with an empty page', async () => {
        await seedRaw(1);
        const res = await app.request('/admin/images?page=1000000000000000000');
        expect(res.status).toBe(200);
        expect(await res.text()).toContain('<div class="banner info" role="status">No images on this page.</div>');
    });

    test('shows the last page with working pagination links', async () => {
        await seedRaw(45);
        const res = await app.request('/admin/images?page=3');
        const page = await res.text();

        expect(page).toContain('Page 3 of 3 (45 images)');
        expect(page).toContain('<a href="/admin/images/45">DSC_0045.NEF</a>');
        expect(page).not.toContain('<a href="/admin/images/40">');
        expect(page).toContain('<a href="/admin/images?page=1&amp;per_page=20">First</a>');
        expect(page).toContain('<a href="/admin/images?page=2&amp;per_page=20">Prev</a>');
        expect(page).toContain('<span class="disabled" aria-disabled="true">Next</span>');
        expect(page).toContain('<span class="disabled" aria-disabled="true">Last</span>');
    });

    test('keeps filters in pagination links', async () => {
        await seedRaw(45);
        const res = await app.request('/admin/images?is_raw=1&per_page=10');
        const page = await res.text();
        expect(page).toContain('Page 1 of 5 (45 images)');
        expect(page).toContain('<a href="/admin/images?is_raw=1&amp;page=2&amp;per_page=10">Next</a>');
        expect(page).toContain('<span class="disabled" aria-disabled="true">First</span>');
    });

    test('rejects an invalid query', async () => {
        const res = await app.request('/admin/images?per_page=0');
        expect(res.status).toBe(400);
        expect(await res.text()).toContain(
            '<div class="banner error" role="status">per_page: Number must be greater than or equal to 1</div>',
        );
    });
});

describe('image detail page', () => {
    beforeEach(async () => {
        await seedRaw(1);
    });

    test('shows every column, NULL for missing values', async () => {
        const res = await app.request('/admin/images/1');
        expect(res.status).toBe(200);
        const page = await res.text();
        expect(page).toContain('<tr><th scope="row">md5_checksum</th><td>00000000000000000000000000000001</td></tr>');
        expect(page).toContain('<tr><th scope="row">date_taken</th><td>NULL</td></tr>');
        expect(page).toContain('<tr><th scope="row">is_raw</th><td>Yes</td></tr>');
        expect(page).toContain('<a href="/admin/images/1?edit=1">Edit</a>');
        expect(page).not.toContain('<form method="post"');
    });

    test('lists derived images', async () => {
        await insertImage(derivedImage(2, 1));
        const page = await (await app.request('/admin/images/1')).text();
        expect(page).toContain('<li><a href="/admin/images/2">2: painting_2.jpg</a></li>');
    });

    test('shows an empty state for a missing image', async () => {
        const res = await app.request('/admin/images/999');
        expect(res.status).toBe(404);
        expect(await res.text()).toContain('No image with id 999 exists in the archive.');
    });

    test('offers inputs only for editable columns', async () => {
        const page = await (await app.request('/admin/images/1?edit=1')).text();
        expect(page).toContain('<form method="post" action="/admin/images/1">');
        expect(page).toContain('<input type="checkbox" name="is_raw" value="1" checked />');
        expect(page).toContain('name="date_taken"');
        expect(page).toContain('name="pipeline_version"');
        expect(page).not.toContain('name="md5_checksum"');
        expect(page).not.toContain('name="rotation_degrees"');
    });

    test('saves an edit and confirms it', async () => {
        const res = await app.request(
            '/admin/images/1',
            formRequest({ is_raw: '1', date_taken: '2024-05-01T09:30:00', order_in_batch: '2', pipeline_version: 'v0.2.0' }),
        );
        expect(res.status).toBe(302);
        expect(res.headers.get('location')).toBe('/admin/images/1?saved=1');

        const stored = await getImage(1);
        expect(stored).toMatchObject({
            dateTaken: '2024-05-01T09:30:00',
            orderInBatch: 2,
            pipelineVersion: 'v0.2.0',
            flashMissing: false,
        });

        const confirmation = await (await app.request('/admin/images/1?saved=1')).text();
        expect(confirmation).toContain('<div class="banner success" role="status">Image updated.</div>');
    });

    test('re-renders the form when a value is invalid', async () => {
        const res = await app.request('/admin/images/1', formRequest({ is_raw: '1', date_taken: 'yesterday' }));
        expect(res.status).toBe(400);
        const page = await res.text();
        expect(page).toContain('<div class="field-error">Expected a valid timestamp in the form YYYY-MM-DDTHH:MM:SS</div>');
        expect(page).toContain('value="yesterday"');

        const stored = await getImage(1);
        expect(stored?.dateTaken).toBeNull();
        expect(stored?.lastChanged).toBeNull();
    });

    test('re-renders the form when the edit breaks the raw/parent rule', async () => {
        const res = await app.request('/admin/images/1', formRequest({ date_taken: '2024-05-01T09:30:00' }));
        expect(res.status).toBe(400);
        expect(await res.text()).toContain('<div class="field-error">A processed image must reference a parent image</div>');
        expect((await getImage(1))?.isRaw).toBe(true);
    });
});

describe('ingest page', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await mkdtemp(join(tmpdir(), 'archive-admin-ingest-'));
        await writeFile(join(dir, 'one.NEF'), 'one');
        await writeFile(join(dir, 'two.NEF'), 'two');
        vi.stubEnv('RAW_DIR', dir);
    });

    afterEach(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    test('shows the default folder and its files', async () => {
        const page = await (await app.request('/admin/ingest')).text();
        expect(page).toContain(`<p>2 file(s) with extension .nef found in ${dir}.</p>`);
    });

    test('ingests a folder and reports the run', async () => {
        const res = await app.request('/admin/ingest', formRequest({ folder: dir }));
        expect(res.status).toBe(200);
        const page = await res.text();
        expect(page).toContain('<div class="banner success" role="status">Ingestion completed.</div>');
        expect(page).toContain('<tr><th scope="row">Inserted</th><td>2</td></tr>');
        expect(page).toContain('<tr><th scope="row">Duplicates skipped</th><td>0</td></tr>');
    });

    test('rejects a folder that does not exist', async () => {
        const res = await app.request('/admin/ingest', formRequest({ folder: join(dir, 'missing') }));
        expect(res.status).toBe(400);
        expect(await res.text()).toContain('<div class="banner error" role="status">Invalid folder.</div>');
    });
});

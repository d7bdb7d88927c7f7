import { Hono } from 'hono';
import { loadConfig } from '../config.js';
import { ValidationError, type FieldErrors } from '../errors.js';
import { stringFields } from '../lib/forms.js';
import type { AuthEnv } from '../middleware/auth.js';
import {
    countImages,
    getImage,
    hasActiveFilters,
    listDerivedImages,
    listImages,
    updateImage,
} from '../services/images.js';
import { countIngestableFiles, ingestRawImages, isDirectory } from '../services/ingest.js';
import { countPaintings } from '../services/paintings.js';
import { countRatings } from '../services/ratings.js';
import {
    formToImageEdit,
    imageEditFormSchema,
    imageListQuerySchema,
    ingestFormSchema,
    toFieldErrors,
    toImageFilters,
} from '../validation.js';
import { dashboardPage } from '../views/dashboard.js';
import {
    emptyListBanner,
    imageDetailPage,
    imageListPage,
    imageNotFoundPage,
} from '../views/images.js';
import { ingestPage } from '../views/ingest.js';
import type { Banner, PageOptions } from '../views/layout.js';
import { DEFAULT_RAW_EXTENSIONS } from '../../../shared/config.js';

const app = new Hono<AuthEnv>();

function pageOptions(): PageOptions {
    return { loggedIn: loadConfig().auth !== undefined };
}

// GET /admin - Archive overview
app.get('/', async (c) => {
    const summary = {
        images: await countImages(),
        paintings: await countPaintings(),
        ratings: await countRatings(),
    };
    return c.html(dashboardPage(summary, pageOptions()));
});

// GET /admin/images - Filtered, paginated listing
app.get('/images', async (c) => {
    const formValues = c.req.query();
    const parsed = imageListQuerySchema.safeParse(formValues);

    if (!parsed.success) {
        const banners: Banner[] = Object.entries(toFieldErrors(parsed.error)).map(([field, message]): Banner => ({
            kind: 'error',
            message: `${field}: ${message}`,
        }));
        return c.html(imageListPage({ formValues, banners }, pageOptions()), 400);
    }

    const query = parsed.data;
    const filters = toImageFilters(query);
    const result = await listImages(filters, { page: query.page, perPage: query.per_page });
    const banner = emptyListBanner(result, hasActiveFilters(filters));

    return c.html(imageListPage({ formValues, query, result, banners: banner ? [banner] : [] }, pageOptions()));
});

// GET /admin/images/:id - Detail, ?edit=1 for the edit form
app.get('/images/:id{[0-9]+}', async (c) => {
    const imageId = Number(c.req.param('id'));
    const image = await getImage(imageId);
    if (!image) return c.html(imageNotFoundPage(imageId, pageOptions()), 404);

    const banners: Banner[] = c.req.query('saved') === '1' ? [{ kind: 'success', message: 'Image updated.' }] : [];

    return c.html(
        imageDetailPage(
            {
                image,
                derived: await listDerivedImages(imageId),
                editMode: c.req.query('edit') === '1',
                banners,
            },
            pageOptions(),
        ),
    );
});

// POST /admin/images/:id - Save the edit form
app.post('/images/:id{[0-9]+}', async (c) => {
    const imageId = Number(c.req.param('id'));
    const image = await getImage(imageId);
    if (!image) return c.html(imageNotFoundPage(imageId, pageOptions()), 404);

    const submitted = stringFields(await c.req.parseBody());
    const derived = await listDerivedImages(imageId);

    const reject = (errors: FieldErrors, message: string) =>
        c.html(
            imageDetailPage(
                { image, derived, editMode: true, submitted, errors, banners: [{ kind: 'error', message }] },
                pageOptions(),
            ),
            400,
        );

    const parsed = imageEditFormSchema.safeParse(submitted);
    if (!parsed.success) {
        return reject(toFieldErrors(parsed.error), 'The image was not saved. Fix the highlighted fields.');
    }

    try {
        await updateImage(imageId, formToImageEdit(parsed.data));
    } catch (e) {
        if (e instanceof ValidationError) {
            console.warn(`[Admin] Rejected edit of image ${imageId}: ${e.message}`);
            return reject(e.fields, e.message);
        }
        throw e;
    }

    return c.redirect(`/admin/images/${imageId}?saved=1`);
});

// GET /admin/ingest - Ingestion form
app.get('/ingest', async (c) => {
    const { rawDir } = loadConfig();
    return c.html(
        ingestPage(
            {
                folder: rawDir,
                matchingFiles: await countIngestableFiles(rawDir),
                extensions: DEFAULT_RAW_EXTENSIONS,
                banners: [],
            },
            pageOptions(),
        ),
    );
});

// POST /admin/ingest - Ingest a folder of raw images
app.post('/ingest', async (c) => {
    const parsed = ingestFormSchema.safeParse(stringFields(await c.req.parseBody()));
    const folder = parsed.success ? parsed.data.folder : '';

    if (!parsed.success || !(await isDirectory(folder))) {
        return c.html(
            ingestPage(
                {
                    folder,
                    matchingFiles: 0,
                    extensions: DEFAULT_RAW_EXTENSIONS,
                    banners: [{ kind: 'error', message: 'Invalid folder.' }],
                },
                pageOptions(),
            ),
            400,
        );
    }

    const stats = await ingestRawImages({ paths: [folder] });
    return c.html(
        ingestPage(
            {
                folder,
                matchingFiles: await countIngestableFiles(folder),
                extensions: DEFAULT_RAW_EXTENSIONS,
                stats,
                banners: [{ kind: 'success', message: 'Ingestion completed.' }],
            },
            pageOptions(),
        ),
    );
});

export default app;

import { Hono } from 'hono';
import type { AuthEnv } from '../middleware/auth.js';
import { getImage } from '../services/images.js';
import { getStorage } from '../services/storage.js';

const app = new Hono<AuthEnv>();

function headerFilename(filename: string): string {
    return filename.replace(/[^\x20-\x7e]|["\\]/g, '_');
}

// GET /media/thumbnails/:id
app.get('/thumbnails/:id{[0-9]+}', async (c) => {
    const imageId = Number(c.req.param('id'));
    const file = await getStorage().getThumbnail(imageId);
    if (!file) return c.text('No thumbnail', 404);

    return new Response(file.data, {
        headers: {
            'Content-Type': file.contentType,
            'Cache-Control': 'private, max-age=86400', // Cache for 1 day
        },
    });
});

// GET /media/images/:id - Full file, ?download=1 forces a download
app.get('/images/:id{[0-9]+}', async (c) => {
    const imageId = Number(c.req.param('id'));
    const image = await getImage(imageId);
    if (!image) return c.text('Image not found', 404);

    const file = await getStorage().getOriginal(image.filePath);
    if (!file) return c.text('File not found on disk', 404);

    const disposition = c.req.query('download') === '1' ? 'attachment' : 'inline';
    return new Response(file.data, {
        headers: {
            'Content-Type': file.contentType,
            'Content-Disposition': `${disposition}; filename="${headerFilename(image.filename)}"`,
            'Cache-Control': 'private, max-age=86400',
        },
    });
});

export default app;

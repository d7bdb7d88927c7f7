import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AuthEnv } from '../middleware/auth.js';
import { NotFoundError } from '../errors.js';
import {
  deletePainting,
  getPainting,
  insertPainting,
  linkPaintingToImage,
  listPaintings,
  unlinkPaintingFromImage,
  updatePainting,
} from '../services/paintings.js';
import { linkImageSchema, newPaintingSchema, paintingPatchSchema, rejectInvalid } from '../validation.js';

const app = new Hono<AuthEnv>();

// GET /api/paintings
app.get('/', async (c) => {
  return c.json(await listPaintings());
});

// POST /api/paintings
app.post('/', zValidator('json', newPaintingSchema, rejectInvalid), async (c) => {
  const painting = await insertPainting(c.req.valid('json'));
  return c.json(painting, 201);
});

// GET /api/paintings/:id - With linked images and ratings
app.get('/:id{[0-9]+}', async (c) => {
  const paintingId = Number(c.req.param('id'));
  const painting = await getPainting(paintingId);
  if (!painting) throw new NotFoundError(`Painting ${paintingId} not found`);
  return c.json(painting);
});

// PATCH /api/paintings/:id
app.patch('/:id{[0-9]+}', zValidator('json', paintingPatchSchema, rejectInvalid), async (c) => {
  const painting = await updatePainting(Number(c.req.param('id')), c.req.valid('json'));
  return c.json(painting);
});

// DELETE /api/paintings/:id
app.delete('/:id{[0-9]+}', async (c) => {
  await deletePainting(Number(c.req.param('id')));
  return c.json({ success: true });
});

// POST /api/paintings/:id/images - Link an image
app.post('/:id{[0-9]+}/images', zValidator('json', linkImageSchema, rejectInvalid), async (c) => {
  const paintingId = Number(c.req.param('id'));
  const { imageId } = c.req.valid('json');
  await linkPaintingToImage(paintingId, imageId);
  return c.json({ paintingId, imageId }, 201);
});

// DELETE /api/paintings/:id/images/:imageId - Unlink an image
app.delete('/:id{[0-9]+}/images/:imageId{[0-9]+}', async (c) => {
  await unlinkPaintingFromImage(Number(c.req.param('id')), Number(c.req.param('imageId')));
  return c.json({ success: true });
});

export default app;

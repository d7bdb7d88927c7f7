import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AuthEnv } from '../middleware/auth.js';
import { getImage, insertImage, listDerivedImages, listImages, updateImage } from '../services/images.js';
import { NotFoundError } from '../errors.js';
import {
  imageListQuerySchema,
  imagePatchSchema,
  newImageSchema,
  parseOrReject,
  rejectInvalid,
  toImageFilters,
} from '../validation.js';

const app = new Hono<AuthEnv>();

// GET /api/images - Same filters and paging as the admin list
app.get('/', async (c) => {
  const query = parseOrReject(imageListQuerySchema, c.req.query());
  const result = await listImages(toImageFilters(query), { page: query.page, perPage: query.per_page });
  return c.json(result);
});

// POST /api/images - Register an image
app.post('/', zValidator('json', newImageSchema, rejectInvalid), async (c) => {
  const image = await insertImage(c.req.valid('json'));
  console.log(`[Images] ${c.var.user.name} registered image ${image.imageId}`);
  return c.json(image, 201);
});

// GET /api/images/:id
app.get('/:id{[0-9]+}', async (c) => {
  const imageId = Number(c.req.param('id'));
  const image = await getImage(imageId);
  if (!image) throw new NotFoundError(`Image ${imageId} not found`);
  return c.json(image);
});

// GET /api/images/:id/children - Images derived from this one
app.get('/:id{[0-9]+}/children', async (c) => {
  const imageId = Number(c.req.param('id'));
  if (!(await getImage(imageId))) throw new NotFoundError(`Image ${imageId} not found`);
  return c.json(await listDerivedImages(imageId));
});

// PATCH /api/images/:id - Allow-listed fields only
app.patch('/:id{[0-9]+}', zValidator('json', imagePatchSchema, rejectInvalid), async (c) => {
  const imageId = Number(c.req.param('id'));
  const image = await updateImage(imageId, c.req.valid('json'));
  return c.json(image);
});

export default app;

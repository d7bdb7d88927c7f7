import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { AuthEnv } from '../middleware/auth.js';
import { insertRating, listRatings } from '../services/ratings.js';
import { newRatingSchema, parseOrReject, ratingQuerySchema, rejectInvalid } from '../validation.js';

const app = new Hono<AuthEnv>();

// GET /api/ratings?paintingId=&imageId=
app.get('/', async (c) => {
  const filters = parseOrReject(ratingQuerySchema, c.req.query());
  return c.json(await listRatings(filters));
});

// POST /api/ratings
app.post('/', zValidator('json', newRatingSchema, rejectInvalid), async (c) => {
  const rating = await insertRating(c.req.valid('json'));
  return c.json(rating, 201);
});

export default app;

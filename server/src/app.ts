import { Hono } from 'hono';
import { logger } from 'hono/logger';
import { HTTPException } from 'hono/http-exception';
import { authMiddleware, type AuthEnv } from './middleware/auth.js';
import { ArchiveError, ValidationError } from './errors.js';
import { errorPage } from './views/error.js';

import adminRoutes from './routes/admin.js';
import authRoutes from './routes/auth.js';
import mediaRoutes from './routes/media.js';
import imageRoutes from './routes/images.js';
import paintingRoutes from './routes/paintings.js';
import ratingRoutes from './routes/ratings.js';

const app = new Hono<AuthEnv>();

if (process.env.NODE_ENV !== 'test') {
  app.use('*', logger());
}

app.get('/health', (c) => {
  return c.json({ status: 'ok', env: process.env.NODE_ENV || 'development' });
});

app.get('/', (c) => c.redirect('/admin'));

// Login and logout stay reachable without a session
app.route('/', authRoutes);

// Protect everything else
app.use('/admin/*', authMiddleware);
app.use('/media/*', authMiddleware);
app.use('/api/*', authMiddleware);

// Mount sub-apps
app.route('/admin', adminRoutes);
app.route('/media', mediaRoutes);
app.route('/api/images', imageRoutes);
app.route('/api/paintings', paintingRoutes);
app.route('/api/ratings', ratingRoutes);

function isApi(path: string): boolean {
  return path.startsWith('/api/');
}

app.notFound((c) => {
  if (isApi(c.req.path)) return c.json({ error: 'Not found' }, 404);
  return c.html(errorPage(404, `Nothing lives at ${c.req.path}.`), 404);
});

app.onError((err, c) => {
  if (err instanceof HTTPException) {
    if (isApi(c.req.path)) return c.json({ error: err.message }, err.status);
    return err.getResponse();
  }

  if (err instanceof ArchiveError) {
    if (err.status === 500) console.error(`[App Error] ${err.message}`);
    if (!isApi(c.req.path)) return c.html(errorPage(err.status, err.message), err.status);
    if (err instanceof ValidationError) {
      return c.json({ error: err.message, fields: err.fields }, err.status);
    }
    return c.json({ error: err.message }, err.status);
  }

  console.error(`[App Error] ${err.message}`);
  console.error(err.stack);
  if (isApi(c.req.path)) return c.json({ error: 'Internal Server Error', message: err.message }, 500);
  return c.html(errorPage(500, 'Internal Server Error'), 500);
});

export default app;

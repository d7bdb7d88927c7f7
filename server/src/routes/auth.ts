import { Hono } from 'hono';
import { deleteCookie, setSignedCookie } from 'hono/cookie';
import { createHash, timingSafeEqual } from 'crypto';
import { loadConfig } from '../config.js';
import { stringFields } from '../lib/forms.js';
import { SESSION_VALUE } from '../middleware/auth.js';
import { loginPage } from '../views/login.js';
import { SESSION_COOKIE } from '../../../shared/config.js';

const app = new Hono();

/** Only same-site paths are followed after login. */
function safeNext(next: string | undefined): string {
  if (!next || !next.startsWith('/') || next.startsWith('//') || next.includes('\\')) return '/admin';
  return next;
}

function passwordMatches(given: string, expected: string): boolean {
  const digest = (value: string) => createHash('sha256').update(value).digest();
  return timingSafeEqual(digest(given), digest(expected));
}

// GET /login
app.get('/login', (c) => {
  const next = safeNext(c.req.query('next'));
  if (!loadConfig().auth) return c.redirect(next);
  return c.html(loginPage(next));
});

// POST /login - Exchange the admin password for a session cookie
app.post('/login', async (c) => {
  const { auth } = loadConfig();
  const body = stringFields(await c.req.parseBody());
  const next = safeNext(body.next);
  if (!auth) return c.redirect(next);

  if (!passwordMatches(body.password ?? '', auth.password)) {
    console.warn('[Auth] Rejected admin login');
    return c.html(loginPage(next, 'Wrong password!'), 401);
  }

  await setSignedCookie(c, SESSION_COOKIE, SESSION_VALUE, auth.sessionSecret, {
    path: '/',
    httpOnly: true,
    sameSite: 'Lax',
  });
  console.log('[Auth] Admin logged in');
  return c.redirect(next);
});

// GET /logout
app.get('/logout', (c) => {
  deleteCookie(c, SESSION_COOKIE, { path: '/' });
  return c.redirect('/login');
});

export default app;

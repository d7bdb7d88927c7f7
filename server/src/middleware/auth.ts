import { createMiddleware } from 'hono/factory';
import { HTTPException } from 'hono/http-exception';
import { getSignedCookie } from 'hono/cookie';
import { loadConfig } from '../config.js';
import { SESSION_COOKIE } from '../../../shared/config.js';

// Identity available in Context
export interface AuthUser {
  name: string;
  role: 'admin';
}

export type AuthEnv = {
  Variables: {
    user: AuthUser;
  };
};

export const SESSION_VALUE = 'admin';

function wantsHtml(path: string): boolean {
  return !path.startsWith('/api/');
}

export const authMiddleware = createMiddleware<AuthEnv>(async (c, next) => {
  const { auth } = loadConfig();

  // 1. Local mode: no password configured, everyone is the archive admin
  if (!auth) {
    c.set('user', { name: 'admin@local', role: 'admin' });
    await next();
    return;
  }

  // 2. Password mode: a signed session cookie issued by POST /login
  const session = await getSignedCookie(c, auth.sessionSecret, SESSION_COOKIE);
  if (session !== SESSION_VALUE) {
    if (wantsHtml(c.req.path)) {
      const target = encodeURIComponent(c.req.path);
      return c.redirect(`/login?next=${target}`);
    }
    throw new HTTPException(401, { message: 'Unauthorized: admin login required' });
  }

  c.set('user', { name: 'admin', role: 'admin' });
  await next();
});

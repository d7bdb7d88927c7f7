import { html } from 'hono/html';
import { page, type Html } from './layout.js';

export function loginPage(next: string, error?: string): Html {
  return page(
    'Admin login',
    html`<form method="post" action="/login">
      <input type="hidden" name="next" value="${next}" />
      <label>Password <input type="password" name="password" autofocus /></label>
      <button type="submit">Log in</button>
    </form>`,
    { banners: error ? [{ kind: 'error', message: error }] : [] },
  );
}

import { html } from 'hono/html';
import { page, type Html } from './layout.js';

export function errorPage(status: number, message: string): Html {
  return page(
    status === 404 ? 'Not found' : 'Something went wrong',
    html`<div class="empty-state">
      <p>${message}</p>
      <p><a href="/admin">Back to the dashboard</a></p>
    </div>`,
    { banners: [{ kind: 'error', message: `Error ${status}` }] },
  );
}

import { html, raw } from 'hono/html';
import { TITLE } from '../../../shared/config.js';

export type Html = ReturnType<typeof html>;

export interface Banner {
  kind: 'info' | 'success' | 'warning' | 'error';
  message: string;
}

export interface PageOptions {
  banners?: Banner[];
  /** Shows the logout link when the admin logged in with a password. */
  loggedIn?: boolean;
}

const styles = `
  body { font-family: system-ui, sans-serif; margin: 0; color: #222; }
  header { display: flex; gap: 1rem; align-items: center; padding: 0.75rem 1.5rem; background: #2d3e50; color: #fff; }
  header a { color: #fff; text-decoration: none; }
  header .spacer { flex: 1; }
  main { padding: 1rem 1.5rem; }
  table { border-collapse: collapse; width: 100%; }
  th, td { border-bottom: 1px solid #ddd; padding: 0.35rem 0.5rem; text-align: left; vertical-align: middle; }
  th { background: #f3f3f3; }
  td.thumb img { max-height: 48px; }
  .banner { padding: 0.6rem 1rem; margin-bottom: 1rem; border-radius: 4px; }
  .banner.info { background: #e8f1fb; }
  .banner.success { background: #e6f6ea; }
  .banner.warning { background: #fff6dc; }
  .banner.error { background: #fbe9e9; }
  .filters { display: flex; flex-wrap: wrap; gap: 0.75rem; align-items: end; margin-bottom: 1rem; }
  .filters label { display: flex; flex-direction: column; font-size: 0.85rem; }
  .pagination { display: flex; gap: 0.5rem; align-items: center; margin-top: 1rem; }
  .pagination .disabled { color: #aaa; pointer-events: none; }
  .field-error { color: #b00020; font-size: 0.85rem; }
  .empty-state { padding: 2rem; text-align: center; color: #666; }
`;

export function renderBanner(banner: Banner): Html {
  return html`<div class="banner ${banner.kind}" role="status">${banner.message}</div>`;
}

export function page(title: string, body: Html, options: PageOptions = {}): Html {
  const banners = options.banners ?? [];
  return html`<!doctype html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <title>${title} · ${TITLE}</title>
    <style>${raw(styles)}</style>
  </head>
  <body>
    <header>
      <a href="/admin"><strong>${TITLE}</strong></a>
      <a href="/admin/images">Images</a>
      <a href="/admin/ingest">Ingest</a>
      <span class="spacer"></span>
      ${options.loggedIn ? html`<a href="/logout">Log out</a>` : ''}
    </header>
    <main>
      <h1>${title}</h1>
      ${banners.map(renderBanner)}
      ${body}
    </main>
  </body>
</html>`;
}

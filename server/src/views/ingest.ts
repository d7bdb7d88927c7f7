import { html } from 'hono/html';
import type { IngestStats } from '../services/ingest.js';
import { page, type Banner, type Html, type PageOptions } from './layout.js';

export interface IngestView {
  folder: string;
  matchingFiles: number;
  extensions: string[];
  stats?: IngestStats;
  banners: Banner[];
}

function statsTable(stats: IngestStats): Html {
  return html`<h2>Last run</h2>
    <table>
      <tbody>
        <tr><th scope="row">Paths given</th><td>${stats.totalPaths}</td></tr>
        <tr><th scope="row">Files scanned</th><td>${stats.scanned}</td></tr>
        <tr><th scope="row">Inserted</th><td>${stats.inserted}</td></tr>
        <tr><th scope="row">Duplicates skipped</th><td>${stats.duplicates}</td></tr>
        <tr><th scope="row">Invalid paths</th><td>${stats.invalidPaths}</td></tr>
      </tbody>
    </table>`;
}

export function ingestPage(view: IngestView, options: PageOptions = {}): Html {
  return page(
    'Ingest raw images',
    html`<p>${view.matchingFiles} file(s) with extension ${view.extensions.join(', ')} found in ${view.folder}.</p>
      <form method="post" action="/admin/ingest">
        <label>Folder <input type="text" name="folder" size="60" value="${view.folder}" /></label>
        <button type="submit">Ingest</button>
      </form>
      ${view.stats ? statsTable(view.stats) : ''}`,
    { ...options, banners: [...(options.banners ?? []), ...view.banners] },
  );
}

import { html } from 'hono/html';
import type { ImageTotals } from '../services/images.js';
import { page, type Html, type PageOptions } from './layout.js';

export interface ArchiveSummary {
  images: ImageTotals;
  paintings: number;
  ratings: number;
}

export function dashboardPage(summary: ArchiveSummary, options: PageOptions = {}): Html {
  return page(
    'Dashboard',
    html`<table>
        <tbody>
          <tr><th scope="row">Images</th><td>${summary.images.total}</td></tr>
          <tr><th scope="row">Raw images</th><td>${summary.images.raw}</td></tr>
          <tr><th scope="row">Processed images</th><td>${summary.images.processed}</td></tr>
          <tr><th scope="row">Paintings</th><td>${summary.paintings}</td></tr>
          <tr><th scope="row">Ratings</th><td>${summary.ratings}</td></tr>
        </tbody>
      </table>
      <ul>
        <li><a href="/admin/images">Browse and edit images</a></li>
        <li><a href="/admin/ingest">Ingest raw images</a></li>
      </ul>`,
    options,
  );
}

import { html } from 'hono/html';
import type { ImageRecord } from '../db/schema.js';
import type { FieldErrors } from '../errors.js';
import type { ImagePage } from '../services/images.js';
import type { ImageListQuery } from '../validation.js';
import { EDITABLE_IMAGE_COLUMNS, NULL_PLACEHOLDER, type EditableImageColumn } from '../../../shared/config.js';
import { page, type Banner, type Html, type PageOptions } from './layout.js';

type ImageValue = ImageRecord[keyof ImageRecord];

/** Every images column in schema order, with the record property holding it. */
export const IMAGE_COLUMNS: ReadonlyArray<{ column: string; key: keyof ImageRecord }> = [
  { column: 'image_id', key: 'imageId' },
  { column: 'filename', key: 'filename' },
  { column: 'file_path', key: 'filePath' },
  { column: 'md5_checksum', key: 'md5Checksum' },
  { column: 'is_raw', key: 'isRaw' },
  { column: 'parent_image_id', key: 'parentImageId' },
  { column: 'date_taken', key: 'dateTaken' },
  { column: 'order_in_batch', key: 'orderInBatch' },
  { column: 'pipeline_version', key: 'pipelineVersion' },
  { column: 'flash_missing', key: 'flashMissing' },
  { column: 'cropped', key: 'cropped' },
  { column: 'cropped_date', key: 'croppedDate' },
  { column: 'rotation_degrees', key: 'rotationDegrees' },
  { column: 'rotated_date', key: 'rotatedDate' },
  { column: 'last_changed', key: 'lastChanged' },
  { column: 'embedded_images', key: 'embeddedImages' },
];

const BOOLEAN_COLUMNS: ReadonlySet<string> = new Set(['is_raw', 'flash_missing', 'cropped']);

function isEditable(column: string): column is EditableImageColumn {
  return EDITABLE_IMAGE_COLUMNS.some((c) => c === column);
}

export function displayValue(value: ImageValue | undefined): string {
  if (value === null || value === undefined) return NULL_PLACEHOLDER;
  if (typeof value === 'boolean') return value ? 'Yes' : 'No';
  return String(value);
}

// ----------------------------------------------------------------------------
// List view
// ----------------------------------------------------------------------------

export interface PageLink {
  label: 'First' | 'Prev' | 'Next' | 'Last';
  page: number;
  disabled: boolean;
}

export function paginationLinks(current: number, totalPages: number): PageLink[] {
  const atStart = current <= 1;
  const atEnd = current >= totalPages;
  return [
    { label: 'First', page: 1, disabled: atStart },
    { label: 'Prev', page: Math.max(current - 1, 1), disabled: atStart },
    { label: 'Next', page: current + 1, disabled: atEnd },
    { label: 'Last', page: Math.max(totalPages, 1), disabled: atEnd },
  ];
}

function flagParam(value: boolean | undefined): string | undefined {
  if (value === undefined) return undefined;
  return value ? '1' : '0';
}

/** Link to another page of the list, keeping the active filters. */
export function listHref(query: ImageListQuery, targetPage: number): string {
  const params = new URLSearchParams();
  const filters: Array<[string, string | undefined]> = [
    ['filename', query.filename],
    ['date_from', query.date_from],
    ['date_to', query.date_to],
    ['is_raw', flagParam(query.is_raw)],
    ['cropped', flagParam(query.cropped)],
    ['rotated', flagParam(query.rotated)],
  ];
  for (const [name, value] of filters) {
    if (value !== undefined) params.set(name, value);
  }
  params.set('page', String(targetPage));
  params.set('per_page', String(query.per_page));
  return `/admin/images?${params.toString()}`;
}

function flagSelect(name: string, label: string, current: string | undefined): Html {
  const option = (value: string, text: string) =>
    html`<option value="${value}" ${current === value ? 'selected' : ''}>${text}</option>`;
  return html`<label>${label}
    <select name="${name}">${option('', 'Any')}${option('1', 'Yes')}${option('0', 'No')}</select>
  </label>`;
}

function filterForm(values: Record<string, string>): Html {
  return html`<form class="filters" method="get" action="/admin/images">
    <label>Filename <input type="text" name="filename" value="${values.filename ?? ''}" /></label>
    <label>Taken from <input type="text" name="date_from" placeholder="YYYY-MM-DD" value="${values.date_from ?? ''}" /></label>
    <label>Taken to <input type="text" name="date_to" placeholder="YYYY-MM-DD" value="${values.date_to ?? ''}" /></label>
    ${flagSelect('is_raw', 'Raw', values.is_raw)}
    ${flagSelect('cropped', 'Cropped', values.cropped)}
    ${flagSelect('rotated', 'Rotated', values.rotated)}
    <label>Per page <input type="number" name="per_page" min="1" value="${values.per_page ?? ''}" /></label>
    <button type="submit">Filter</button>
    <a href="/admin/images">Reset</a>
  </form>`;
}

function paginationControls(query: ImageListQuery, result: ImagePage): Html {
  const links = paginationLinks(result.page, result.totalPages);
  return html`<nav class="pagination" aria-label="Pagination">
    ${links.map((link) =>
      link.disabled
        ? html`<span class="disabled" aria-disabled="true">${link.label}</span>`
        : html`<a href="${listHref(query, link.page)}">${link.label}</a>`,
    )}
    <span>Page ${result.page} of ${result.totalPages} (${result.totalCount} images)</span>
  </nav>`;
}

function imageRow(image: ImageRecord): Html {
  return html`<tr>
    <td><a href="/admin/images/${image.imageId}">${image.imageId}</a></td>
    <td class="thumb"><img src="/media/thumbnails/${image.imageId}" alt="" loading="lazy" /></td>
    <td><a href="/admin/images/${image.imageId}">${image.filename}</a></td>
    <td><code>${image.md5Checksum}</code></td>
    <td>${displayValue(image.dateTaken)}</td>
    <td>${displayValue(image.isRaw)}</td>
    <td>${displayValue(image.cropped)}</td>
    <td>${displayValue(image.rotationDegrees)}</td>
    <td>${displayValue(image.pipelineVersion)}</td>
  </tr>`;
}

export interface ImageListView {
  /** Raw query values echoed back into the filter form. */
  formValues: Record<string, string>;
  query?: ImageListQuery;
  result?: ImagePage;
  banners: Banner[];
}

export function imageListPage(view: ImageListView, options: PageOptions = {}): Html {
  const { query, result } = view;
  const table =
    query && result && result.images.length > 0
      ? html`<table>
          <thead>
            <tr>
              <th>ID</th><th>Thumbnail</th><th>Filename</th><th>MD5</th><th>Date taken</th>
              <th>Raw</th><th>Cropped</th><th>Rotation</th><th>Pipeline</th>
            </tr>
          </thead>
          <tbody>${result.images.map(imageRow)}</tbody>
        </table>`
      : '';

  const body = html`${filterForm(view.formValues)} ${table}
    ${query && result ? paginationControls(query, result) : ''}`;

  return page('Images', body, { ...options, banners: [...(options.banners ?? []), ...view.banners] });
}

/** Informational banner for a page without rows, or none when rows exist. */
export function emptyListBanner(result: ImagePage, filtered: boolean): Banner | undefined {
  if (result.images.length > 0) return undefined;
  if (result.totalCount > 0) return { kind: 'info', message: 'No images on this page.' };
  return {
    kind: 'info',
    message: filtered ? 'No images match your filters.' : 'No images found in the archive.',
  };
}

// ----------------------------------------------------------------------------
// Detail view
// ----------------------------------------------------------------------------

function editInput(column: EditableImageColumn, value: string | boolean | null): Html {
  if (BOOLEAN_COLUMNS.has(column)) {
    return html`<input type="checkbox" name="${column}" value="1" ${value === true ? 'checked' : ''} />`;
  }
  const text = value === null || typeof value === 'boolean' ? '' : value;
  switch (column) {
    case 'date_taken':
      return html`<input type="text" name="date_taken" placeholder="YYYY-MM-DDTHH:MM:SS" value="${text}" />`;
    case 'order_in_batch':
      return html`<input type="number" name="order_in_batch" min="0" value="${text}" />`;
    case 'pipeline_version':
      return html`<input type="text" name="pipeline_version" placeholder="v0.1.0" value="${text}" />`;
    default:
      return html`<input type="text" name="${column}" value="${text}" />`;
  }
}

/** Value shown in an edit input: what was submitted, else what is stored. */
function editValue(column: EditableImageColumn, stored: ImageValue, submitted?: Record<string, string>): string | boolean | null {
  if (!submitted) {
    if (typeof stored === 'number') return String(stored);
    return stored;
  }
  const raw = submitted[column];
  if (BOOLEAN_COLUMNS.has(column)) return raw !== undefined && raw !== '' && raw !== '0';
  return raw ?? null;
}

export interface ImageDetailView {
  image: ImageRecord;
  derived: ImageRecord[];
  editMode: boolean;
  /** Form values from a rejected save. */
  submitted?: Record<string, string>;
  errors?: FieldErrors;
  banners: Banner[];
}

export function imageDetailPage(view: ImageDetailView, options: PageOptions = {}): Html {
  const { image, editMode, submitted } = view;
  const errors = view.errors ?? {};

  const rows = IMAGE_COLUMNS.map(({ column, key }) => {
    const stored = image[key];
    const cell =
      editMode && isEditable(column)
        ? html`${editInput(column, editValue(column, stored, submitted))}
            ${errors[column] ? html`<div class="field-error">${errors[column]}</div>` : ''}`
        : html`${displayValue(stored)}`;
    return html`<tr><th scope="row">${column}</th><td>${cell}</td></tr>`;
  });

  const table = html`<table class="detail">${rows}</table>`;

  const actions = editMode
    ? html`<p><button type="submit">Save</button> <a href="/admin/images/${image.imageId}">Cancel</a></p>`
    : html`<p>
        <a href="/admin/images/${image.imageId}?edit=1">Edit</a> ·
        <a href="/media/images/${image.imageId}">View full image</a> ·
        <a href="/media/images/${image.imageId}?download=1">Download</a> ·
        <a href="/admin/images">Back to list</a>
      </p>`;

  const derived =
    view.derived.length > 0
      ? html`<h2>Derived images</h2>
          <ul>
            ${view.derived.map((d) => html`<li><a href="/admin/images/${d.imageId}">${d.imageId}: ${d.filename}</a></li>`)}
          </ul>`
      : '';

  const body = html`<p><img src="/media/thumbnails/${image.imageId}" alt="Thumbnail of ${image.filename}" /></p>
    ${editMode
      ? html`<form method="post" action="/admin/images/${image.imageId}">${table}${actions}</form>`
      : html`${table}${actions}`}
    ${derived}`;

  return page(`Image ${image.imageId}`, body, { ...options, banners: [...(options.banners ?? []), ...view.banners] });
}

export function imageNotFoundPage(imageId: number | string, options: PageOptions = {}): Html {
  return page(
    `Image ${imageId}`,
    html`<div class="empty-state">
      <p>No image with id ${imageId} exists in the archive.</p>
      <p><a href="/admin/images">Back to list</a></p>
    </div>`,
    options,
  );
}

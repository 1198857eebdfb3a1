// HTML directory listing

export interface ListingEntry {
  name: string;
  isDirectory: boolean;
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

/**
 * Render an "Index of" page. Directories sort first and carry a trailing slash.
 */
export function renderDirectoryListing(segments: string[], entries: ListingEntry[]): string {
  const base = segments.length > 0 ? `/${segments.map(encodeURIComponent).join('/')}/` : '/';
  const title = `Index of ${escapeHtml(segments.length > 0 ? `/${segments.join('/')}/` : '/')}`;

  const sorted = [...entries].sort((a, b) => {
    if (a.isDirectory !== b.isDirectory) {
      return a.isDirectory ? -1 : 1;
    }
    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
  });

  const items = sorted.map((entry) => {
    const suffix = entry.isDirectory ? '/' : '';
    const href = `${base}${encodeURIComponent(entry.name)}${suffix}`;
    return `<li><a href="${escapeHtml(href)}">${escapeHtml(entry.name)}${suffix}</a></li>`;
  });

  if (segments.length > 0) {
    const parent =
      segments.length > 1 ? `/${segments.slice(0, -1).map(encodeURIComponent).join('/')}/` : '/';
    items.unshift(`<li><a href="${escapeHtml(parent)}">../</a></li>`);
  }

  return [
    '<!DOCTYPE html>',
    `<html><head><meta charset="utf-8"><title>${title}</title></head>`,
    `<body><h1>${title}</h1>`,
    `<ul>${items.join('')}</ul>`,
    '</body></html>',
  ].join('\n');
}

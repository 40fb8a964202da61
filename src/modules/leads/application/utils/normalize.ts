const PLACEHOLDERS = new Set(['', 'n/a', 'na', 'none', 'null', 'undefined', '-']);

const EMAIL_RE = /^[^\s@;,<>"]+@[^\s@;,<>"]+\.[^\s@;,<>"]+$/;

/** True for values that carry no information ("", "n/a", "-", whitespace, ...). */
export function isPlaceholder(v: unknown): boolean {
  if (v == null) return true;
  if (typeof v !== 'string') return false;
  return PLACEHOLDERS.has(v.trim().toLowerCase());
}

/** Keeps the value verbatim unless it is a placeholder; never trims. */
export function cleanText(v: unknown): string | null {
  if (v == null) return null;
  const s = typeof v === 'string' ? v : String(v);
  return isPlaceholder(s) ? null : s;
}

export function normalizeEmail(v?: unknown): string | null {
  if (typeof v !== 'string') return null;
  const email = v.trim().replace(/^mailto:/i, '').toLowerCase();
  if (!email) return null;
  return EMAIL_RE.test(email) ? email : null;
}

/**
 * Host of a website URL: lower-cased, without scheme, credentials, port,
 * path, `www.` prefix or trailing dot. Accepts bare hosts ("Example.org/").
 */
export function domainFromUrl(url: string | null | undefined): string | null {
  const raw = url?.trim();
  if (!raw || isPlaceholder(raw)) return null;

  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(raw) ? raw : `https://${raw}`;
  let host: string;
  try {
    host = new URL(withScheme).hostname;
  } catch {
    return null;
  }

  host = host.toLowerCase().replace(/\.$/, '');
  if (host.startsWith('www.')) host = host.slice(4);
  return host || null;
}

export function normalizeKey(input: string): string {
  return input
    .trim()
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/&/g, ' and ')
    .replace(/[^a-z0-9]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

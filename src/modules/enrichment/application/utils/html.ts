import * as cheerio from 'cheerio';

const BLOCK_TAGS = 'p, div, li, ul, ol, td, th, tr, table, h1, h2, h3, h4, h5, h6, section, article, header, footer, nav, address, form, blockquote';

export function loadHtml(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

/** Visible text of a page with entities decoded and whitespace collapsed. */
export function stripHtml(html: string): string {
  const $ = loadHtml(html);
  $('script, style, noscript, template').remove();
  $('br').replaceWith(' ');
  // keep words of adjacent blocks apart
  $(BLOCK_TAGS).each((_, el) => {
    $(el).prepend(' ').append(' ');
  });

  return $.root().text().replace(/\s+/g, ' ').trim();
}

/** Resolves `href` against `base`; null for unusable links. */
export function resolveLink(href: string, base: string): string | null {
  const value = href.trim();
  if (!value || /^(mailto:|tel:|javascript:|#)/i.test(value)) return null;
  try {
    return new URL(value, base).href;
  } catch {
    return null;
  }
}

import { loadHtml, resolveLink } from '@/modules/enrichment/application/utils/html';

const EMAIL_RE = /[a-zA-Z0-9_.+-]+@[a-zA-Z0-9-]+\.[a-zA-Z0-9.-]+/g;
const PHONE_RE = /(?:\+1[-.\s]?)?\(?\d{3}\)?[-.\s]?\d{3}[-.\s]?\d{4}/;
const LINKEDIN_RE = /^https?:\/\/(?:[a-z]{2,3}\.)?linkedin\.com\/(?:in|company|school)\/[A-Za-z0-9_%-]+\/?/i;

/** Most preferred first. */
export const ROLE_KEYWORDS = ['principal', 'head of school', 'director', 'admissions', 'office', 'info'] as const;
export type RoleKeyword = (typeof ROLE_KEYWORDS)[number];

export interface EmailMention {
  email: string;
  context: string;
}

export interface ContactEmail {
  email: string;
  role: RoleKeyword | null;
}

/** Each distinct address (case-insensitive) once, with the text around its first mention. */
export function extractEmailsWithContext(text: string, window = 120): EmailMention[] {
  const seen = new Set<string>();
  const mentions: EmailMention[] = [];

  for (const match of text.matchAll(EMAIL_RE)) {
    const email = match[0].replace(/[.-]+$/, '');
    const start = match.index ?? 0;
    const key = email.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    mentions.push({
      email,
      context: text.slice(Math.max(0, start - window), start + match[0].length + window),
    });
  }

  return mentions;
}

export function pickContactEmail(mentions: readonly EmailMention[]): ContactEmail | null {
  if (mentions.length === 0) return null;

  for (const role of ROLE_KEYWORDS) {
    const hit = mentions.find(
      (m) => m.email.toLowerCase().split('@')[0].includes(role) || m.context.toLowerCase().includes(role),
    );
    if (hit) return { email: hit.email, role };
  }

  return { email: mentions[0].email, role: null };
}

export function findPhone(text: string): string | null {
  return PHONE_RE.exec(text)?.[0] ?? null;
}

export function findLinkedInUrl(html: string): string | null {
  const $ = loadHtml(html);
  for (const el of $('a[href]').toArray()) {
    const match = LINKEDIN_RE.exec(($(el).attr('href') ?? '').trim());
    if (match) return match[0];
  }
  return null;
}

/** A form action wins over a link that mentions "contact". */
export function findContactFormUrl(html: string, baseUrl: string): string | null {
  const $ = loadHtml(html);

  for (const el of $('form[action]').toArray()) {
    const url = resolveLink($(el).attr('action') ?? '', baseUrl);
    if (url) return url;
  }

  for (const el of $('a[href]').toArray()) {
    const anchor = $(el);
    const href = anchor.attr('href') ?? '';
    if (!href.toLowerCase().includes('contact') && !anchor.text().toLowerCase().includes('contact')) continue;
    const url = resolveLink(href, baseUrl);
    if (url) return url;
  }

  return null;
}

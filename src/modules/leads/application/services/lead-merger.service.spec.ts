import { LeadMergerService } from '@/modules/leads/application/services/lead-merger.service';
import { domainFromUrl } from '@/modules/leads/application/utils/normalize';
import { TEXT_FIELDS, type Lead, type LeadUpdate } from '@/modules/leads/domain/lead';
import { buildLead } from '@/testing/fixtures';
import { pick, seededRandom } from '@/testing/random';

const TEXT_VALUES = ['', '   ', 'n/a', 'None', '-', null, 'Riverside', '  padded value  ', 'a;b', 'say "hi"', 'line1\nline2'];
const WEBSITES = ['https://riverside.edu', 'https://www.riverside.edu/about', 'https://other.org', 'n/a', '  '];
const DOMAINS = ['riverside.edu', 'other.org', '', 'null'];
const STAMPS = ['2023-06-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z', '2025-01-01T00:00:00.000Z', 'n/a'];
const SCORES = [Number.NaN, Number.POSITIVE_INFINITY, 0, 70, -1, null];
const EMAILS = [['a@x.org'], ['A@X.org', 'not-an-email'], ['  '], [], ['b@x.org']];
const EXTRAS: Record<string, string>[] = [{ city: '' }, { city: 'Downey' }, { phone: 'n/a' }, { source_query: 'Private school Downey' }, {}];

function randomUpdate(random: () => number): LeadUpdate {
  const update: LeadUpdate = {};
  const fields = 1 + Math.floor(random() * 4);
  for (let i = 0; i < fields; i++) {
    const field = pick(random, TEXT_FIELDS);
    if (field === 'website') update.website = pick(random, WEBSITES);
    else if (field === 'domain') update.domain = pick(random, DOMAINS);
    else if (field === 'enriched_at') update.enriched_at = pick(random, STAMPS);
    else update[field] = pick(random, TEXT_VALUES);
  }
  if (random() < 0.4) update.contact_score = pick(random, SCORES);
  if (random() < 0.4) update.all_emails = pick(random, EMAILS);
  if (random() < 0.4) update.extras = pick(random, EXTRAS);
  return update;
}

/** Every populated field, email and extras key, as a flat set of labels. */
function populated(lead: Lead): Set<string> {
  const labels = new Set<string>();
  for (const field of TEXT_FIELDS) {
    if (lead[field] !== null) labels.add(field);
  }
  if (lead.contact_score !== null) labels.add('contact_score');
  for (const email of lead.all_emails) labels.add(`email:${email}`);
  for (const key of Object.keys(lead.extras)) labels.add(`extras:${key}`);
  return labels;
}

describe('LeadMergerService', () => {
  const merger = new LeadMergerService();
  const existing = buildLead('lead-1', {
    name: 'Riverside Academy',
    domain: 'riverside.org',
    provider: 'serpapi',
    contact_email: 'info@x.org',
    all_emails: ['info@x.org'],
    email1_path: 'outreach_drafts/lead-1_first_draft.md',
    enriched_at: '2024-01-01T00:00:00.000Z',
    extras: { city: 'Downey' },
  });

  it('keeps a populated contact_email when the update is empty', () => {
    const { lead, changed } = merger.merge(existing, { contact_email: '' });

    expect(lead.contact_email).toBe('info@x.org');
    expect(changed).toEqual([]);
  });

  it('ignores placeholders and whitespace', () => {
    const { lead, changed } = merger.merge(existing, { contact_email: 'n/a', name: '  ', notes: null });

    expect(lead).toEqual(existing);
    expect(changed).toEqual([]);
  });

  it('overwrites contact fields with non-empty values', () => {
    const { lead, changed } = merger.merge(existing, { contact_email: 'principal@x.org' });

    expect(lead.contact_email).toBe('principal@x.org');
    expect(changed).toEqual(['contact_email']);
  });

  it('only fills identity fields', () => {
    const { lead, changed } = merger.merge(existing, { domain: 'https://www.other.org', provider: 'brave' });

    expect(lead.domain).toBe('riverside.org');
    expect(lead.provider).toBe('serpapi');
    expect(changed).toEqual([]);
  });

  it('derives the domain from the website when none is set', () => {
    const { lead, changed } = merger.merge(buildLead('lead-2'), { website: 'https://www.Oakhill.edu/' });

    expect(lead.website).toBe('https://www.Oakhill.edu/');
    expect(lead.domain).toBe('oakhill.edu');
    expect(changed).toEqual(['website', 'domain']);
  });

  it('unions emails case-insensitively in first-seen order', () => {
    const { lead, changed } = merger.merge(existing, {
      all_emails: ['INFO@x.org', 'Admin@X.org', 'not-an-email'],
    });

    expect(lead.all_emails).toEqual(['info@x.org', 'admin@x.org']);
    expect(changed).toEqual(['all_emails']);
    expect(existing.all_emails).toEqual(['info@x.org']);
  });

  it('keeps recorded artifact paths unless overwriting is asked for', () => {
    const update = { email1_path: 'outreach_drafts/other.md' };

    expect(merger.merge(existing, update).changed).toEqual([]);
    expect(merger.merge(existing, update, { overwriteArtifacts: true }).lead.email1_path).toBe(
      'outreach_drafts/other.md',
    );
  });

  it('advances enriched_at only alongside another change', () => {
    const stampOnly = merger.merge(existing, { enriched_at: '2024-02-01T00:00:00.000Z' });
    expect(stampOnly.changed).toEqual([]);
    expect(stampOnly.lead.enriched_at).toBe('2024-01-01T00:00:00.000Z');

    const withNotes = merger.merge(existing, { notes: 'called', enriched_at: '2024-02-01T00:00:00.000Z' });
    expect(withNotes.changed).toEqual(['notes', 'enriched_at']);
    expect(withNotes.lead.enriched_at).toBe('2024-02-01T00:00:00.000Z');
  });

  it('never moves enriched_at backwards', () => {
    const { lead, changed } = merger.merge(existing, { notes: 'called', enriched_at: '2023-12-01T00:00:00.000Z' });

    expect(changed).toEqual(['notes']);
    expect(lead.enriched_at).toBe('2024-01-01T00:00:00.000Z');
  });

  it('accepts finite scores only', () => {
    expect(merger.merge(existing, { contact_score: 70 }).lead.contact_score).toBe(70);
    expect(merger.merge(existing, { contact_score: Number.NaN }).changed).toEqual([]);
  });

  it('merges extras shallowly without clearing keys', () => {
    const { lead, changed } = merger.merge(existing, {
      extras: { city: '', source_query: 'Private school Downey' },
    });

    expect(lead.extras).toEqual({ city: 'Downey', source_query: 'Private school Downey' });
    expect(changed).toEqual(['extras']);
  });

  it('refuses a website that belongs to another domain', () => {
    const { lead, changed, rejected } = merger.merge(existing, { website: 'https://www.other.org', notes: 'moved?' });

    expect(lead.website).toBeNull();
    expect(lead.domain).toBe('riverside.org');
    expect(changed).toEqual(['notes']);
    expect(rejected).toEqual(['website']);
  });

  it('accepts a website on the same domain', () => {
    const { lead, rejected } = merger.merge(existing, { website: 'http://www.riverside.org/home' });

    expect(lead.website).toBe('http://www.riverside.org/home');
    expect(rejected).toEqual([]);
  });

  it('checks the website against a domain arriving in the same update', () => {
    const { lead, rejected } = merger.merge(buildLead('lead-3'), { website: 'https://a.org', domain: 'b.org' });

    expect(lead).toMatchObject({ website: null, domain: 'b.org' });
    expect(rejected).toEqual(['website']);
  });

  it.each([1, 2, 3, 5, 8, 13, 21, 34, 55, 89])(
    'never shrinks the populated fields over a merge sequence (seed %i)',
    (seed) => {
      const random = seededRandom(seed);
      let lead = buildLead('lead-seq');

      for (let step = 0; step < 40; step++) {
        const before = populated(lead);
        const stamp = lead.enriched_at;
        const result = merger.merge(lead, randomUpdate(random), { overwriteArtifacts: random() < 0.3 });
        lead = result.lead;

        const after = populated(lead);
        expect([...before].filter((label) => !after.has(label))).toEqual([]);
        if (stamp !== null) expect(lead.enriched_at !== null && lead.enriched_at >= stamp).toBe(true);
        if (lead.website !== null && lead.domain !== null) {
          expect(domainFromUrl(lead.website)).toBe(lead.domain);
        }
      }
    },
  );
});


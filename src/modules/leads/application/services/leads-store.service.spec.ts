import { ConstraintViolationError, LeadNotFoundError } from '@/modules/leads/domain/errors';
import { createWorkspace, type TestWorkspace } from '@/testing/fixtures';

describe('LeadsStoreService', () => {
  let ws: TestWorkspace;

  beforeEach(() => {
    ws = createWorkspace();
  });

  afterEach(() => ws.cleanup());

  it('inserts a new lead under a fresh id and derives its domain', async () => {
    const result = await ws.store.upsert(null, {
      name: 'Riverside Academy',
      website: 'https://www.riverside.edu',
      extras: { city: 'Downey' },
    });

    expect(result.created).toBe(true);
    expect(result.changed).toEqual(['name', 'website', 'domain', 'extras']);
    const lead = await ws.store.get(result.leadId);
    expect(lead).toMatchObject({
      lead_id: result.leadId,
      name: 'Riverside Academy',
      domain: 'riverside.edu',
      extras: { city: 'Downey' },
    });
    expect(await ws.store.count()).toBe(1);
  });

  it('keeps existing contact data when enrichment sends an empty value', async () => {
    const { leadId } = await ws.store.upsert(null, { name: 'X', contact_email: 'info@x.org' });

    const result = await ws.store.upsert(leadId, { contact_email: '' });

    expect(result.changed).toEqual([]);
    expect((await ws.store.get(leadId)).contact_email).toBe('info@x.org');
  });

  it('refuses to point a lead at another domain and reports it', async () => {
    const { leadId } = await ws.store.upsert(null, { name: 'Riverside', website: 'https://riverside.edu' });

    const result = await ws.store.upsert(leadId, { website: 'https://www.elsewhere.com/riverside' });

    expect(result.changed).toEqual([]);
    expect(result.rejected).toEqual(['website']);
    expect(await ws.store.get(leadId)).toMatchObject({ website: 'https://riverside.edu', domain: 'riverside.edu' });
  });

  it('persists lists, numbers and extras', async () => {
    const { leadId } = await ws.store.upsert(null, {
      name: 'Oak Hill',
      all_emails: ['office@oakhill.edu', 'admissions@oakhill.edu'],
      contact_score: 70,
      extras: { city: 'Downey', phone: '(562) 555-0100' },
    });

    const lead = await ws.store.get(leadId);
    expect(lead.all_emails).toEqual(['office@oakhill.edu', 'admissions@oakhill.edu']);
    expect(lead.contact_score).toBe(70);
    expect(lead.extras).toEqual({ city: 'Downey', phone: '(562) 555-0100' });
  });

  it('rejects a second lead on an owned domain', async () => {
    const a = await ws.store.upsert(null, { name: 'A', domain: 'a.org' });
    const b = await ws.store.upsert(null, { name: 'B' });

    await expect(ws.store.upsert(b.leadId, { domain: 'a.org' })).rejects.toThrow(ConstraintViolationError);
    await expect(ws.store.upsert(null, { website: 'https://a.org' })).rejects.toMatchObject({
      kind: 'ConstraintViolation',
      ownerLeadId: a.leadId,
    });

    expect((await ws.store.get(b.leadId)).domain).toBeNull();
    expect(await ws.store.count()).toBe(2);
  });

  it('throws NotFound for unknown ids when asked to', async () => {
    await expect(ws.store.upsert('missing', { notes: 'x' }, { mustExist: true })).rejects.toThrow(
      LeadNotFoundError,
    );
    await expect(ws.store.get('missing')).rejects.toMatchObject({ kind: 'NotFound', leadId: 'missing' });
  });

  it('keeps an unknown id only when seeding', async () => {
    const seeded = await ws.store.upsert('legacy-7', { name: 'Seeded' }, { keepUnknownId: true });
    const minted = await ws.store.upsert('legacy-8', { name: 'Minted' });

    expect(seeded).toMatchObject({ leadId: 'legacy-7', created: true });
    expect(minted.created).toBe(true);
    expect(minted.leadId).not.toBe('legacy-8');
  });

  it('stamps a new lead with the enrichment time it arrives with', async () => {
    const { leadId } = await ws.store.upsert(null, { name: 'X', enriched_at: '2024-03-01T00:00:00.000Z' });

    expect((await ws.store.get(leadId)).enriched_at).toBe('2024-03-01T00:00:00.000Z');
  });

  it('serializes concurrent upserts on the same lead', async () => {
    const { leadId } = await ws.store.upsert(null, { name: 'X' });

    await Promise.all([
      ws.store.upsert(leadId, { all_emails: ['a@x.org'] }),
      ws.store.upsert(leadId, { all_emails: ['b@x.org'] }),
    ]);

    expect((await ws.store.get(leadId)).all_emails).toEqual(['a@x.org', 'b@x.org']);
  });

  it('lists leads by id and finds them by any spelling of the domain', async () => {
    await ws.store.upsert('b-lead', { name: 'B', domain: 'b.org' }, { keepUnknownId: true });
    await ws.store.upsert('a-lead', { name: 'A', domain: 'a.org' }, { keepUnknownId: true });

    expect((await ws.store.listAll()).map((l) => l.lead_id)).toEqual(['a-lead', 'b-lead']);
    expect((await ws.store.findByDomain('https://WWW.b.org/about'))?.lead_id).toBe('b-lead');
    expect(await ws.store.findByDomain('c.org')).toBeNull();
  });

  it('previews a merge without writing it', async () => {
    const { leadId } = await ws.store.upsert(null, { name: 'X' });
    const lead = await ws.store.get(leadId);

    expect(ws.store.preview(lead, { notes: 'later' }).changed).toEqual(['notes']);
    expect((await ws.store.get(leadId)).notes).toBeNull();
  });
});

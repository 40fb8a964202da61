import {
  applyExtrasSidecar,
  exportExtras,
  fromLegacyRow,
  importRows,
  parseExtrasSidecar,
  toLegacyRow,
} from '@/modules/legacy/application/mappers/legacy-row.mapper';
import { UnresolvableRowError } from '@/modules/leads/domain/errors';
import { buildLead } from '@/testing/fixtures';

describe('legacy row mapper', () => {
  it('flattens a lead into the fixed columns', () => {
    const row = toLegacyRow(
      buildLead('lead-1', {
        name: 'Riverside Academy',
        all_emails: ['a@x.org', 'b@x.org'],
        contact_score: 70,
        extras: { city: 'Downey', tuition: '12000' },
      }),
    );

    expect(row).toMatchObject({
      lead_id: 'lead-1',
      school_name: 'Riverside Academy',
      city: 'Downey',
      all_emails: 'a@x.org;b@x.org',
      contact_score: '70',
      website: '',
      notes: '',
    });
    expect(Object.keys(row)).toHaveLength(23);
  });

  it('reads a row back, blank cells absent and extra columns in extras', () => {
    const update = fromLegacyRow(
      {
        lead_id: 'lead-1',
        school_name: 'Riverside Academy',
        city: 'Downey',
        contact_email: '',
        all_emails: 'a@x.org; b@x.org',
        contact_score: '70',
        tuition: '12000',
      },
      2,
    );

    expect(update).toEqual({
      row: 2,
      leadId: 'lead-1',
      fields: {
        name: 'Riverside Academy',
        all_emails: ['a@x.org', 'b@x.org'],
        contact_score: 70,
        extras: { city: 'Downey', tuition: '12000' },
      },
    });
  });

  it('rejects a score that is not a number', () => {
    expect(() => fromLegacyRow({ lead_id: 'lead-1', contact_score: 'high' }, 5)).toThrow(
      'Row 5: contact_score is not a number: "high"',
    );
  });

  it('rejects a row with nothing to identify it', () => {
    expect(() => fromLegacyRow({ lead_id: '', notes: 'orphan' }, 3)).toThrow(UnresolvableRowError);
  });

  it('collects bad rows with sheet line numbers', () => {
    const result = importRows([{ lead_id: 'lead-1' }, { notes: 'orphan' }, { domain: 'x.org' }]);

    expect(result.updates.map((u) => u.row)).toEqual([2, 4]);
    expect(result.errors.map((e) => e.row)).toEqual([3]);
  });

  it('keeps only extras without a column in the sidecar, keys sorted', () => {
    const sidecar = exportExtras([
      buildLead('lead-2', { extras: { city: 'Downey', source_query: 'q', address: '1 Main St' } }),
      buildLead('lead-1', { extras: { city: 'Whittier' } }),
    ]);

    expect(sidecar).toEqual({ 'lead-2': { address: '1 Main St', source_query: 'q' } });
    expect(Object.keys(sidecar['lead-2'])).toEqual(['address', 'source_query']);
  });

  it.each([
    [[], 'extras file must hold an object keyed by lead_id'],
    [{ 'lead-1': 'x' }, 'extras of lead-1 must be an object'],
    [{ 'lead-1': { phone: 5 } }, 'extras of lead-1: "phone" must be a string'],
  ])('rejects a sidecar shaped like %j', (value, message) => {
    expect(() => parseExtrasSidecar(value)).toThrow(message);
  });

  it('adds sidecar extras to rows with the same lead_id only', () => {
    const updates = applyExtrasSidecar(
      [
        { row: 2, leadId: 'lead-1', fields: { name: 'A', extras: { city: 'Downey' } } },
        { row: 3, leadId: null, fields: { name: 'B' } },
        { row: 4, leadId: 'constructor', fields: { name: 'C' } },
      ],
      parseExtrasSidecar({ 'lead-1': { phone: '555-0100', city: 'Whittier' } }),
    );

    expect(updates.map((u) => u.fields)).toEqual([
      { name: 'A', extras: { phone: '555-0100', city: 'Downey' } },
      { name: 'B' },
      { name: 'C' },
    ]);
  });
});

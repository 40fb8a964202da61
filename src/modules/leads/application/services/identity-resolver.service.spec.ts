import { loadScoutConfig } from '@/config/scout.config';
import { IdentityResolverService } from '@/modules/leads/application/services/identity-resolver.service';
import { AmbiguousMergeError } from '@/modules/leads/domain/errors';
import { buildLead } from '@/testing/fixtures';

describe('IdentityResolverService', () => {
  const resolver = new IdentityResolverService(loadScoutConfig({}));
  const riverside = buildLead('lead-a', {
    name: 'Riverside Academy',
    domain: 'riverside.org',
    extras: { city: 'Downey' },
  });

  it('matches on domain before anything else', () => {
    const resolution = resolver.resolve(
      { name: 'Totally Different', website: 'https://www.riverside.org/about' },
      [riverside],
    );

    expect(resolution).toEqual({ kind: 'match', leadId: 'lead-a', rule: 'domain', similarity: 1 });
  });

  it('uses the website when the domain cell does not parse', () => {
    const resolution = resolver.resolve(
      { name: 'Totally Different', domain: 'not a domain!!', website: 'http://riverside.org' },
      [riverside],
    );

    expect(resolution).toMatchObject({ kind: 'match', leadId: 'lead-a', rule: 'domain' });
  });

  it('falls back to fuzzy name matching within the same city', () => {
    const resolution = resolver.resolve({ name: 'Riverside School', extras: { city: 'downey' } }, [riverside]);

    expect(resolution).toEqual({ kind: 'match', leadId: 'lead-a', rule: 'fuzzy_name', similarity: 1 });
  });

  it('matches by name when the candidate has no city', () => {
    expect(resolver.resolve({ name: 'Riverside School' }, [riverside]).kind).toBe('match');
  });

  it('does not match across cities', () => {
    expect(resolver.resolve({ name: 'Riverside School', extras: { city: 'Whittier' } }, [riverside])).toEqual({
      kind: 'new',
    });
  });

  it('does not match leads on different domains', () => {
    const resolution = resolver.resolve(
      { name: 'Riverside School', domain: 'riverside-prep.com', extras: { city: 'Downey' } },
      [riverside],
    );

    expect(resolution).toEqual({ kind: 'new' });
  });

  it('rejects names below the threshold', () => {
    // "riverbend" vs "riverside": 4 edits over 9 characters
    expect(resolver.resolve({ name: 'Riverbend Academy' }, [riverside])).toEqual({ kind: 'new' });
  });

  it('uses the configured threshold', () => {
    const lenient = new IdentityResolverService(loadScoutConfig({ SCOUT_NAME_MATCH_THRESHOLD: '0.5' }));

    expect(lenient.resolve({ name: 'Riverbend Academy' }, [riverside])).toMatchObject({
      kind: 'match',
      leadId: 'lead-a',
      rule: 'fuzzy_name',
    });
  });

  it('breaks ties on the smallest lead_id', () => {
    const leads = [
      buildLead('lead-z', { name: 'Oak Hill Academy' }),
      buildLead('lead-m', { name: 'Oak Hill School' }),
    ];

    expect(resolver.resolve({ name: 'Oak Hill Prep' }, leads)).toMatchObject({ leadId: 'lead-m' });
  });

  it('refuses to merge two canonical leads', () => {
    expect(() => resolver.mergeCanonical('lead-a', 'lead-b')).toThrow(AmbiguousMergeError);
  });
});

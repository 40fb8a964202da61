import { IdentityResolverService } from '@/modules/leads/application/services/identity-resolver.service';
import { LeadsConsolidationService } from '@/modules/leads/application/services/leads-consolidation.service';
import type { LeadUpdate } from '@/modules/leads/domain/lead';
import { createWorkspace, type TestWorkspace } from '@/testing/fixtures';
import { pick, seededRandom } from '@/testing/random';

const NAMES = ['Riverside Academy', 'Riverside School', 'Oak Hill', 'Oak Hill Academy', 'St. Mary School', 'Saint Mary School', 'Downey Christian'];
const DOMAINS = ['riverside.edu', 'OakHill.edu', 'https://www.stmary.org/', null, '', 'n/a', 'not a domain!!'];
const WEBSITES = ['https://www.riverside.edu/', 'http://oakhill.edu', 'https://stmary.org/about', 'https://downeychristian.org', null];
const CITIES = ['Downey', 'Whittier', ''];

function randomCandidate(random: () => number): LeadUpdate {
  return {
    name: pick(random, NAMES),
    domain: pick(random, DOMAINS),
    website: pick(random, WEBSITES),
    provider: 'serpapi',
    extras: { city: pick(random, CITIES) },
  };
}

describe('LeadsConsolidationService', () => {
  let ws: TestWorkspace;
  let consolidation: LeadsConsolidationService;

  beforeEach(() => {
    ws = createWorkspace();
    consolidation = new LeadsConsolidationService(new IdentityResolverService(ws.config), ws.store);
  });

  afterEach(() => ws.cleanup());

  it('stores a candidate seen twice in one batch exactly once', async () => {
    const candidate = { name: 'Riverside Academy', domain: 'riverside.edu', provider: 'serpapi' };

    const report = await consolidation.consolidate([candidate, { ...candidate }]);

    expect(report).toMatchObject({ received: 2, created: 1, matched: { domain: 1, fuzzy_name: 0 } });
    expect(report.leadIds).toHaveLength(1);
    expect(await ws.store.count()).toBe(1);
    expect((await ws.store.findByDomain('riverside.edu'))?.name).toBe('Riverside Academy');
  });

  it('folds a domainless name variant into the known lead', async () => {
    const report = await consolidation.consolidate([
      { name: 'Riverside Academy', domain: 'riverside.edu', extras: { city: 'Downey' } },
      { name: 'Riverside School', extras: { city: 'Downey', phone: '(562) 555-0100' } },
    ]);

    expect(report.matched.fuzzy_name).toBe(1);
    const [lead] = await ws.store.listAll();
    expect(lead.extras).toEqual({ city: 'Downey', phone: '(562) 555-0100' });
  });

  it('matches against leads stored by earlier runs', async () => {
    const { leadId } = await ws.store.upsert(null, { name: 'Oak Hill', domain: 'oakhill.edu' });

    const report = await consolidation.consolidate([{ name: 'Oak Hill', website: 'http://oakhill.edu/' }]);

    expect(report).toMatchObject({ created: 0, leadIds: [leadId] });
  });

  it.each([3, 11, 29, 47, 101])('never stores two leads under one domain (seed %i)', async (seed) => {
    const random = seededRandom(seed);

    for (let batch = 0; batch < 3; batch++) {
      const candidates = Array.from({ length: 8 + Math.floor(random() * 5) }, () => randomCandidate(random));
      const countBefore = await ws.store.count();

      const report = await consolidation.consolidate(candidates);

      const domains = (await ws.store.listAll()).flatMap((lead) => (lead.domain === null ? [] : [lead.domain]));
      expect(new Set(domains).size).toBe(domains.length);
      expect(await ws.store.count()).toBe(countBefore + report.created);
      expect(report.created + report.matched.domain + report.matched.fuzzy_name).toBe(candidates.length);
    }
  });
});


import { CandidateCollector } from '@/modules/discovery/application/services/candidate-collector';
import type { DiscoveryCandidate } from '@/modules/discovery/domain/candidate';

function candidate(name: string, domain: string | null): DiscoveryCandidate {
  return { name, domain, website: domain ? `https://${domain}` : null, provider: 'serpapi', extras: {} };
}

describe('CandidateCollector', () => {
  it('drops directory sites, including their subdomains', () => {
    const collector = new CandidateCollector(10);

    expect(collector.add(candidate('Best Schools', 'niche.com'), 'q')).toBe(false);
    expect(collector.add(candidate('Listing', 'maps.yelp.com'), 'q')).toBe(false);
    expect(collector.result().rejected.map((r) => r.reason)).toEqual(['blocked_domain', 'blocked_domain']);
  });

  it('drops repeats of a domain or a name', () => {
    const collector = new CandidateCollector(10);

    collector.add(candidate('Riverside Academy', 'riverside.edu'), 'q1');
    collector.add(candidate('Riverside Campus', 'riverside.edu'), 'q2');
    collector.add(candidate('riverside academy ', null), 'q2');

    expect(collector.result()).toEqual({
      candidates: [candidate('Riverside Academy', 'riverside.edu')],
      rejected: [
        { name: 'Riverside Campus', domain: 'riverside.edu', query: 'q2', reason: 'duplicate_domain' },
        { name: 'riverside academy ', domain: null, query: 'q2', reason: 'duplicate_name' },
      ],
    });
  });

  it('stops accepting at max', () => {
    const collector = new CandidateCollector(1);

    expect(collector.add(candidate('A', 'a.org'), null)).toBe(true);
    expect(collector.full).toBe(true);
    expect(collector.add(candidate('B', 'b.org'), null)).toBe(false);
    expect(collector.result().candidates).toHaveLength(1);
  });
});

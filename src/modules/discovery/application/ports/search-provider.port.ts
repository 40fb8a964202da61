import type { DiscoveryCandidate, DiscoveryRejection } from '@/modules/discovery/domain/candidate';

export const SEARCH_PROVIDERS = Symbol('SEARCH_PROVIDERS');

export interface DiscoveryBatch {
  candidates: DiscoveryCandidate[];
  rejected: DiscoveryRejection[];
}

export interface SearchProvider {
  readonly name: string;
  /** Throws ProviderUnavailableError when the provider cannot be queried. */
  discover(city: string, max: number): Promise<DiscoveryBatch>;
}

export interface DiscoveryCandidate {
  name: string;
  website: string | null;
  domain: string | null;
  provider: string;
  /** source_query, address, phone and city when the provider knows them */
  extras: Record<string, string>;
}

export interface DiscoveryRejection {
  name: string;
  domain: string | null;
  query: string | null;
  reason: 'blocked_domain' | 'duplicate_domain' | 'duplicate_name';
}

/** Directories and aggregators that list schools but are not schools. */
export const BLOCKED_DIRECTORY_DOMAINS = [
  'niche.com',
  'yelp.com',
  'greatschools.org',
  'privateschoolreview.com',
  'expertise.com',
  'mapquest.com',
  'facebook.com',
  'instagram.com',
];

export function isBlockedDomain(domain: string | null): boolean {
  if (!domain) return false;
  return BLOCKED_DIRECTORY_DOMAINS.some((blocked) => domain === blocked || domain.endsWith(`.${blocked}`));
}

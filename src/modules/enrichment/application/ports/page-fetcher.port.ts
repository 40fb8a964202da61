import type { FetchResult } from '@/modules/enrichment/domain/page';

export const PAGE_FETCHER = Symbol('PAGE_FETCHER');
export const PLACEHOLDER_PAGE_FETCHER = Symbol('PLACEHOLDER_PAGE_FETCHER');

/**
 * Never throws for an unreachable or disallowed page: that is an
 * `{ ok: false }` result the caller decides about.
 */
export interface PageFetcher {
  fetch(url: string): Promise<FetchResult>;
  /** Forget per-run state such as cached robots.txt rules. */
  reset(): void;
}

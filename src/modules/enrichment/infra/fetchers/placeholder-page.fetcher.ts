import { Injectable } from '@nestjs/common';

import type { PageFetcher } from '@/modules/enrichment/application/ports/page-fetcher.port';
import type { FetchResult } from '@/modules/enrichment/domain/page';

/** Dry-run fetcher: every page is unavailable, nothing goes over the wire. */
@Injectable()
export class PlaceholderPageFetcher implements PageFetcher {
  async fetch(url: string): Promise<FetchResult> {
    return { ok: false, url, reason: 'dry-run', skipped: true };
  }

  reset(): void {
    // nothing cached
  }
}

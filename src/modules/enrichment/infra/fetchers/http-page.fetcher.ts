import { Injectable, Logger } from '@nestjs/common';
import { HttpService } from '@nestjs/axios';
import { firstValueFrom } from 'rxjs';

import type { PageFetcher } from '@/modules/enrichment/application/ports/page-fetcher.port';
import { isPathAllowed, parseRobotsRules, type RobotsRule } from '@/modules/enrichment/application/utils/robots';
import type { FetchResult } from '@/modules/enrichment/domain/page';
import { errorMessage } from '@/modules/leads/domain/errors';

@Injectable()
export class HttpPageFetcher implements PageFetcher {
  private readonly logger = new Logger(HttpPageFetcher.name);
  /** robots.txt rules per origin; cleared by `reset()` at the start of each run. */
  private readonly robots = new Map<string, Promise<RobotsRule[]>>();

  constructor(private readonly http: HttpService) {}

  async fetch(url: string): Promise<FetchResult> {
    let target: URL;
    try {
      target = new URL(url);
    } catch {
      return { ok: false, url, reason: 'invalid url', skipped: false };
    }

    const rules = await this.rulesFor(target.origin);
    if (!isPathAllowed(`${target.pathname}${target.search}`, rules)) {
      return { ok: false, url, reason: 'disallowed by robots.txt', skipped: true };
    }

    try {
      const res = await firstValueFrom(
        this.http.get<string>(target.href, { responseType: 'text', maxRedirects: 5 }),
      );
      return { ok: true, url: target.href, html: String(res.data) };
    } catch (error) {
      return { ok: false, url, reason: errorMessage(error), skipped: false };
    }
  }

  reset(): void {
    this.robots.clear();
  }

  private rulesFor(origin: string): Promise<RobotsRule[]> {
    let rules = this.robots.get(origin);
    if (!rules) {
      rules = this.loadRules(origin);
      this.robots.set(origin, rules);
    }
    return rules;
  }

  private async loadRules(origin: string): Promise<RobotsRule[]> {
    try {
      const res = await firstValueFrom(
        this.http.get<string>(`${origin}/robots.txt`, { responseType: 'text' }),
      );
      return parseRobotsRules(String(res.data));
    } catch (error) {
      // no readable robots.txt: nothing is disallowed
      this.logger.debug(`No robots.txt for ${origin}: ${errorMessage(error)}`);
      return [];
    }
  }
}

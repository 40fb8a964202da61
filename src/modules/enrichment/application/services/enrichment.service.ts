import { Inject, Injectable, Logger } from '@nestjs/common';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import {
  CONTENT_GENERATOR,
  PLACEHOLDER_CONTENT_GENERATOR,
  type ContentGenerator,
} from '@/modules/content/application/ports/content-generator.port';
import {
  PAGE_FETCHER,
  PLACEHOLDER_PAGE_FETCHER,
  type PageFetcher,
} from '@/modules/enrichment/application/ports/page-fetcher.port';
import { classifyContact } from '@/modules/enrichment/application/utils/contact-classifier';
import {
  extractEmailsWithContext,
  findContactFormUrl,
  findLinkedInUrl,
  findPhone,
  pickContactEmail,
  type RoleKeyword,
} from '@/modules/enrichment/application/utils/extract';
import { stripHtml } from '@/modules/enrichment/application/utils/html';
import type { FetchedPage, PageBundle } from '@/modules/enrichment/domain/page';
import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';
import {
  type ErrorKind,
  errorMessage,
  FetchFailedError,
  isScoutError,
  LeadNotFoundError,
} from '@/modules/leads/domain/errors';
import type { Lead, LeadField, LeadUpdate } from '@/modules/leads/domain/lead';
import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';

const ROLE_LABELS: Record<RoleKeyword, string> = {
  principal: 'Principal',
  'head of school': 'Head of School',
  director: 'Director',
  admissions: 'Admissions',
  office: 'Office',
  info: 'General Office',
};

export interface EnrichParams {
  dryRun?: boolean;
  /** Restrict the run to these leads; every lead otherwise. */
  leadIds?: string[];
}

export interface EnrichmentChange {
  leadId: string;
  changed: LeadField[];
}

export interface EnrichmentFailure {
  leadId: string;
  kind: ErrorKind | 'Unexpected';
  reason: string;
}

export interface EnrichmentReport {
  dryRun: boolean;
  processed: number;
  updated: number;
  unchanged: number;
  changes: EnrichmentChange[];
  failed: EnrichmentFailure[];
  exportPath: string | null;
}

function withScheme(website: string): string {
  return /^https?:\/\//i.test(website) ? website : `https://${website}`;
}

/**
 * Fetches and extracts in chunks of `enrichConcurrency` leads; merge-and-write
 * stays sequential through the store. A lead whose fetch or generation fails
 * is reported and skipped. Store errors abort the run.
 */
@Injectable()
export class EnrichmentService {
  private readonly logger = new Logger(EnrichmentService.name);

  constructor(
    @Inject(scoutConfig.KEY) private readonly config: ScoutConfig,
    @Inject(PAGE_FETCHER) private readonly fetcher: PageFetcher,
    @Inject(PLACEHOLDER_PAGE_FETCHER) private readonly placeholderFetcher: PageFetcher,
    @Inject(CONTENT_GENERATOR) private readonly generator: ContentGenerator,
    @Inject(PLACEHOLDER_CONTENT_GENERATOR) private readonly placeholderGenerator: ContentGenerator,
    private readonly store: LeadsStoreService,
    private readonly legacy: LegacyViewService,
  ) {}

  async run({ dryRun = false, leadIds }: EnrichParams = {}): Promise<EnrichmentReport> {
    const fetcher = dryRun ? this.placeholderFetcher : this.fetcher;
    const generator = dryRun ? this.placeholderGenerator : this.generator;
    fetcher.reset();

    const report: EnrichmentReport = {
      dryRun,
      processed: 0,
      updated: 0,
      unchanged: 0,
      changes: [],
      failed: [],
      exportPath: null,
    };

    const leads = leadIds ? await this.findEach(leadIds, report) : await this.store.listAll();

    const size = Math.max(1, this.config.enrichConcurrency);
    for (let start = 0; start < leads.length; start += size) {
      const chunk = leads.slice(start, start + size);
      const settled = await Promise.allSettled(chunk.map((lead) => this.collect(lead, fetcher, generator)));

      for (const [i, outcome] of settled.entries()) {
        const lead = chunk[i];
        report.processed++;

        if (outcome.status === 'rejected') {
          const error: unknown = outcome.reason;
          report.failed.push({
            leadId: lead.lead_id,
            kind: isScoutError(error) ? error.kind : 'Unexpected',
            reason: errorMessage(error),
          });
          this.logger.warn(`[ENRICH] ${lead.lead_id} failed: ${errorMessage(error)}`);
          continue;
        }

        const changed = dryRun
          ? this.store.preview(lead, outcome.value).changed
          : (await this.store.upsert(lead.lead_id, outcome.value, { mustExist: true })).changed;

        if (changed.length > 0) {
          report.updated++;
          report.changes.push({ leadId: lead.lead_id, changed });
        } else {
          report.unchanged++;
        }
      }
    }

    if (!dryRun) {
      report.exportPath = (await this.legacy.exportToFile()).path;
    }

    this.logger.log(
      `Enriched ${report.processed} leads (updated=${report.updated}, unchanged=${report.unchanged}, failed=${report.failed.length}${dryRun ? ', dry-run' : ''})`,
    );
    return report;
  }

  /** Unknown ids are reported as failures; the known ones still run. */
  private async findEach(leadIds: readonly string[], report: EnrichmentReport): Promise<Lead[]> {
    const leads: Lead[] = [];
    for (const leadId of leadIds) {
      const lead = await this.store.find(leadId);
      if (lead) {
        leads.push(lead);
        continue;
      }
      const error = new LeadNotFoundError(leadId);
      report.processed++;
      report.failed.push({ leadId, kind: error.kind, reason: error.message });
      this.logger.warn(`[ENRICH] ${error.message}`);
    }
    return leads;
  }

  /** Fetch, extract and generate for one lead; never writes. */
  async collect(lead: Lead, fetcher: PageFetcher, generator: ContentGenerator): Promise<LeadUpdate> {
    const pages = await this.fetchPages(lead, fetcher);
    const found = [pages.homepage, pages.contact, pages.about].filter((p): p is FetchedPage => p !== null);
    const text = found.map((p) => p.text).join('\n');
    const update: LeadUpdate = { enriched_at: new Date().toISOString() };

    if (found.length > 0) {
      const mentions = extractEmailsWithContext(text);
      const picked = pickContactEmail(mentions);
      const linkedinUrl = found.map((p) => findLinkedInUrl(p.html)).find((u) => u !== null) ?? null;
      const formPages = [pages.contact, pages.homepage].filter((p): p is FetchedPage => p !== null);
      const contactFormUrl = formPages.map((p) => findContactFormUrl(p.html, p.url)).find((u) => u !== null) ?? null;
      const phone = findPhone(text);

      update.all_emails = mentions.map((m) => m.email);
      if (picked) {
        update.contact_email = picked.email;
        update.contact_role = picked.role;
        update.primary_contact = picked.role ? ROLE_LABELS[picked.role] : 'General Office';
      }
      update.linkedin_url = linkedinUrl;
      update.contact_form_url = contactFormUrl;
      update.contact_page = pages.contact?.url ?? null;
      update.about_page = pages.about?.url ?? null;

      // signals already on the lead count, so a thinner page never demotes the tier
      const classification = classifyContact({
        email: picked?.email ?? lead.contact_email,
        linkedinUrl: linkedinUrl ?? lead.linkedin_url,
        contactFormUrl: contactFormUrl ?? lead.contact_form_url,
        phone,
      });
      update.contact_method = classification.method;
      update.contact_priority_label = classification.tier;
      update.contact_score = classification.score;
    }

    update.personalization_hook = await generator.generate(lead, { kind: 'personalization_hook', pageText: text });
    return update;
  }

  private async fetchPages(lead: Lead, fetcher: PageFetcher): Promise<PageBundle> {
    const bundle: PageBundle = { homepage: null, contact: null, about: null };
    if (!lead.website) return bundle;

    const website = withScheme(lead.website);
    const home = await fetcher.fetch(website);
    if (!home.ok) {
      if (home.skipped) return bundle;
      throw new FetchFailedError(website, home.reason);
    }
    bundle.homepage = { url: home.url, html: home.html, text: stripHtml(home.html) };

    for (const key of ['contact', 'about'] as const) {
      const page = await fetcher.fetch(new URL(`/${key}`, home.url).href);
      if (page.ok) bundle[key] = { url: page.url, html: page.html, text: stripHtml(page.html) };
    }

    return bundle;
  }
}

import { randomUUID } from 'crypto';
import { Inject, Injectable, Logger } from '@nestjs/common';

import {
  LEADS_REPOSITORY,
  type LeadsRepositoryPort,
} from '@/modules/leads/application/ports/leads-repository.port';
import {
  LeadMergerService,
  type MergeOptions,
  type MergeResult,
} from '@/modules/leads/application/services/lead-merger.service';
import { KeyedQueue } from '@/modules/leads/application/utils/keyed-queue';
import { domainFromUrl, cleanText } from '@/modules/leads/application/utils/normalize';
import { LeadNotFoundError } from '@/modules/leads/domain/errors';
import { emptyLead, type Lead, type LeadField, type LeadUpdate } from '@/modules/leads/domain/lead';

export interface UpsertOptions extends MergeOptions {
  /** Insert under the given id when it is unknown (seeding from the legacy file). */
  keepUnknownId?: boolean;
  /** Throw NotFound instead of inserting when the id is unknown. */
  mustExist?: boolean;
}

export interface UpsertResult {
  leadId: string;
  created: boolean;
  changed: LeadField[];
  /** Fields whose incoming value was refused (a website pointing at another domain). */
  rejected: LeadField[];
  previous: Lead | null;
}

/**
 * Canonical lead store. Upserts on the same lead are queued, never
 * interleaved; `drain()` is the barrier before any export.
 */
@Injectable()
export class LeadsStoreService {
  private readonly logger = new Logger(LeadsStoreService.name);
  private readonly queue = new KeyedQueue();

  constructor(
    @Inject(LEADS_REPOSITORY)
    private readonly repository: LeadsRepositoryPort,
    private readonly merger: LeadMergerService,
  ) {}

  upsert(leadId: string | null, fields: LeadUpdate, options: UpsertOptions = {}): Promise<UpsertResult> {
    const target = cleanText(leadId);
    const key = target ?? `new:${domainFromUrl(cleanText(fields.domain) ?? fields.website) ?? randomUUID()}`;

    return this.queue.run(key, async () => {
      const current = target ? await this.repository.findById(target) : null;

      if (current) {
        const result = this.merger.merge(current, fields, options);
        this.warnRejected(current, result.rejected, fields);
        if (result.changed.length > 0) {
          await this.repository.save(result.lead);
          this.logger.debug(`Lead ${current.lead_id} updated: ${result.changed.join(', ')}`);
        }
        return {
          leadId: current.lead_id,
          created: false,
          changed: result.changed,
          rejected: result.rejected,
          previous: current,
        };
      }

      if (target && options.mustExist) throw new LeadNotFoundError(target);

      const id = target && options.keepUnknownId ? target : randomUUID();
      const inserted = this.preview(emptyLead(id), fields, options);
      // a brand-new row keeps whatever timestamp it was born with
      if (inserted.lead.enriched_at === null) inserted.lead.enriched_at = cleanText(fields.enriched_at);

      await this.repository.save(inserted.lead);
      this.logger.debug(`Lead ${id} created (${inserted.lead.name ?? 'unnamed'})`);
      return { leadId: id, created: true, changed: inserted.changed, rejected: inserted.rejected, previous: null };
    });
  }

  private warnRejected(lead: Lead, rejected: readonly LeadField[], fields: LeadUpdate): void {
    if (rejected.includes('website')) {
      this.logger.warn(
        `Lead ${lead.lead_id}: website ${fields.website ?? ''} does not belong to ${lead.domain ?? 'its domain'}, kept ${lead.website ?? 'none'}`,
      );
    }
  }

  /** Merge without writing: what an upsert onto `lead` would produce. */
  preview(lead: Lead, fields: LeadUpdate, options: MergeOptions = {}): MergeResult {
    return this.merger.merge(lead, fields, options);
  }

  find(leadId: string): Promise<Lead | null> {
    return this.repository.findById(leadId);
  }

  async get(leadId: string): Promise<Lead> {
    const lead = await this.repository.findById(leadId);
    if (!lead) throw new LeadNotFoundError(leadId);
    return lead;
  }

  async findByDomain(domain: string): Promise<Lead | null> {
    const normalized = domainFromUrl(domain);
    return normalized ? this.repository.findByDomain(normalized) : null;
  }

  /** Every lead, ordered by lead_id. */
  async listAll(): Promise<Lead[]> {
    const leads = await this.repository.listAll();
    return leads.sort((a, b) => (a.lead_id < b.lead_id ? -1 : a.lead_id > b.lead_id ? 1 : 0));
  }

  count(): Promise<number> {
    return this.repository.count();
  }

  drain(): Promise<void> {
    return this.queue.drain();
  }
}

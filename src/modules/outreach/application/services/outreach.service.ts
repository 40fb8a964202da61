import { Inject, Injectable, Logger } from '@nestjs/common';

import { type ScoutConfig, scoutConfig } from '@/config/scout.config';
import {
  CONTENT_GENERATOR,
  PLACEHOLDER_CONTENT_GENERATOR,
  type ContentGenerator,
  type ContentRequest,
} from '@/modules/content/application/ports/content-generator.port';
import {
  ArtifactLedgerService,
  type LedgerEntry,
} from '@/modules/leads/application/services/artifact-ledger.service';
import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';
import { ARTIFACT_PATH_FIELD } from '@/modules/leads/domain/artifact-kind';
import { errorMessage, isScoutError } from '@/modules/leads/domain/errors';
import type { Lead } from '@/modules/leads/domain/lead';
import { LegacyViewService } from '@/modules/legacy/application/services/legacy-view.service';
import {
  ARTIFACT_WRITER,
  type ArtifactWriter,
} from '@/modules/outreach/application/ports/artifact-writer.port';
import { artifactPath } from '@/modules/outreach/domain/artifact-path';
import type {
  GeneratedArtifact,
  OutreachArtifactKind,
  OutreachReport,
} from '@/modules/outreach/domain/outreach-report';

export interface DraftParams {
  limit?: number;
  dryRun?: boolean;
}

export interface FollowupParams {
  days?: number;
  dryRun?: boolean;
}

export interface BriefParams {
  leadId: string;
  dryRun?: boolean;
}

interface Emission {
  kind: OutreachArtifactKind;
  request: ContentRequest;
  path: string;
}

function byScoreThenId(a: Lead, b: Lead): number {
  const diff = (b.contact_score ?? 0) - (a.contact_score ?? 0);
  if (diff !== 0) return diff;
  return a.lead_id < b.lead_id ? -1 : a.lead_id > b.lead_id ? 1 : 0;
}

/**
 * Generates outreach markdown and records each artifact path through the
 * ledger. Dry-runs use the template generator and touch neither files nor
 * the store.
 */
@Injectable()
export class OutreachService {
  private readonly logger = new Logger(OutreachService.name);

  constructor(
    @Inject(scoutConfig.KEY) private readonly config: ScoutConfig,
    @Inject(CONTENT_GENERATOR) private readonly generator: ContentGenerator,
    @Inject(PLACEHOLDER_CONTENT_GENERATOR) private readonly placeholderGenerator: ContentGenerator,
    @Inject(ARTIFACT_WRITER) private readonly writer: ArtifactWriter,
    private readonly store: LeadsStoreService,
    private readonly ledger: ArtifactLedgerService,
    private readonly legacy: LegacyViewService,
  ) {}

  async draft({ limit = 10, dryRun = false }: DraftParams = {}): Promise<OutreachReport> {
    const report = this.emptyReport(dryRun);
    const leads = (await this.store.listAll()).sort(byScoreThenId);

    for (const lead of leads) {
      if (report.leads >= limit) break;

      const emissions = this.draftPlan(lead);
      if (emissions.length === 0) {
        const reason = lead.contact_method === 'phone_only' ? 'phone only' : 'no contact route';
        report.skipped.push({ leadId: lead.lead_id, reason });
        continue;
      }

      if (await this.emitAll(report, lead, emissions)) report.leads++;
    }

    return this.finish(report, 'drafts');
  }

  async followup({ days = 5, dryRun = false }: FollowupParams = {}): Promise<OutreachReport> {
    const report = this.emptyReport(dryRun);
    const leads = await this.store.listAll();

    for (const lead of leads) {
      if (!lead.email1_path) {
        report.skipped.push({ leadId: lead.lead_id, reason: 'no first draft' });
        continue;
      }

      const emission: Emission = {
        kind: 'followup',
        request: { kind: 'followup', days },
        path: artifactPath(this.config.draftsDir, lead.lead_id, 'followup', `day${days}`),
      };
      if (await this.emitAll(report, lead, [emission])) report.leads++;
    }

    return this.finish(report, 'follow-ups');
  }

  async brief({ leadId, dryRun = false }: BriefParams): Promise<OutreachReport> {
    const report = this.emptyReport(dryRun);
    const lead = await this.store.get(leadId);

    await this.emit(report, lead, {
      kind: 'brief',
      request: { kind: 'brief' },
      path: artifactPath(this.config.briefsDir, lead.lead_id, 'brief'),
    });
    report.leads++;

    return this.finish(report, 'briefs');
  }

  /** What `draft` would produce for a lead, by contact tier. */
  draftPlan(lead: Lead): Emission[] {
    const tier = lead.contact_priority_label;
    const dir = this.config.draftsDir;
    const id = lead.lead_id;
    const plan: Emission[] = [];

    if (tier === 'Tier 1' || tier === 'Tier 3') {
      plan.push({ kind: 'first_draft', request: { kind: 'email' }, path: artifactPath(dir, id, 'first_draft') });
    } else if (tier === 'Tier 4') {
      plan.push({
        kind: 'first_draft',
        request: { kind: 'contact_form' },
        path: artifactPath(dir, id, 'first_draft', 'contact_form'),
      });
    }

    if ((tier === 'Tier 1' || tier === 'Tier 2') && lead.linkedin_url) {
      plan.push({ kind: 'linkedin', request: { kind: 'linkedin' }, path: artifactPath(dir, id, 'linkedin') });
    }

    if (tier === 'Tier 2' && lead.contact_email && !lead.email1_path) {
      plan.push({ kind: 'first_draft', request: { kind: 'email' }, path: artifactPath(dir, id, 'first_draft') });
    }

    return plan;
  }

  /** False when generation failed for the lead; the failure is in the report. */
  private async emitAll(report: OutreachReport, lead: Lead, emissions: readonly Emission[]): Promise<boolean> {
    try {
      for (const emission of emissions) {
        await this.emit(report, lead, emission);
      }
      return true;
    } catch (error) {
      if (!isScoutError(error) || error.kind !== 'ProviderUnavailable') throw error;
      report.failed.push({ leadId: lead.lead_id, kind: error.kind, reason: errorMessage(error) });
      this.logger.warn(`[OUTREACH] ${lead.lead_id} failed: ${error.message}`);
      return false;
    }
  }

  private async emit(report: OutreachReport, lead: Lead, { kind, request, path }: Emission): Promise<void> {
    const generator = report.dryRun ? this.placeholderGenerator : this.generator;
    const content = await generator.generate(lead, request);

    let previousPath: string | null = null;
    if (kind !== 'linkedin') {
      previousPath = report.dryRun
        ? lead[ARTIFACT_PATH_FIELD[kind]]
        : (await this.writeAndRecord(lead.lead_id, kind, path, content)).previousPath;
    } else if (!report.dryRun) {
      await this.writer.write(path, content);
    }

    const artifact: GeneratedArtifact = { leadId: lead.lead_id, kind, path, previousPath };
    report.generated.push(artifact);
    if (previousPath !== null) {
      report.regenerated.push(artifact);
      this.logger.log(`[OUTREACH] ${lead.lead_id} ${kind} regenerated (was ${previousPath})`);
    }
  }

  private async writeAndRecord(
    leadId: string,
    kind: Exclude<OutreachArtifactKind, 'linkedin'>,
    path: string,
    content: string,
  ): Promise<LedgerEntry> {
    await this.writer.write(path, content);
    return this.ledger.record(leadId, kind, path);
  }

  private emptyReport(dryRun: boolean): OutreachReport {
    return { dryRun, leads: 0, generated: [], regenerated: [], skipped: [], failed: [], exportPath: null };
  }

  private async finish(report: OutreachReport, label: string): Promise<OutreachReport> {
    if (!report.dryRun) {
      report.exportPath = (await this.legacy.exportToFile()).path;
    }
    this.logger.log(
      `Generated ${report.generated.length} ${label} for ${report.leads} leads (regenerated=${report.regenerated.length}, skipped=${report.skipped.length}, failed=${report.failed.length}${report.dryRun ? ', dry-run' : ''})`,
    );
    return report;
  }
}

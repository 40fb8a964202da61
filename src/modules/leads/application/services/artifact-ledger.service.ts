import { Injectable } from '@nestjs/common';

import { LeadsStoreService } from '@/modules/leads/application/services/leads-store.service';
import { ARTIFACT_PATH_FIELD, type ArtifactKind } from '@/modules/leads/domain/artifact-kind';
import type { LeadUpdate } from '@/modules/leads/domain/lead';

export interface LedgerEntry {
  leadId: string;
  kind: ArtifactKind;
  path: string;
  /** Path recorded before this call; set means this was a regeneration. */
  previousPath: string | null;
}

/**
 * Which outreach artifacts exist per lead, stored in the lead's path columns.
 * The ledger never blocks regeneration; it reports it.
 */
@Injectable()
export class ArtifactLedgerService {
  constructor(private readonly store: LeadsStoreService) {}

  async record(leadId: string, kind: ArtifactKind, path: string): Promise<LedgerEntry> {
    const field = ARTIFACT_PATH_FIELD[kind];
    const update: LeadUpdate = {};
    update[field] = path;

    const result = await this.store.upsert(leadId, update, {
      mustExist: true,
      overwriteArtifacts: true,
    });

    return { leadId, kind, path, previousPath: result.previous?.[field] ?? null };
  }

  async has(leadId: string, kind: ArtifactKind): Promise<boolean> {
    return (await this.pathOf(leadId, kind)) !== null;
  }

  async pathOf(leadId: string, kind: ArtifactKind): Promise<string | null> {
    const lead = await this.store.get(leadId);
    return lead[ARTIFACT_PATH_FIELD[kind]];
  }

  async entries(leadId: string): Promise<Record<ArtifactKind, string | null>> {
    const lead = await this.store.get(leadId);
    return {
      first_draft: lead.email1_path,
      followup: lead.followup_path,
      brief: lead.brief_path,
    };
  }
}

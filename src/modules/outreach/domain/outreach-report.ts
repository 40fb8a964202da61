import type { ArtifactKind } from '@/modules/leads/domain/artifact-kind';
import type { ErrorKind } from '@/modules/leads/domain/errors';

/** LinkedIn notes are written but not tracked in the ledger. */
export type OutreachArtifactKind = ArtifactKind | 'linkedin';

export interface GeneratedArtifact {
  leadId: string;
  kind: OutreachArtifactKind;
  path: string;
  /** Path the ledger held before; set when this replaces an earlier artifact. */
  previousPath: string | null;
}

export interface OutreachSkip {
  leadId: string;
  reason: string;
}

export interface OutreachFailure {
  leadId: string;
  kind: ErrorKind;
  reason: string;
}

export interface OutreachReport {
  dryRun: boolean;
  leads: number;
  generated: GeneratedArtifact[];
  regenerated: GeneratedArtifact[];
  skipped: OutreachSkip[];
  failed: OutreachFailure[];
  exportPath: string | null;
}

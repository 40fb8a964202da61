import type { ArtifactPathField } from '@/modules/leads/domain/lead';

export type ArtifactKind = 'first_draft' | 'followup' | 'brief';

export const ARTIFACT_PATH_FIELD: Record<ArtifactKind, ArtifactPathField> = {
  first_draft: 'email1_path',
  followup: 'followup_path',
  brief: 'brief_path',
};

import { join } from 'path';

import type { OutreachArtifactKind } from '@/modules/outreach/domain/outreach-report';

/** `<dir>/<lead_id>_<kind>[_<variant>].md` */
export function artifactPath(dir: string, leadId: string, kind: OutreachArtifactKind, variant?: string): string {
  const suffix = variant ? `_${variant}` : '';
  return join(dir, `${leadId}_${kind}${suffix}.md`);
}

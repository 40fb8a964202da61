import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { Injectable } from '@nestjs/common';

import type { ArtifactWriter } from '@/modules/outreach/application/ports/artifact-writer.port';

/** One markdown file per artifact, trimmed, ending in a single newline. */
@Injectable()
export class MarkdownFileWriter implements ArtifactWriter {
  async write(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${content.trim()}\n`, 'utf-8');
  }
}

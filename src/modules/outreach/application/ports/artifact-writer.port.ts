export const ARTIFACT_WRITER = Symbol('ARTIFACT_WRITER');

export interface ArtifactWriter {
  write(path: string, content: string): Promise<void>;
}

export type FetchResult =
  | { ok: true; url: string; html: string }
  | {
      ok: false;
      url: string;
      reason: string;
      /** Deliberately not fetched (robots.txt, dry-run) rather than a failed request. */
      skipped: boolean;
    };

export interface FetchedPage {
  url: string;
  html: string;
  /** Visible text, tags stripped and whitespace collapsed. */
  text: string;
}

export interface PageBundle {
  homepage: FetchedPage | null;
  contact: FetchedPage | null;
  about: FetchedPage | null;
}

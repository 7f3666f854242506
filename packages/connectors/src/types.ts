import type {
  DocumentPayload,
  DocumentReference,
  Logger,
  SourceId,
} from "@sdg-harvest/shared";

import type { HttpClient } from "./http/fetcher";

export interface SourceContext {
  http: HttpClient;
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * One supported catalogue. Variants hold site-specific URL templates and parsing
 * rules and keep no mutable state; all network access goes through `ctx.http`.
 */
export interface SourceAdapter {
  readonly id: SourceId;
  readonly name: string;
  readonly homepage: string;

  /** URL of listing page `page` (0-based). Pure. */
  listingUrl(page: number): string;

  /**
   * Fetch and parse one listing page.
   * Throws ParseError for an unrecognized page, FetchError once retries are spent.
   */
  listPage(page: number, ctx: SourceContext): Promise<DocumentReference[]>;

  /** Fetch the publication behind `ref` and its files. Same failure kinds as listPage. */
  fetchDocument(ref: DocumentReference, ctx: SourceContext): Promise<DocumentPayload>;
}

export interface SourceDescriptor {
  id: SourceId;
  name: string;
  homepage: string;
  adapter: SourceAdapter;
}

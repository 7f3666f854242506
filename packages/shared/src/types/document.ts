/** Registry key of a source, e.g. "undp". */
export type SourceId = string;

/** SDG goal numbers, 1..17. */
export type SdgLabel = number;

export interface DocumentMetadata {
  author?: string;
  /** Sorted, unique. */
  labels?: SdgLabel[];
  publishedAt?: string; // ISO date
  type?: string;
  year?: number;
}

/**
 * Pointer to one publication on a listing page, prior to download.
 * `downloadUrl` is the identity used for de-duplication within a run.
 */
export interface DocumentReference {
  readonly id: string;
  readonly sourceId: SourceId;
  readonly title: string | null;
  readonly page: number;
  readonly downloadUrl: string;
  readonly metadata: Readonly<DocumentMetadata>;
}

export interface DocumentFile {
  url: string;
  bytes: Uint8Array;
  /** Without the leading dot, e.g. "pdf". */
  extension: string;
  contentType?: string;
}

export interface DocumentPayload {
  title: string | null;
  metadata: DocumentMetadata;
  files: DocumentFile[];
}

export type FetchFailure = {
  kind: "transient" | "permanent" | "parse" | "cancelled";
  message: string;
  statusCode?: number;
};

export type FetchOutcome =
  | { status: "ok"; payload: DocumentPayload }
  | { status: "failed"; error: FetchFailure };

export interface FetchResult {
  ref: DocumentReference;
  outcome: FetchOutcome;
}

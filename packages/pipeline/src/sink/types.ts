import type {
  DocumentPayload,
  DocumentReference,
  RunSummary,
  SdgLabel,
} from "@sdg-harvest/shared";

export interface StoredFile {
  url: string;
  /** File name inside the destination directory. */
  name: string;
  bytes: number;
  sha256: string;
}

/** What the sidecar JSON and the run export hold for one saved publication. */
export interface PublicationRecord {
  id: string;
  source: string;
  url: string;
  title: string | null;
  type: string | null;
  year: number | null;
  labels: SdgLabel[];
  author: string | null;
  publishedAt: string | null;
  page: number;
  files: StoredFile[];
  harvestedAt: string;
}

/**
 * Destination for harvested publications. Writes are serialized by the sink
 * itself, so callers may invoke `save` without awaiting the previous call.
 */
export interface Sink {
  /** Check the destination before the first fetch. Throws IOError. */
  open(): Promise<void>;
  /** Persist one publication. Throws IOError; nothing partial stays behind. */
  save(ref: DocumentReference, payload: DocumentPayload): Promise<PublicationRecord>;
  /** Write the run export. Resolves with its path, or null when nothing was saved. */
  finalize(summary: RunSummary): Promise<string | null>;
}

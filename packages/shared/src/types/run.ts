/** Inclusive on both ends. */
export interface PageRange {
  start: number;
  end: number;
}

export const DEFAULT_PAGE_RANGE: Readonly<PageRange> = { start: 0, end: 1 };

export type PageStatus = "ok" | "skipped";

export interface PageOutcome {
  page: number;
  status: PageStatus;
  /** References listed on the page, before de-duplication. */
  references: number;
  dispatched: number;
  error?: { code: string; message: string };
}

export interface DocumentFailure {
  refId: string;
  url: string;
  page: number;
  kind: "transient" | "permanent" | "parse" | "cancelled";
  message: string;
  statusCode?: number;
}

export interface RunSummary {
  runId: string;
  source: string;
  range: PageRange;
  attempted: number;
  succeeded: number;
  failed: number;
  duplicates: number;
  pages: PageOutcome[];
  failures: DocumentFailure[];
  cancelled: boolean;
  startedAt: string; // ISO
  finishedAt: string; // ISO
  metadataFile: string | null;
}

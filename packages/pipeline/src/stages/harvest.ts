import { randomUUID } from "node:crypto";

import type { HttpClient, SourceAdapter, SourceContext } from "@sdg-harvest/connectors";
import {
  assertValidPageRange,
  canonicalizeUrl,
  createRunLogger,
  DEFAULT_PAGE_RANGE,
  type DocumentFailure,
  type DocumentReference,
  errorMessage,
  FetchError,
  type FetchFailure,
  type FetchResult,
  isHarvestError,
  type Logger,
  type PageOutcome,
  type PageRange,
  pagesOf,
  ParseError,
  type RunSummary,
} from "@sdg-harvest/shared";
import pLimit, { type LimitFunction } from "p-limit";

import type { Sink } from "../sink/types";

export const DEFAULT_CONCURRENCY = 4;

export type PipelineState =
  | { phase: "idle" }
  | { phase: "listing"; page: number }
  | { phase: "dispatching"; page: number }
  | { phase: "collecting"; page: number }
  | { phase: "done" };

export interface HarvestPipelineOptions {
  adapter: SourceAdapter;
  http: HttpClient;
  sink: Sink;
  /** Inclusive; defaults to pages 0..1. */
  range?: PageRange;
  /** Publications fetched at the same time across the whole run. */
  concurrency?: number;
  signal?: AbortSignal;
  runId?: string;
  onTransition?: (state: PipelineState) => void;
  now?: () => Date;
}

/** Key under which two references count as the same document. */
export function dedupeKey(url: string): string {
  try {
    return canonicalizeUrl(url);
  } catch {
    return url.trim();
  }
}

function toFailure(error: unknown): FetchFailure {
  if (error instanceof FetchError) {
    return { kind: error.kind, message: error.message, statusCode: error.statusCode };
  }
  if (error instanceof ParseError) {
    return { kind: "parse", message: error.message };
  }
  return { kind: "permanent", message: errorMessage(error) };
}

function isCancellation(error: unknown): boolean {
  return error instanceof FetchError && error.kind === "cancelled";
}

/**
 * Harvests one source over a page range:
 * idle -> listing(n) -> dispatching(n) -> collecting(n) -> ... -> done.
 *
 * Pages run strictly in order. A page that cannot be listed is skipped, whatever
 * the error; a document that cannot be fetched is recorded as a failure. Only an
 * invalid range and sink errors abort the run.
 */
export class HarvestPipeline {
  private current: PipelineState = { phase: "idle" };
  private readonly limit: LimitFunction;
  private readonly runId: string;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: HarvestPipelineOptions) {
    this.limit = pLimit(Math.max(1, Math.floor(options.concurrency ?? DEFAULT_CONCURRENCY)));
    this.runId = options.runId ?? randomUUID();
    this.log = createRunLogger(this.runId);
    this.now = options.now ?? (() => new Date());
  }

  get state(): PipelineState {
    return this.current;
  }

  async run(): Promise<RunSummary> {
    if (this.current.phase !== "idle") {
      throw new Error(`Pipeline ${this.runId} has already run`);
    }

    const { adapter, sink, signal } = this.options;
    const range = assertValidPageRange(this.options.range ?? DEFAULT_PAGE_RANGE);
    await sink.open();

    const startedAt = this.now().toISOString();
    const ctx: SourceContext = { http: this.options.http, signal, log: this.log };
    const seen = new Set<string>();
    const pages: PageOutcome[] = [];
    const failures: DocumentFailure[] = [];
    let attempted = 0;
    let succeeded = 0;
    let duplicates = 0;
    let cancelled = false;

    this.log.info({ source: adapter.id, range }, "Harvest started");

    for (const page of pagesOf(range)) {
      if (signal?.aborted) {
        cancelled = true;
        break;
      }

      this.transition({ phase: "listing", page });
      let refs: DocumentReference[];
      try {
        refs = await adapter.listPage(page, ctx);
      } catch (error) {
        const code = isHarvestError(error) ? error.code : "UNEXPECTED_ERROR";
        const message = errorMessage(error);
        this.log.warn({ page, code, err: message }, "Skipping listing page");
        pages.push({
          page,
          status: "skipped",
          references: 0,
          dispatched: 0,
          error: { code, message },
        });
        if (isCancellation(error)) {
          cancelled = true;
          break;
        }
        continue;
      }

      this.transition({ phase: "dispatching", page });
      const unique: DocumentReference[] = [];
      for (const ref of refs) {
        const key = dedupeKey(ref.downloadUrl);
        if (seen.has(key)) {
          duplicates += 1;
          continue;
        }
        seen.add(key);
        unique.push(ref);
      }
      attempted += unique.length;
      const pending = unique.map((ref) => this.limit(() => this.fetchOne(ref, ctx)));

      this.transition({ phase: "collecting", page });
      const results = await Promise.all(pending);
      for (const { ref, outcome } of results) {
        if (outcome.status === "ok" && !signal?.aborted) {
          await sink.save(ref, outcome.payload);
          succeeded += 1;
          continue;
        }
        const error: FetchFailure =
          outcome.status === "failed"
            ? outcome.error
            : { kind: "cancelled", message: "Run cancelled before the document was saved" };
        failures.push({
          refId: ref.id,
          url: ref.downloadUrl,
          page,
          kind: error.kind,
          message: error.message,
          statusCode: error.statusCode,
        });
      }

      pages.push({ page, status: "ok", references: refs.length, dispatched: unique.length });
      this.log.info(
        { page, references: refs.length, dispatched: unique.length, failures: failures.length },
        "Page done",
      );
    }

    if (signal?.aborted) cancelled = true;

    const summary: RunSummary = {
      runId: this.runId,
      source: adapter.id,
      range,
      attempted,
      succeeded,
      failed: failures.length,
      duplicates,
      pages,
      failures,
      cancelled,
      startedAt,
      finishedAt: this.now().toISOString(),
      metadataFile: null,
    };
    summary.metadataFile = await sink.finalize(summary);

    this.transition({ phase: "done" });
    this.log.info(
      {
        attempted,
        succeeded,
        failed: summary.failed,
        duplicates,
        cancelled,
        metadataFile: summary.metadataFile,
      },
      "Harvest finished",
    );
    return summary;
  }

  private async fetchOne(ref: DocumentReference, ctx: SourceContext): Promise<FetchResult> {
    if (ctx.signal?.aborted) {
      return {
        ref,
        outcome: {
          status: "failed",
          error: { kind: "cancelled", message: "Run cancelled before the document was fetched" },
        },
      };
    }
    try {
      const payload = await this.options.adapter.fetchDocument(ref, ctx);
      return { ref, outcome: { status: "ok", payload } };
    } catch (error) {
      const failure = toFailure(error);
      this.log.warn(
        {
          refId: ref.id,
          url: ref.downloadUrl,
          kind: failure.kind,
          code: isHarvestError(error) ? error.code : undefined,
          err: failure.message,
        },
        "Document failed",
      );
      return { ref, outcome: { status: "failed", error: failure } };
    }
  }

  private transition(next: PipelineState): void {
    this.current = next;
    this.log.debug({ state: next }, "Pipeline transition");
    this.options.onTransition?.(next);
  }
}

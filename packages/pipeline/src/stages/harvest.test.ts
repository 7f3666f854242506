import type { HttpClient, SourceAdapter } from "@sdg-harvest/connectors";
import {
  type DocumentPayload,
  type DocumentReference,
  FetchError,
  InvalidRangeError,
  IOError,
  ParseError,
  type RunSummary,
} from "@sdg-harvest/shared";
import { describe, expect, it, vi } from "vitest";

import type { PublicationRecord, Sink } from "../sink/types";
import { dedupeKey, HarvestPipeline, type PipelineState } from "./harvest";

const PAYLOAD: DocumentPayload = { title: "Doc", metadata: { labels: [1] }, files: [] };

let nextId = 0;
function ref(page: number, url: string): DocumentReference {
  nextId += 1;
  return { id: `fake-${nextId}`, sourceId: "fake", title: null, page, downloadUrl: url, metadata: {} };
}

class FakeAdapter implements SourceAdapter {
  readonly id = "fake";
  readonly name = "Fake source";
  readonly homepage = "https://example.org";
  readonly listCalls: number[] = [];
  readonly fetchCalls: string[] = [];

  constructor(
    private readonly pages: Record<number, DocumentReference[] | Error>,
    private readonly fetchImpl: (ref: DocumentReference) => Promise<DocumentPayload> = async () =>
      PAYLOAD,
  ) {}

  listingUrl(page: number): string {
    return `https://example.org/list/${page}`;
  }

  async listPage(page: number): Promise<DocumentReference[]> {
    this.listCalls.push(page);
    const entry = this.pages[page];
    if (entry instanceof Error) throw entry;
    return entry ?? [];
  }

  async fetchDocument(ref: DocumentReference): Promise<DocumentPayload> {
    this.fetchCalls.push(ref.downloadUrl);
    return this.fetchImpl(ref);
  }
}

class MemorySink implements Sink {
  opened = 0;
  readonly saved: string[] = [];
  finalized: RunSummary | null = null;

  constructor(private readonly errors: { open?: Error; save?: Error } = {}) {}

  async open(): Promise<void> {
    this.opened += 1;
    if (this.errors.open) throw this.errors.open;
  }

  async save(ref: DocumentReference, payload: DocumentPayload): Promise<PublicationRecord> {
    if (this.errors.save) throw this.errors.save;
    this.saved.push(ref.id);
    return {
      id: ref.id,
      source: ref.sourceId,
      url: ref.downloadUrl,
      title: payload.title,
      type: null,
      year: null,
      labels: payload.metadata.labels ?? [],
      author: null,
      publishedAt: null,
      page: ref.page,
      files: [],
      harvestedAt: "2024-01-01T00:00:00.000Z",
    };
  }

  async finalize(summary: RunSummary): Promise<string | null> {
    this.finalized = summary;
    return this.saved.length > 0 ? "/data/publications-240101-000000.jsonl" : null;
  }
}

const http: HttpClient = { getText: vi.fn(), getBytes: vi.fn() };

function transient(url: string): FetchError {
  return new FetchError(`HTTP 503 for ${url}`, { kind: "transient", url, statusCode: 503 });
}

describe("dedupeKey", () => {
  it("treats tracking parameters, fragments and trailing slashes as the same URL", () => {
    expect(dedupeKey("https://EXAMPLE.org/doc/a/?utm_source=x#top")).toBe(
      dedupeKey("https://example.org/doc/a"),
    );
  });
});

describe("HarvestPipeline", () => {
  it("rejects an inverted range before listing anything or opening the sink", async () => {
    const adapter = new FakeAdapter({});
    const sink = new MemorySink();
    const pipeline = new HarvestPipeline({ adapter, http, sink, range: { start: 3, end: 1 } });

    await expect(pipeline.run()).rejects.toBeInstanceOf(InvalidRangeError);
    expect(adapter.listCalls).toEqual([]);
    expect(sink.opened).toBe(0);
    expect(pipeline.state).toEqual({ phase: "idle" });
  });

  it("fails with IOError before the first page when the sink cannot open", async () => {
    const adapter = new FakeAdapter({ 0: [ref(0, "https://example.org/doc/a")] });
    const sink = new MemorySink({ open: new IOError("Destination is not writable: /x", "/x") });

    await expect(new HarvestPipeline({ adapter, http, sink }).run()).rejects.toBeInstanceOf(IOError);
    expect(adapter.listCalls).toEqual([]);
  });

  it("dispatches each canonical URL once across pages", async () => {
    const adapter = new FakeAdapter({
      0: [
        ref(0, "https://example.org/doc/a"),
        ref(0, "https://example.org/doc/a/"),
        ref(0, "https://EXAMPLE.org/doc/a?utm_source=feed"),
        ref(0, "https://example.org/doc/b"),
      ],
      1: [ref(1, "https://example.org/doc/b#files"), ref(1, "https://example.org/doc/c")],
    });
    const sink = new MemorySink();

    const summary = await new HarvestPipeline({ adapter, http, sink }).run();

    expect(adapter.fetchCalls).toEqual([
      "https://example.org/doc/a",
      "https://example.org/doc/b",
      "https://example.org/doc/c",
    ]);
    expect(summary).toMatchObject({ attempted: 3, succeeded: 3, failed: 0, duplicates: 3 });
    expect(summary.pages).toEqual([
      { page: 0, status: "ok", references: 4, dispatched: 2 },
      { page: 1, status: "ok", references: 2, dispatched: 1 },
    ]);
    expect(summary.metadataFile).toBe("/data/publications-240101-000000.jsonl");
  });

  it("saves successes in listing order regardless of completion order", async () => {
    const delays: Record<string, number> = {
      "https://example.org/doc/slow": 20,
      "https://example.org/doc/fast": 1,
    };
    const slow = ref(0, "https://example.org/doc/slow");
    const fast = ref(0, "https://example.org/doc/fast");
    const adapter = new FakeAdapter({ 0: [slow, fast] }, async (r) => {
      await new Promise((resolve) => setTimeout(resolve, delays[r.downloadUrl] ?? 0));
      return PAYLOAD;
    });
    const sink = new MemorySink();

    await new HarvestPipeline({ adapter, http, sink, range: { start: 0, end: 0 } }).run();

    expect(sink.saved).toEqual([slow.id, fast.id]);
  });

  it("reaches done with every document failed when all fetches fail transiently", async () => {
    const adapter = new FakeAdapter(
      {
        0: [ref(0, "https://example.org/doc/1"), ref(0, "https://example.org/doc/2")],
        1: [ref(1, "https://example.org/doc/3"), ref(1, "https://example.org/doc/4")],
      },
      async (r) => {
        throw transient(r.downloadUrl);
      },
    );
    const sink = new MemorySink();
    const pipeline = new HarvestPipeline({ adapter, http, sink });

    const summary = await pipeline.run();

    expect(summary).toMatchObject({ attempted: 4, succeeded: 0, failed: 4, metadataFile: null });
    expect(summary.failures.map((f) => [f.kind, f.statusCode])).toEqual([
      ["transient", 503],
      ["transient", 503],
      ["transient", 503],
      ["transient", 503],
    ]);
    expect(pipeline.state).toEqual({ phase: "done" });
    expect(sink.finalized).not.toBeNull();
  });

  it("skips a page that cannot be parsed and carries on", async () => {
    const adapter = new FakeAdapter({
      0: [ref(0, "https://example.org/doc/p0")],
      1: [ref(1, "https://example.org/doc/p1")],
      2: [ref(2, "https://example.org/doc/p2")],
      3: new ParseError("listing has no cards"),
      4: [ref(4, "https://example.org/doc/p4")],
    });
    const sink = new MemorySink();

    const summary = await new HarvestPipeline({
      adapter,
      http,
      sink,
      range: { start: 0, end: 4 },
    }).run();

    expect(adapter.listCalls).toEqual([0, 1, 2, 3, 4]);
    expect(summary.pages.map((p) => [p.page, p.status])).toEqual([
      [0, "ok"],
      [1, "ok"],
      [2, "ok"],
      [3, "skipped"],
      [4, "ok"],
    ]);
    expect(summary.pages[3]?.error).toEqual({
      code: "PARSE_ERROR",
      message: "listing has no cards",
    });
    expect(summary.succeeded).toBe(4);
  });

  it("skips a page whose listing fails unexpectedly and still ends with a summary", async () => {
    const adapter = new FakeAdapter({
      0: new TypeError("Cannot read properties of undefined"),
      1: [ref(1, "https://example.org/doc/after")],
    });
    const pipeline = new HarvestPipeline({ adapter, http, sink: new MemorySink() });

    const summary = await pipeline.run();

    expect(summary.pages).toEqual([
      {
        page: 0,
        status: "skipped",
        references: 0,
        dispatched: 0,
        error: { code: "UNEXPECTED_ERROR", message: "Cannot read properties of undefined" },
      },
      { page: 1, status: "ok", references: 1, dispatched: 1 },
    ]);
    expect(summary.succeeded).toBe(1);
    expect(pipeline.state).toEqual({ phase: "done" });
  });

  it("records per-document failures by kind", async () => {
    const adapter = new FakeAdapter(
      {
        0: [
          ref(0, "https://example.org/doc/ok"),
          ref(0, "https://example.org/doc/unlabelled"),
          ref(0, "https://example.org/doc/broken"),
        ],
      },
      async (r) => {
        if (r.downloadUrl.endsWith("unlabelled")) throw new ParseError("no SDG labels");
        if (r.downloadUrl.endsWith("broken")) throw new TypeError("boom");
        return PAYLOAD;
      },
    );

    const summary = await new HarvestPipeline({
      adapter,
      http,
      sink: new MemorySink(),
      range: { start: 0, end: 0 },
    }).run();

    expect(summary.succeeded).toBe(1);
    expect(summary.failures.map((f) => [f.url, f.kind, f.message])).toEqual([
      ["https://example.org/doc/unlabelled", "parse", "no SDG labels"],
      ["https://example.org/doc/broken", "permanent", "boom"],
    ]);
  });

  it("never runs more fetches at once than its concurrency", async () => {
    let active = 0;
    let peak = 0;
    const refs = Array.from({ length: 10 }, (_, i) => ref(0, `https://example.org/doc/${i}`));
    const adapter = new FakeAdapter({ 0: refs }, async () => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return PAYLOAD;
    });

    const summary = await new HarvestPipeline({
      adapter,
      http,
      sink: new MemorySink(),
      range: { start: 0, end: 0 },
      concurrency: 3,
    }).run();

    expect(summary.succeeded).toBe(10);
    expect(peak).toBe(3);
  });

  it("propagates a sink failure", async () => {
    const adapter = new FakeAdapter({ 0: [ref(0, "https://example.org/doc/a")] });
    const sink = new MemorySink({ save: new IOError("Could not write /x/a.pdf", "/x/a.pdf") });
    const pipeline = new HarvestPipeline({ adapter, http, sink });

    await expect(pipeline.run()).rejects.toThrow("Could not write /x/a.pdf");
    expect(adapter.listCalls).toEqual([0]);
    expect(sink.finalized).toBeNull();
  });

  it("stops between pages and commits nothing once cancelled", async () => {
    const controller = new AbortController();
    const adapter = new FakeAdapter(
      {
        0: [ref(0, "https://example.org/doc/a"), ref(0, "https://example.org/doc/b")],
        1: [ref(1, "https://example.org/doc/c")],
      },
      async () => {
        controller.abort();
        return PAYLOAD;
      },
    );
    const sink = new MemorySink();
    const pipeline = new HarvestPipeline({ adapter, http, sink, signal: controller.signal });

    const summary = await pipeline.run();

    expect(summary.cancelled).toBe(true);
    expect(adapter.listCalls).toEqual([0]);
    expect(sink.saved).toEqual([]);
    expect(summary.succeeded).toBe(0);
    expect(summary.failures.map((f) => f.kind)).toEqual(["cancelled", "cancelled"]);
    expect(pipeline.state).toEqual({ phase: "done" });
  });

  it("reports every state transition in order", async () => {
    const states: PipelineState[] = [];
    const adapter = new FakeAdapter({ 0: [ref(0, "https://example.org/doc/a")] });

    await new HarvestPipeline({
      adapter,
      http,
      sink: new MemorySink(),
      range: { start: 0, end: 0 },
      onTransition: (state) => states.push(state),
    }).run();

    expect(states).toEqual([
      { phase: "listing", page: 0 },
      { phase: "dispatching", page: 0 },
      { phase: "collecting", page: 0 },
      { phase: "done" },
    ]);
  });

  it("can only run once", async () => {
    const pipeline = new HarvestPipeline({
      adapter: new FakeAdapter({}),
      http,
      sink: new MemorySink(),
      range: { start: 0, end: 0 },
      runId: "run-1",
    });

    await pipeline.run();

    await expect(pipeline.run()).rejects.toThrow("Pipeline run-1 has already run");
  });
});

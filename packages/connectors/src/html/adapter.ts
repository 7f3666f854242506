import {
  canonicalizeUrl,
  type DocumentFile,
  type DocumentMetadata,
  type DocumentPayload,
  type DocumentReference,
  errorMessage,
  ParseError,
  sha256Hex,
  type SourceId,
} from "@sdg-harvest/shared";

import type { HttpResponse } from "../http/fetcher";
import type { SourceAdapter, SourceContext } from "../types";

/** A publication teaser on a listing page. */
export interface ListingCard {
  url: string;
  title: string | null;
  metadata: DocumentMetadata;
}

/** What a publication page yields before any file is downloaded. */
export interface PublicationPage {
  title: string | null;
  metadata: DocumentMetadata;
  /** File sources: absolute PDF URLs, listing order. */
  fileUrls?: string[];
  /** Text sources: the article body. */
  text?: string | null;
}

export interface HtmlSourceDefinition {
  id: SourceId;
  name: string;
  homepage: string;
  /** "files" downloads linked PDFs; "text" stores the page body as .txt. */
  mode: "files" | "text";
  listingUrl(page: number): string;
  /** Throws ParseError when no publication card can be recognized. */
  parseListing(html: string): ListingCard[];
  parsePublication(html: string, ref: DocumentReference): PublicationPage;
}

export function makeReferenceId(sourceId: SourceId, url: string): string {
  return `${sourceId}-${sha256Hex(canonicalizeUrl(url)).slice(0, 16)}`;
}

function mergeMetadata(listing: DocumentMetadata, page: DocumentMetadata): DocumentMetadata {
  const merged: DocumentMetadata = { ...listing };
  for (const [key, value] of Object.entries(page)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value) && value.length === 0) continue;
    Object.assign(merged, { [key]: value });
  }
  return merged;
}

function extensionOf(response: HttpResponse): string {
  const path = new URL(response.finalUrl).pathname.toLowerCase();
  const dot = path.lastIndexOf(".");
  if (dot >= 0 && dot > path.lastIndexOf("/")) {
    const ext = path.slice(dot + 1);
    if (/^[a-z0-9]{1,8}$/.test(ext)) return ext;
  }
  if (response.contentType?.includes("application/pdf")) return "pdf";
  return "bin";
}

async function downloadFiles(
  urls: string[],
  ref: DocumentReference,
  ctx: SourceContext,
): Promise<DocumentFile[]> {
  const settled = await Promise.allSettled(
    urls.map((url) => ctx.http.getBytes(url, { accept: "application/pdf,*/*", signal: ctx.signal })),
  );

  const files: DocumentFile[] = [];
  let firstError: unknown = null;
  settled.forEach((result, index) => {
    if (result.status === "fulfilled") {
      const response = result.value;
      files.push({
        url: urls[index] ?? response.url,
        bytes: response.bytes,
        extension: extensionOf(response),
        contentType: response.contentType ?? undefined,
      });
      return;
    }
    firstError ??= result.reason;
    ctx.log?.warn(
      { refId: ref.id, url: urls[index], err: errorMessage(result.reason) },
      "Could not download a file",
    );
  });

  // A publication is kept when at least one of its files arrived.
  if (files.length === 0 && firstError !== null) throw firstError;
  return files;
}

/**
 * Build a SourceAdapter for a catalogue that publishes HTML listing pages and one
 * HTML page per publication.
 */
export function createHtmlSourceAdapter(def: HtmlSourceDefinition): SourceAdapter {
  return {
    id: def.id,
    name: def.name,
    homepage: def.homepage,
    listingUrl: def.listingUrl,

    async listPage(page: number, ctx: SourceContext): Promise<DocumentReference[]> {
      const url = def.listingUrl(page);
      const html = await ctx.http.getText(url, { signal: ctx.signal });

      let cards: ListingCard[];
      try {
        cards = def.parseListing(html);
      } catch (error) {
        if (error instanceof ParseError) throw error;
        throw new ParseError(`Could not parse listing page ${page}: ${errorMessage(error)}`, url, error);
      }

      return cards.map((card) => ({
        id: makeReferenceId(def.id, card.url),
        sourceId: def.id,
        title: card.title,
        page,
        downloadUrl: card.url,
        metadata: card.metadata,
      }));
    },

    async fetchDocument(ref: DocumentReference, ctx: SourceContext): Promise<DocumentPayload> {
      const html = await ctx.http.getText(ref.downloadUrl, { signal: ctx.signal });
      const publication = def.parsePublication(html, ref);
      const metadata = mergeMetadata(ref.metadata, publication.metadata);
      const title = publication.title ?? ref.title;

      if (!metadata.labels || metadata.labels.length === 0) {
        throw new ParseError(`Publication has no SDG labels: ${ref.downloadUrl}`, ref.downloadUrl);
      }

      if (def.mode === "text") {
        const text = publication.text?.trim();
        if (!text) {
          throw new ParseError(`Publication has no text: ${ref.downloadUrl}`, ref.downloadUrl);
        }
        return {
          title,
          metadata,
          files: [
            {
              url: ref.downloadUrl,
              bytes: new TextEncoder().encode(text),
              extension: "txt",
              contentType: "text/plain; charset=utf-8",
            },
          ],
        };
      }

      const fileUrls = [...new Set(publication.fileUrls ?? [])];
      if (fileUrls.length === 0) {
        throw new ParseError(`Publication has no PDF files: ${ref.downloadUrl}`, ref.downloadUrl);
      }
      return { title, metadata, files: await downloadFiles(fileUrls, ref, ctx) };
    },
  };
}

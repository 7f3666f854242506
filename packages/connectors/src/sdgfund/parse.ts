import { type DocumentMetadata, ParseError, resolveUrl } from "@sdg-harvest/shared";
import * as cheerio from "cheerio";

import type { ListingCard, PublicationPage } from "../html/adapter";
import { cleanText, isPdfUrl, parseSdgLabels } from "../html/extract";

// Archived since 2023 but still served.
export const SDGFUND_BASE_URL = "https://www.sdgfund.org";

export function parseSdgFundListing(html: string): ListingCard[] {
  const $ = cheerio.load(html);
  const teasers = $("div.row-publication-teaser");
  if (teasers.length === 0) {
    throw new ParseError("SDG Fund listing has no div.row-publication-teaser elements");
  }

  const out: ListingCard[] = [];
  teasers.each((_, teaser) => {
    const anchor = $(teaser).find("a").first();
    const url = resolveUrl(anchor.attr("href"), SDGFUND_BASE_URL);
    if (!url) return;
    out.push({ url, title: cleanText(anchor.text()), metadata: {} });
  });
  return out;
}

export function parseSdgFundPublication(html: string): PublicationPage {
  const $ = cheerio.load(html);

  const metadata: DocumentMetadata = {};
  const yearText = cleanText($("span.date-display-single").first().text());
  if (yearText && /^\d{4}$/.test(yearText)) metadata.year = Number.parseInt(yearText, 10);

  // Goal icons carry the goal in their title, e.g. "Goal 6: Clean water and sanitation".
  const titles = $("a.sdg-icon-small")
    .map((_, a) => $(a).attr("title"))
    .get();
  metadata.labels = parseSdgLabels(titles.map((t) => t.replace(/:.*$/, "")));

  const fileUrls = $("a.library-link")
    .map((_, a) => resolveUrl($(a).attr("href"), SDGFUND_BASE_URL))
    .get()
    .filter((url) => isPdfUrl(url));

  return {
    title: cleanText($("h1").first().text()),
    metadata,
    fileUrls,
  };
}

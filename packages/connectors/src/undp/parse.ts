import { type DocumentMetadata, ParseError, resolveUrl } from "@sdg-harvest/shared";
import * as cheerio from "cheerio";

import type { ListingCard, PublicationPage } from "../html/adapter";
import { cleanText, isPdfUrl, parseLongDate, parseSdgLabels } from "../html/extract";

export const UNDP_BASE_URL = "https://www.undp.org";

export function parseUndpListing(html: string): ListingCard[] {
  const $ = cheerio.load(html);
  const cards = $("div.content-card");
  if (cards.length === 0) {
    throw new ParseError("UNDP listing has no div.content-card elements");
  }

  const out: ListingCard[] = [];
  cards.each((_, card) => {
    const url = resolveUrl($(card).find("a").first().attr("href"), UNDP_BASE_URL);
    if (!url) return;
    out.push({ url, title: cleanText($(card).find("h4, h5, h3").first().text()), metadata: {} });
  });
  return out;
}

/**
 * Rows of the publication side menu: a heading ("Sustainable Development Goals",
 * "Publication type") keyed by its last word, and the linked values.
 */
function parseDetails($: cheerio.CheerioAPI): Map<string, string[]> {
  const details = new Map<string, string[]>();
  $("div.publication-menu div.coh-row-inner").each((_, row) => {
    const heading = cleanText($(row).find("h6").first().text());
    const nav = $(row).find("nav.menu").first();
    if (!heading || nav.length === 0) return;
    const key = heading.toLowerCase().split(" ").pop() ?? heading.toLowerCase();
    const values = nav
      .find("a")
      .map((_, a) => cleanText($(a).text()))
      .get();
    details.set(key, values);
  });
  return details;
}

export function parseUndpPublication(html: string): PublicationPage {
  const $ = cheerio.load(html);
  const details = parseDetails($);

  const metadata: DocumentMetadata = {};
  const types = details.get("type");
  if (types && types.length > 0) metadata.type = types.join("|");
  const goals = details.get("goals");
  if (goals) metadata.labels = parseSdgLabels(goals);

  const publishedAt = parseLongDate($("h6.coh-heading").first().text());
  if (publishedAt) {
    metadata.publishedAt = publishedAt;
    metadata.year = Number.parseInt(publishedAt.slice(0, 4), 10);
  }

  const fileUrls = $("a.download-btn")
    .map((_, a) => resolveUrl($(a).attr("href"), UNDP_BASE_URL))
    .get()
    .filter((url) => isPdfUrl(url));

  return {
    title: cleanText($("h2.coh-heading").first().text()),
    metadata,
    fileUrls,
  };
}

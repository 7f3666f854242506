import { type DocumentMetadata, ParseError, resolveUrl } from "@sdg-harvest/shared";
import * as cheerio from "cheerio";

import type { ListingCard, PublicationPage } from "../html/adapter";
import { cleanText, extractYear, isPdfUrl, parseSdgLabels } from "../html/extract";

export const UNDESA_BASE_URL = "https://sdgs.un.org";

export function parseUndesaListing(html: string): ListingCard[] {
  const $ = cheerio.load(html);
  const cards = $("div.card-custom");
  if (cards.length === 0) {
    throw new ParseError("UN DESA listing has no div.card-custom elements");
  }

  const out: ListingCard[] = [];
  cards.each((_, card) => {
    const anchor = $(card).find("a").first();
    const url = resolveUrl(anchor.attr("href"), UNDESA_BASE_URL);
    if (!url) return;
    out.push({ url, title: cleanText(anchor.text()), metadata: {} });
  });
  return out;
}

export function parseUndesaPublication(html: string): PublicationPage {
  const $ = cheerio.load(html);

  const metadata: DocumentMetadata = {};
  const year = extractYear($("span.date").first().text());
  if (year !== null) metadata.year = year;

  const goals = $("div.goals-content").first();
  if (goals.length > 0) {
    metadata.labels = parseSdgLabels(goals.find("span").map((_, span) => $(span).text()).get());
  }

  const fileUrls = $("#myTabContent a.document-name")
    .map((_, a) => resolveUrl($(a).attr("href"), UNDESA_BASE_URL))
    .get()
    .filter((url) => isPdfUrl(url));

  return {
    title: cleanText($("h1").first().text()),
    metadata,
    fileUrls,
  };
}

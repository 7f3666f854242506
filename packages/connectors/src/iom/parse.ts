import { type DocumentMetadata, ParseError, resolveUrl } from "@sdg-harvest/shared";
import * as cheerio from "cheerio";

import type { ListingCard, PublicationPage } from "../html/adapter";
import { cleanText, extractYear } from "../html/extract";

export const IOM_BASE_URL = "https://www.iom.int";

// Taxonomy term ids of the SDG facet on /search, in goal order 1..17.
const SDG_FACET_TERMS = [
  "1960", "1961", "1962", "1964", "1963", "1973", "1967", "1965", "1966",
  "1968", "1969", "1976", "1970", "1975", "1974", "1971", "1972",
];

const CONTENT_TYPES = ["blog_list", "featured_stories", "press_release"];

// ".../sdgs-icon/e_web_10.png?itok=68_FmtiD" -> 10
const SDG_ICON_PATTERN = /\/public\/sdg.*\/e_web_(\d{2}).*\.png/;

export function iomListingUrl(page: number): string {
  const params = new URLSearchParams();
  params.set("keywords", "");
  CONTENT_TYPES.forEach((type, i) => params.set(`type[${i}]`, type));
  params.set("region_country", "");
  SDG_FACET_TERMS.forEach((term, i) => params.set(`sdgs[${i}]`, term));
  params.set("created", "All");
  params.set("sort_bef_combine", "created_DESC");
  params.set("page", String(page));
  return `${IOM_BASE_URL}/search?${params.toString()}`;
}

export function parseIomListing(html: string): ListingCard[] {
  const $ = cheerio.load(html);
  const details = $("div.article-detail");
  if (details.length === 0) {
    throw new ParseError("IOM search page has no div.article-detail elements");
  }

  const out: ListingCard[] = [];
  details.each((_, detail) => {
    // Stories are not nested inside their card, so the card is the parent.
    const card = $(detail).parent();
    // Stories live on a subdomain and come with absolute links.
    const url = resolveUrl(card.find("a").first().attr("href"), IOM_BASE_URL);
    if (!url) return;

    const metadata: DocumentMetadata = {};
    const type = cleanText(card.find("div.tag").first().text());
    if (type) metadata.type = type;
    const year = extractYear(card.find("div.date").first().text());
    if (year !== null) metadata.year = year;

    out.push({ url, title: cleanText(card.find("h5.title").first().text()), metadata });
  });
  return out;
}

export function parseIomLabels($: cheerio.CheerioAPI): number[] {
  const block = $("div.field--name-dynamic-block-fieldnode-sdg-sorted").first();
  const images = block.length > 0 ? block.find("img") : $("img");
  const labels = new Set<number>();
  images.each((_, img) => {
    const match = ($(img).attr("src") ?? "").match(SDG_ICON_PATTERN);
    if (match?.[1]) labels.add(Number.parseInt(match[1], 10));
  });
  return [...labels].sort((a, b) => a - b);
}

function parseBodyText($: cheerio.CheerioAPI): string | null {
  const blog = $("div.node--type-blog-list").first();
  if (blog.length > 0) {
    return cleanBody(blog.find("div.field--name-field-contents").first().text());
  }
  const news = $("div.narrow-content").first();
  if (news.length > 0) {
    return cleanBody(news.find("div.field--type-text-with-summary").first().text());
  }
  const story = $("div[data-history-node-id]")
    .filter((_, el) => /^\d+$/.test($(el).attr("data-history-node-id") ?? ""))
    .first();
  if (story.length > 0) {
    return cleanBody(story.text());
  }
  return null;
}

function cleanBody(text: string): string | null {
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : null;
}

export function parseIomPublication(html: string): PublicationPage {
  const $ = cheerio.load(html);
  return {
    title: null,
    metadata: { labels: parseIomLabels($) },
    text: parseBodyText($),
  };
}

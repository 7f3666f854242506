import { createHtmlSourceAdapter } from "../html/adapter";
import { IOM_BASE_URL, iomListingUrl, parseIomListing, parseIomPublication } from "./parse";

export const iomSource = createHtmlSourceAdapter({
  id: "iom",
  name: "IOM Blogs, News and Stories",
  homepage: IOM_BASE_URL,
  mode: "text",
  listingUrl: iomListingUrl,
  parseListing: parseIomListing,
  parsePublication: (html) => parseIomPublication(html),
});

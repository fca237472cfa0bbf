import type { Element } from "domhandler";
import { loadEmailHtml } from "../html/cheerio";
import type { Cheerio, CheerioAPI } from "../html/cheerio";
import {
  parseText,
  parseVisibleText,
  parsePrice,
  parseArea,
  stripPriceAndArea,
} from "../html/parse";
import {
  resolveListingLink,
  listingIdFor,
  kindFromLink,
} from "./links";
import { cleanText } from "@/lib/domain/normalize";
import { ExtractionError } from "@/lib/errors";
import type { ListingDraft, PropertyKind } from "@/lib/domain/types";

interface TitleCandidate {
  selector: string;
  /** Read the element text, or its alt attribute (images) */
  from: "text" | "alt";
}

/**
 * Structural description of one alert-email layout. The extractor picks
 * the first layout whose marker is present in the document.
 */
export interface EmailLayout {
  name: "responsive" | "legacy";
  marker: string;
  /** One element per listing */
  block: string;
  /** Tried in order; heading anchors first */
  titleCandidates: TitleCandidate[];
  /** Anchors tried in order for the listing link */
  linkCandidates: string[];
  /** Line under the title, usually the address */
  secondaryText: string;
  /** Dedicated address element used when there is no secondary text */
  addressField: string;
}

export const RESPONSIVE_LAYOUT: EmailLayout = {
  name: "responsive",
  marker: ".listing-card, [data-layout='responsive']",
  block: ".listing-card",
  titleCandidates: [
    { selector: "h2 a", from: "text" },
    { selector: "h3 a", from: "text" },
    { selector: "a.listing-title", from: "text" },
    { selector: "a", from: "text" },
    { selector: "img[alt]", from: "alt" },
  ],
  linkCandidates: ["h2 a[href]", "h3 a[href]", "a.listing-title[href]", "a[href]"],
  secondaryText: ".listing-subtitle, .secondary-text",
  addressField: ".listing-address, .address",
};

export const LEGACY_LAYOUT: EmailLayout = {
  name: "legacy",
  marker: "table.ads, td.ad",
  block: "td.ad",
  titleCandidates: [
    { selector: "h3 a", from: "text" },
    { selector: "h4 a", from: "text" },
    { selector: "a.ad-title", from: "text" },
    { selector: "a", from: "text" },
    { selector: "img[alt]", from: "alt" },
  ],
  linkCandidates: ["h3 a[href]", "h4 a[href]", "a.ad-title[href]", "a[href]"],
  secondaryText: ".secondary, span.subtle",
  addressField: ".address, .location",
};

export const EMAIL_LAYOUTS: EmailLayout[] = [RESPONSIVE_LAYOUT, LEGACY_LAYOUT];

/**
 * Pick the layout by its structural marker. Falls back to the legacy
 * layout, whose selectors are the loosest.
 */
export function detectLayout($: CheerioAPI): EmailLayout {
  return EMAIL_LAYOUTS.find((l) => $(l.marker).length > 0) ?? LEGACY_LAYOUT;
}

export interface ExtractOptions {
  /** Message id or file name, used in log lines and errors */
  origin?: string;
  /** Called for every listing block that had to be skipped */
  onSkip?: (err: ExtractionError) => void;
}

function firstTitle(
  $: CheerioAPI,
  block: Cheerio<Element>,
  candidates: TitleCandidate[]
): string | null {
  for (const candidate of candidates) {
    for (const el of block.find(candidate.selector).toArray()) {
      const value =
        candidate.from === "alt" ? $(el).attr("alt") : $(el).text();
      const text = cleanText(value);
      if (text) return text;
    }
  }
  return null;
}

function firstHref(
  $: CheerioAPI,
  block: Cheerio<Element>,
  candidates: string[]
): string | null {
  for (const selector of candidates) {
    for (const el of block.find(selector).toArray()) {
      const href = $(el).attr("href")?.trim();
      if (href && /^https?:\/\//i.test(href)) return href;
    }
  }
  return null;
}

function extractAddress(
  block: Cheerio<Element>,
  layout: EmailLayout
): string | null {
  const secondary = parseText(block, layout.secondaryText);
  if (secondary) {
    const address = cleanText(stripPriceAndArea(secondary));
    if (address) return address;
  }
  return parseText(block, layout.addressField);
}

/**
 * Extract one draft from a listing block. Throws ExtractionError when the
 * block cannot become a record.
 */
function extractBlock(
  $: CheerioAPI,
  block: Cheerio<Element>,
  layout: EmailLayout,
  kind: PropertyKind,
  origin: string,
  index: number
): ListingDraft {
  const title = firstTitle($, block, layout.titleCandidates);
  const rawAddress = extractAddress(block, layout);

  if (!title && !rawAddress) {
    throw new ExtractionError("listing has neither title nor address", {
      origin,
      index,
    });
  }

  const href = firstHref($, block, layout.linkCandidates);
  if (!href) {
    throw new ExtractionError(`listing "${title ?? rawAddress}" has no link`, {
      origin,
      index,
    });
  }

  const resolved = resolveListingLink(href);
  const { link } = resolved;
  if (!resolved.decoded) {
    console.warn(
      `[extract] ${origin} #${index}: could not decode tracking link, keeping raw URL`
    );
  }

  const linkKind = kindFromLink(link);
  if (linkKind && linkKind !== kind) {
    throw new ExtractionError(
      `listing ${link} belongs to the ${linkKind} partition, not ${kind}`,
      { origin, index }
    );
  }

  const blockText = parseVisibleText(block);
  const size = parseArea(blockText);
  const price = parsePrice(blockText);

  return {
    kind,
    externalId: listingIdFor(resolved),
    title,
    rawAddress,
    price,
    size,
    link,
  };
}

/**
 * Lazily extract listing drafts from one alert email body. A block that
 * cannot be extracted is logged and skipped; the rest of the email is
 * still read. Calling again on the same html restarts from the top and
 * yields the same drafts.
 */
export function* extractListings(
  html: string,
  kind: PropertyKind,
  opts: ExtractOptions = {}
): Generator<ListingDraft, void, undefined> {
  const origin = opts.origin ?? "(email)";
  const $ = loadEmailHtml(html);
  const layout = detectLayout($);
  const blocks = $<Element, string>(layout.block).toArray();

  if (blocks.length === 0) {
    console.warn(`[extract] ${origin}: no listing blocks found (${layout.name} layout)`);
    return;
  }

  for (let i = 0; i < blocks.length; i++) {
    let draft: ListingDraft;
    try {
      draft = extractBlock($, $(blocks[i]), layout, kind, origin, i);
    } catch (err) {
      if (!(err instanceof ExtractionError)) throw err;
      console.warn(`[extract] ${origin} #${i}: skipped (${err.message})`);
      opts.onSkip?.(err);
      continue;
    }
    yield draft;
  }
}

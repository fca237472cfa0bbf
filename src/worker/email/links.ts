import { hashString } from "@/lib/domain/hash";
import { PROPERTY_KINDS } from "@/lib/domain/types";
import type { PropertyKind } from "@/lib/domain/types";

/**
 * Alert emails wrap every listing link in a click-tracking redirect. The
 * direct listing URL travels in one of these query parameters, percent
 * encoded (sometimes twice) or base64url encoded.
 */
const REDIRECT_PARAMS = [
  "url",
  "u",
  "target",
  "redirect",
  "redirect_url",
  "dest",
  "link",
  "to",
];

const LISTING_HOST_PATTERN = /(^|\.)finn\.no$/i;

const TRACKING_PARAMS = /^(utm_\w+|fbclid|gclid|mc_cid|mc_eid|tracking\w*|ref)$/i;

/** Path shape of each partition's listing URLs */
export const KIND_URL_PATTERNS: Record<PropertyKind, RegExp> = {
  rental: /\/realestate\/lettings\//i,
  sale: /\/realestate\/(homes|newbuildings|plots|leisuresale)\//i,
};

function tryParseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

function isHttpUrl(value: string): boolean {
  const url = tryParseUrl(value);
  return url !== null && (url.protocol === "http:" || url.protocol === "https:");
}

/**
 * Percent-decode until the value stops changing (max 3 rounds). Returns
 * null on malformed escapes.
 */
function percentDecode(value: string): string | null {
  let current = value;
  for (let i = 0; i < 3 && /%[0-9a-f]{2}/i.test(current); i++) {
    try {
      current = decodeURIComponent(current);
    } catch {
      return null;
    }
  }
  return current;
}

function base64UrlDecode(value: string): string | null {
  if (!/^[A-Za-z0-9_-]+={0,2}$/.test(value) || value.length < 12) return null;
  const decoded = Buffer.from(value, "base64url").toString("utf-8");
  return isHttpUrl(decoded) ? decoded : null;
}

function decodeParamValue(value: string): string | null {
  if (isHttpUrl(value)) return value;
  const decoded = percentDecode(value);
  if (decoded && isHttpUrl(decoded)) return decoded;
  return base64UrlDecode(value);
}

/**
 * Unwrap a click-tracking URL into the direct URL it redirects to.
 * Direct listing URLs come back unchanged. Returns null when no target
 * can be recovered.
 */
export function decodeTrackingUrl(raw: string): string | null {
  const url = tryParseUrl(raw.trim());
  if (!url) return null;

  if (LISTING_HOST_PATTERN.test(url.hostname) && !hasRedirectParam(url)) {
    return url.toString();
  }

  for (const name of REDIRECT_PARAMS) {
    const value = url.searchParams.get(name);
    if (!value) continue;
    const decoded = decodeParamValue(value);
    if (decoded) return decodeTrackingUrl(decoded) ?? decoded;
  }

  for (const [, value] of url.searchParams) {
    const decoded = decodeParamValue(value);
    if (decoded) return decodeTrackingUrl(decoded) ?? decoded;
  }

  for (const segment of url.pathname.split("/")) {
    const decoded = base64UrlDecode(segment);
    if (decoded) return decoded;
  }

  return null;
}

function hasRedirectParam(url: URL): boolean {
  return REDIRECT_PARAMS.some((name) => {
    const value = url.searchParams.get(name);
    return value !== null && decodeParamValue(value) !== null;
  });
}

/**
 * Drop tracking parameters and fragments so the same listing always maps
 * to the same URL.
 */
export function canonicalizeListingUrl(direct: string): string {
  const url = tryParseUrl(direct);
  if (!url) return direct;
  url.hash = "";
  url.hostname = url.hostname.toLowerCase();
  for (const key of [...url.searchParams.keys()]) {
    if (TRACKING_PARAMS.test(key)) url.searchParams.delete(key);
  }
  return url.toString();
}

export interface ResolvedLink {
  link: string;
  /** False when the tracking wrapper could not be undone */
  decoded: boolean;
}

/**
 * Turn the href found in an email into the link stored on the record. If
 * the redirect cannot be decoded the raw tracking URL is kept.
 */
export function resolveListingLink(href: string): ResolvedLink {
  const direct = decodeTrackingUrl(href);
  if (!direct) return { link: href.trim(), decoded: false };
  return { link: canonicalizeListingUrl(direct), decoded: true };
}

/**
 * Numeric listing id embedded in a listing URL ("finnkode=123456789" or a
 * trailing "/123456789" path segment).
 */
export function extractExternalId(link: string): string | null {
  const candidates = withPercentDecoded(link);
  for (const candidate of candidates) {
    const query = candidate.match(/finnkode[=:](\d+)/i);
    if (query) return query[1];
    const segment = candidate.match(/\/(\d{6,})(?=[/?#]|$)/);
    if (segment) return segment[1];
  }
  return null;
}

function withPercentDecoded(link: string): string[] {
  const decoded = percentDecode(link);
  return decoded && decoded !== link ? [link, decoded] : [link];
}

/** Only an explicit finnkode parameter, never a bare path number. */
function explicitFinnkode(link: string): string | null {
  for (const candidate of withPercentDecoded(link)) {
    const query = candidate.match(/finnkode[=:](\d+)/i);
    if (query) return query[1];
  }
  return null;
}

/**
 * Stable id for links that carry no numeric id (undecodable tracking URLs).
 */
export function fallbackExternalId(link: string): string {
  return `h${hashString(link).slice(0, 12)}`;
}

/**
 * Record id for a resolved link. Path numbers in a raw tracking URL are
 * campaign or date ids shared by every listing in the email, so an
 * undecoded link only trusts an explicit finnkode and is otherwise hashed.
 */
export function listingIdFor({ link, decoded }: ResolvedLink): string {
  const id = decoded ? extractExternalId(link) : explicitFinnkode(link);
  return id ?? fallbackExternalId(link);
}

/**
 * Which partition a listing URL belongs to, judged by its path. Returns
 * null when the URL does not say.
 */
export function kindFromLink(link: string): PropertyKind | null {
  return PROPERTY_KINDS.find((kind) => KIND_URL_PATTERNS[kind].test(link)) ?? null;
}

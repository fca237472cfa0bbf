import { describe, it, expect } from "vitest";
import {
  decodeTrackingUrl,
  canonicalizeListingUrl,
  resolveListingLink,
  extractExternalId,
  fallbackExternalId,
  listingIdFor,
  kindFromLink,
} from "./links";

const DIRECT = "https://www.finn.no/realestate/lettings/ad.html?finnkode=355555555";

describe("decodeTrackingUrl", () => {
  it("returns a direct listing URL unchanged", () => {
    expect(decodeTrackingUrl(DIRECT)).toBe(DIRECT);
  });

  it("unwraps a percent-encoded redirect parameter", () => {
    const wrapped = `https://click.example.com/track?url=${encodeURIComponent(DIRECT)}`;
    expect(decodeTrackingUrl(wrapped)).toBe(DIRECT);
  });

  it("unwraps a doubly encoded redirect parameter", () => {
    const wrapped = `https://click.example.com/track?url=${encodeURIComponent(encodeURIComponent(DIRECT))}`;
    expect(decodeTrackingUrl(wrapped)).toBe(DIRECT);
  });

  it("unwraps a base64url redirect parameter", () => {
    const token = Buffer.from(DIRECT, "utf-8").toString("base64url");
    expect(decodeTrackingUrl(`https://click.example.com/r?target=${token}`)).toBe(DIRECT);
  });

  it("follows nested wrappers", () => {
    const inner = `https://mail.example.com/redirect?u=${encodeURIComponent(DIRECT)}`;
    const outer = `https://click.example.com/track?url=${encodeURIComponent(inner)}`;
    expect(decodeTrackingUrl(outer)).toBe(DIRECT);
  });

  it("returns null when no target can be recovered", () => {
    expect(decodeTrackingUrl("https://click.example.com/c/abc123")).toBeNull();
    expect(decodeTrackingUrl("not a url")).toBeNull();
  });
});

describe("canonicalizeListingUrl", () => {
  it("drops tracking parameters and the fragment", () => {
    expect(
      canonicalizeListingUrl(`${DIRECT}&utm_source=alert&utm_medium=email#gallery`)
    ).toBe(DIRECT);
  });
});

describe("resolveListingLink", () => {
  it("keeps the raw tracking URL when it cannot be decoded", () => {
    expect(resolveListingLink(" https://click.example.com/c/abc123 ")).toEqual({
      link: "https://click.example.com/c/abc123",
      decoded: false,
    });
  });

  it("returns the canonical direct URL when decoding works", () => {
    const wrapped = `https://click.example.com/track?url=${encodeURIComponent(`${DIRECT}&utm_campaign=x`)}`;
    expect(resolveListingLink(wrapped)).toEqual({ link: DIRECT, decoded: true });
  });
});

describe("extractExternalId", () => {
  it("reads the finnkode query parameter", () => {
    expect(extractExternalId(DIRECT)).toBe("355555555");
  });

  it("reads a trailing numeric path segment", () => {
    expect(extractExternalId("https://www.finn.no/realestate/homes/298765432")).toBe("298765432");
  });

  it("reads an id inside a percent-encoded tracking URL", () => {
    expect(
      extractExternalId(`https://click.example.com/c/x?u=${encodeURIComponent(DIRECT)}`)
    ).toBe("355555555");
  });

  it("returns null for links without an id", () => {
    expect(extractExternalId("https://click.example.com/c/abc123")).toBeNull();
  });
});

describe("fallbackExternalId", () => {
  it("is stable and prefixed", () => {
    const id = fallbackExternalId("https://click.example.com/c/abc123");
    expect(id).toMatch(/^h[0-9a-f]{12}$/);
    expect(fallbackExternalId("https://click.example.com/c/abc123")).toBe(id);
  });
});

describe("listingIdFor", () => {
  const CAMPAIGN = "https://click.example.com/ls/click/20261001";

  it("reads the id from a decoded link", () => {
    expect(listingIdFor({ link: DIRECT, decoded: true })).toBe("355555555");
  });

  it("ignores path numbers of an undecoded tracking link", () => {
    const first = resolveListingLink(`${CAMPAIGN}/aaaa`);
    const second = resolveListingLink(`${CAMPAIGN}/bbbb`);

    expect(first.decoded).toBe(false);
    expect(listingIdFor(first)).toBe(fallbackExternalId(`${CAMPAIGN}/aaaa`));
    expect(listingIdFor(second)).toBe(fallbackExternalId(`${CAMPAIGN}/bbbb`));
    expect(listingIdFor(first)).not.toBe(listingIdFor(second));
  });

  it("still trusts an explicit finnkode in an undecoded link", () => {
    const resolved = resolveListingLink(`${CAMPAIGN}/x?finnkode=344444444`);
    expect(resolved.decoded).toBe(false);
    expect(listingIdFor(resolved)).toBe("344444444");
  });
});

describe("kindFromLink", () => {
  it("tells rental and sale URLs apart", () => {
    expect(kindFromLink(DIRECT)).toBe("rental");
    expect(kindFromLink("https://www.finn.no/realestate/homes/ad.html?finnkode=1")).toBe("sale");
    expect(kindFromLink("https://www.finn.no/realestate/newbuildings/ad.html?finnkode=1")).toBe("sale");
    expect(kindFromLink("https://click.example.com/c/abc123")).toBeNull();
  });
});

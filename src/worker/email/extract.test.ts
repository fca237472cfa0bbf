import * as fs from "fs";
import * as path from "path";
import { describe, it, expect, vi } from "vitest";
import { extractListings, detectLayout } from "./extract";
import { loadHtml } from "../html/cheerio";
import type { ExtractionError } from "@/lib/errors";

const FIXTURES = path.resolve(process.cwd(), "fixtures/emails");

function fixture(name: string): string {
  return fs.readFileSync(path.join(FIXTURES, name), "utf-8");
}

describe("detectLayout", () => {
  it("recognizes the responsive card layout", () => {
    expect(detectLayout(loadHtml(fixture("rental-responsive.html"))).name).toBe("responsive");
  });

  it("recognizes the legacy table layout", () => {
    expect(detectLayout(loadHtml(fixture("sale-legacy.html"))).name).toBe("legacy");
  });
});

describe("extractListings", () => {
  it("extracts a priced and an unpriced listing", () => {
    const drafts = [...extractListings(fixture("rental-responsive.html"), "rental")];

    expect(drafts).toEqual([
      {
        kind: "rental",
        externalId: "312345678",
        title: "Lys 2-roms ved Birkelunden",
        rawAddress: "Thorvald Meyers gate 12, 0555 Oslo",
        price: "3200 kr",
        size: "45 m²",
        link: "https://www.finn.no/realestate/lettings/ad.html?finnkode=312345678",
      },
      {
        kind: "rental",
        externalId: "398765432",
        title: "Hybel ved Majorstuen",
        rawAddress: "Bogstadveien 50, 0366 Oslo",
        price: null,
        size: null,
        link: "https://www.finn.no/realestate/lettings/ad.html?finnkode=398765432",
      },
    ]);
  });

  it("reads the legacy layout and skips a malformed block", () => {
    const skipped: ExtractionError[] = [];
    const drafts = [
      ...extractListings(fixture("sale-legacy.html"), "sale", {
        origin: "sale-legacy",
        onSkip: (err) => skipped.push(err),
      }),
    ];

    expect(drafts.map((d) => d.externalId)).toEqual(["287654321", "276543210"]);
    expect(drafts[0]).toMatchObject({
      title: "Enebolig med hage",
      rawAddress: "Solveien 3, 1410 Kolbotn",
      price: "6450000 kr",
      size: "142 m²",
    });
    expect(drafts[1]).toMatchObject({
      title: "Tomannsbolig",
      rawAddress: "Skogveien 8, 1440 Drobak",
      price: null,
      size: null,
    });
    expect(skipped).toHaveLength(1);
    expect(skipped[0].context).toEqual({ origin: "sale-legacy", index: 2 });
  });

  it("yields the same drafts when run twice on the same email", () => {
    const html = fixture("rental-responsive.html");
    expect([...extractListings(html, "rental")]).toEqual([...extractListings(html, "rental")]);
  });

  it("keeps a listing whose tracking link cannot be decoded", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const html = `
      <div class="listing-card">
        <h3><a href="https://click.example.com/c/abc123">Sokkelleilighet</a></h3>
        <p class="secondary-text">Kirkeveien 7, 0368 Oslo</p>
      </div>`;

    const [draft] = [...extractListings(html, "rental")];

    expect(draft.link).toBe("https://click.example.com/c/abc123");
    expect(draft.externalId).toMatch(/^h[0-9a-f]{12}$/);
    expect(draft.rawAddress).toBe("Kirkeveien 7, 0368 Oslo");
    warn.mockRestore();
  });

  it("gives undecodable links sharing a campaign number their own ids", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const html = `
      <div class="listing-card">
        <h3><a href="https://click.example.com/ls/click/20261001/aaaa">Hybel</a></h3>
        <p class="secondary-text">Kirkeveien 7, 0368 Oslo</p>
      </div>
      <div class="listing-card">
        <h3><a href="https://click.example.com/ls/click/20261001/bbbb">Loft</a></h3>
        <p class="secondary-text">Markveien 3, 0554 Oslo</p>
      </div>`;

    const ids = [...extractListings(html, "rental")].map((d) => d.externalId);

    expect(ids).toHaveLength(2);
    expect(ids[0]).toMatch(/^h[0-9a-f]{12}$/);
    expect(ids[1]).toMatch(/^h[0-9a-f]{12}$/);
    expect(ids[0]).not.toBe(ids[1]);
    vi.restoreAllMocks();
  });

  it("skips listings without a link and listings of the other kind", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const html = `
      <div class="listing-card">
        <h2>Uten lenke</h2>
        <p class="listing-address">Storgata 1, 0155 Oslo</p>
      </div>
      <div class="listing-card">
        <h2><a href="https://www.finn.no/realestate/homes/ad.html?finnkode=211111111">Rekkehus</a></h2>
        <p class="listing-address">Granveien 2, 1337 Sandvika</p>
      </div>
      <div class="listing-card">
        <h2><a href="https://www.finn.no/realestate/lettings/ad.html?finnkode=322222222">Loft</a></h2>
        <p class="listing-address">Markveien 3, 0554 Oslo</p>
      </div>`;

    const skipped: string[] = [];
    const drafts = [
      ...extractListings(html, "rental", { onSkip: (err) => skipped.push(err.message) }),
    ];

    expect(drafts.map((d) => d.externalId)).toEqual(["322222222"]);
    expect(skipped).toEqual([
      'listing "Storgata 1, 0155 Oslo" has no link',
      "listing https://www.finn.no/realestate/homes/ad.html?finnkode=211111111 belongs to the sale partition, not rental",
    ]);
    vi.restoreAllMocks();
  });

  it("falls back to the image alt text for the title", () => {
    const html = `
      <table class="ads"><tr><td class="ad">
        <a href="https://www.finn.no/realestate/lettings/ad.html?finnkode=333333333"><img src="x.jpg" alt="Studio med balkong"></a>
        <span class="address">Sognsveien 10, 0451 Oslo</span>
        <span>8 500 kr</span>
      </td></tr></table>`;

    const [draft] = [...extractListings(html, "rental")];

    expect(draft.title).toBe("Studio med balkong");
    expect(draft.price).toBe("8500 kr");
    expect(draft.size).toBeNull();
  });

  it("returns nothing for an email without listing blocks", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    expect([...extractListings("<p>No new listings today</p>", "rental")]).toEqual([]);
    vi.restoreAllMocks();
  });
});

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, afterEach } from "vitest";
import { enabledKinds, loadRunConfig, parseRunConfig } from "./config";
import { ConfigError } from "./errors";

const tmpDirs: string[] = [];

function tmpDir(): string {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "config-test-"));
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe("parseRunConfig", () => {
  it("fills defaults and resolves directories against the base dir", () => {
    const config = parseRunConfig(
      { work_location: { lat: 59.9, lng: 10.7 }, max_commute_minutes: 40 },
      "/srv/finder"
    );

    expect(config.kindEnabled).toEqual({ rental: true, sale: false });
    expect(config.daysBack).toBe(14);
    expect(config.apiLimits).toEqual({ geocoding: 100, distance: 500, places: 200 });
    expect(config.warningThresholdPercent).toBe(80);
    expect(config.hardStopOnLimit).toBe(true);
    expect(config.retryAmbiguous).toBe(false);
    expect(config.dataDir).toBe(path.resolve("/srv/finder", "data"));
    expect(config.placeCategories).toEqual([]);
    expect(config.geocodeRegion).toBe("no");
    expect(enabledKinds(config)).toEqual(["rental"]);
  });

  it("reads travel options for place categories", () => {
    const config = parseRunConfig(
      {
        work_location: { lat: 59.9, lng: 10.7 },
        max_commute_minutes: 40,
        geocode_region: "se",
        place_categories: [
          { name: "gym", keywords: ["gym"], max_walk_minutes: 10 },
          { name: "school", keywords: ["school"], calculate_transit: true },
        ],
      },
      "/srv/finder"
    );

    expect(config.geocodeRegion).toBe("se");
    expect(config.placeCategories).toEqual([
      { name: "gym", keywords: ["gym"], calculateTransit: false, maxWalkMinutes: 10 },
      { name: "school", keywords: ["school"], calculateTransit: true, maxWalkMinutes: undefined },
    ]);
  });

  it("accepts an address string as work location", () => {
    const config = parseRunConfig(
      {
        work_location: "Karl Johans gate 1, Oslo",
        max_commute_minutes: 30,
        property_kind_enabled: { rental: true, sale: true },
        filters: { sale: { max_price: 5000000 } },
      },
      "/srv/finder"
    );
    expect(config.workLocation).toBe("Karl Johans gate 1, Oslo");
    expect(config.filters.sale).toEqual({ maxPrice: 5000000, minSizeSqm: undefined });
    expect(enabledKinds(config)).toEqual(["rental", "sale"]);
  });

  it("lists every invalid key", () => {
    expect(() =>
      parseRunConfig({ work_location: { lat: 200, lng: 10 }, days_back: -1 }, "/srv")
    ).toThrow(ConfigError);

    try {
      parseRunConfig({ work_location: { lat: 200, lng: 10 }, days_back: -1 }, "/srv");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      const message = err instanceof Error ? err.message : "";
      expect(message).toContain("max_commute_minutes");
      expect(message).toContain("days_back");
    }
  });
});

describe("loadRunConfig", () => {
  it("reads a JSON file", () => {
    const dir = tmpDir();
    const file = path.join(dir, "property-finder.config.json");
    fs.writeFileSync(
      file,
      JSON.stringify({ work_location: { lat: 59.9, lng: 10.7 }, max_commute_minutes: 25, data_dir: "state" })
    );

    const config = loadRunConfig(file);
    expect(config.maxCommuteMinutes).toBe(25);
    expect(config.dataDir).toBe(path.join(dir, "state"));
  });

  it("rejects a missing file and invalid JSON", () => {
    const dir = tmpDir();
    expect(() => loadRunConfig(path.join(dir, "missing.json"))).toThrow(ConfigError);

    const file = path.join(dir, "broken.json");
    fs.writeFileSync(file, "{ not json");
    expect(() => loadRunConfig(file)).toThrow(/is not valid JSON/);
  });
});

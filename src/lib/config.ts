import * as fs from "fs";
import * as path from "path";
import { z } from "zod";
import { ConfigError } from "./errors";
import { PROPERTY_KINDS } from "./domain/types";
import type { Coordinates, PropertyKind } from "./domain/types";

export const DEFAULT_CONFIG_FILE = "property-finder.config.json";

const CoordinatesSchema = z.object({
  lat: z.number().min(-90).max(90),
  lng: z.number().min(-180).max(180),
});

const KindFilterSchema = z.object({
  max_price: z.number().positive().optional(),
  min_size_sqm: z.number().positive().optional(),
});

const RunConfigSchema = z.object({
  work_location: z.union([CoordinatesSchema, z.string().min(1)]),
  max_commute_minutes: z.number().int().positive(),
  property_kind_enabled: z
    .object({
      rental: z.boolean().default(true),
      sale: z.boolean().default(false),
    })
    .default({}),
  days_back: z.number().int().min(0).default(14),
  api_limits: z
    .object({
      geocoding: z.number().int().min(0).default(100),
      distance: z.number().int().min(0).default(500),
      places: z.number().int().min(0).default(200),
    })
    .default({}),
  warning_threshold_percent: z.number().min(1).max(100).default(80),
  hard_stop_on_limit: z.boolean().default(true),
  reprocess_emails: z.boolean().default(false),
  retry_ambiguous: z.boolean().default(false),
  data_dir: z.string().default("data"),
  inbox_dir: z.string().default("inbox"),
  output_dir: z.string().default("output"),
  master_lists: z
    .object({
      rental: z.string().optional(),
      sale: z.string().optional(),
    })
    .default({}),
  filters: z
    .object({
      rental: KindFilterSchema.optional(),
      sale: KindFilterSchema.optional(),
    })
    .default({}),
  place_categories: z
    .array(
      z.object({
        name: z.string().regex(/^\w+$/, "category names are letters, digits and _"),
        keywords: z.array(z.string().min(1)).min(1),
        calculate_transit: z.boolean().default(false),
        max_walk_minutes: z.number().positive().optional(),
      })
    )
    .default([]),
  search_radius_meters: z.number().int().positive().default(10000),
  /** ccTLD the geocoder biases ambiguous addresses towards */
  geocode_region: z.string().regex(/^[a-z]{2}$/, "two-letter ccTLD such as \"no\"").default("no"),
});

export type RunConfigFile = z.input<typeof RunConfigSchema>;

export type ApiCategory = "geocoding" | "distance" | "places";

export interface KindFilter {
  maxPrice?: number;
  minSizeSqm?: number;
}

export interface PlaceCategory {
  name: string;
  keywords: string[];
  /** Also record the transit time to the nearest place */
  calculateTransit: boolean;
  /** Drop listings farther than this walk from the nearest place */
  maxWalkMinutes?: number;
}

export interface RunConfig {
  workLocation: Coordinates | string;
  maxCommuteMinutes: number;
  kindEnabled: Record<PropertyKind, boolean>;
  daysBack: number;
  apiLimits: Record<ApiCategory, number>;
  warningThresholdPercent: number;
  hardStopOnLimit: boolean;
  reprocessEmails: boolean;
  retryAmbiguous: boolean;
  dataDir: string;
  inboxDir: string;
  outputDir: string;
  masterLists: Partial<Record<PropertyKind, string>>;
  filters: Partial<Record<PropertyKind, KindFilter>>;
  placeCategories: PlaceCategory[];
  searchRadiusMeters: number;
  geocodeRegion: string;
}

function toKindFilter(
  raw: z.infer<typeof KindFilterSchema> | undefined
): KindFilter | undefined {
  if (!raw) return undefined;
  return { maxPrice: raw.max_price, minSizeSqm: raw.min_size_sqm };
}

/**
 * Validate a parsed config object. Relative directories are resolved
 * against baseDir.
 */
export function parseRunConfig(raw: unknown, baseDir: string): RunConfig {
  const result = RunConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid run configuration: ${issues}`);
  }
  const c = result.data;
  const resolve = (p: string) => path.resolve(baseDir, p);

  return {
    workLocation: c.work_location,
    maxCommuteMinutes: c.max_commute_minutes,
    kindEnabled: { ...c.property_kind_enabled },
    daysBack: c.days_back,
    apiLimits: { ...c.api_limits },
    warningThresholdPercent: c.warning_threshold_percent,
    hardStopOnLimit: c.hard_stop_on_limit,
    reprocessEmails: c.reprocess_emails,
    retryAmbiguous: c.retry_ambiguous,
    dataDir: resolve(c.data_dir),
    inboxDir: resolve(c.inbox_dir),
    outputDir: resolve(c.output_dir),
    masterLists: {
      rental: c.master_lists.rental ? resolve(c.master_lists.rental) : undefined,
      sale: c.master_lists.sale ? resolve(c.master_lists.sale) : undefined,
    },
    filters: {
      rental: toKindFilter(c.filters.rental),
      sale: toKindFilter(c.filters.sale),
    },
    placeCategories: c.place_categories.map((p) => ({
      name: p.name,
      keywords: p.keywords,
      calculateTransit: p.calculate_transit,
      maxWalkMinutes: p.max_walk_minutes,
    })),
    searchRadiusMeters: c.search_radius_meters,
    geocodeRegion: c.geocode_region,
  };
}

/**
 * Load and validate the run configuration file.
 */
export function loadRunConfig(configPath: string): RunConfig {
  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new ConfigError(
      `Config file ${configPath} is not valid JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return parseRunConfig(raw, path.dirname(path.resolve(configPath)));
}

export function enabledKinds(config: RunConfig): PropertyKind[] {
  return PROPERTY_KINDS.filter((k) => config.kindEnabled[k]);
}

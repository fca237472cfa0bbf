import { extractListings } from "../email/extract";
import { lookbackStart } from "../email/mailbox";
import type { MailSource } from "../email/mailbox";
import { ApiBudget } from "../http/budget";
import type { BudgetSummary } from "../http/budget";
import type { MapServices } from "../http/maps";
import type { Notifier, NotificationBatch } from "../notify/notifier";
import { AmbiguousAddressLog } from "../store/ambiguousLog";
import { GeocodeCache } from "../store/geocodeCache";
import { ProcessedEmailLedger } from "../store/ledger";
import { RecordStore } from "../store/recordStore";
import { enrichRecords, findNearbyPlaces, resolveWorkLocation } from "./enrich";
import type { EnrichStats } from "./enrich";
import { filterRecords } from "./filter";
import { readMasterList } from "./masterList";
import { writeFilteredListings } from "./output";
import { emptyCounts, planWork, resolveObservations, RESOLUTION_KINDS } from "./resolve";
import { configFingerprint } from "@/lib/domain/hash";
import { enabledKinds } from "@/lib/config";
import type { RunConfig } from "@/lib/config";
import type {
  Coordinates,
  ListingRecord,
  Observation,
  PropertyKind,
  ResolutionKind,
} from "@/lib/domain/types";

export interface RunDeps {
  mail: MailSource;
  maps: MapServices;
  notifier: Notifier;
  /** Clock, for tests */
  now?: () => Date;
}

export interface RunOptions {
  /** Only run these kinds (default: the kinds enabled in config) */
  kinds?: PropertyKind[];
  /** Max records per kind sent to the paid APIs */
  limit?: number;
  /** Re-read emails already in the ledger */
  reprocess?: boolean;
}

export interface KindSummary {
  emailsRead: number;
  emailsSkipped: number;
  draftsExtracted: number;
  recordsSkipped: number;
  masterListRows: number;
  resolutions: Record<ResolutionKind, number>;
  enrichment: EnrichStats | null;
  placesFound: number;
  storedRecords: number;
  filtered: number;
  outputFile: string;
}

export interface RunSummary {
  kinds: Partial<Record<PropertyKind, KindSummary>>;
  budget: BudgetSummary;
}

interface KindState {
  kind: PropertyKind;
  store: RecordStore;
  ledger: ProcessedEmailLedger;
  ambiguousLog: AmbiguousAddressLog;
  masterList: Observation[];
}

/**
 * Load every partition and master list up front so a corrupt file aborts
 * the run before any API call or write.
 */
function loadState(config: RunConfig, kinds: PropertyKind[]): KindState[] {
  return kinds.map((kind) => {
    const masterListPath = config.masterLists[kind];
    return {
      kind,
      store: RecordStore.load(kind, config.dataDir),
      ledger: ProcessedEmailLedger.load(kind, config.dataDir),
      ambiguousLog: AmbiguousAddressLog.load(kind, config.dataDir),
      masterList: masterListPath ? readMasterList(masterListPath, kind) : [],
    };
  });
}

async function readEmails(
  state: KindState,
  mail: MailSource,
  since: Date,
  reprocess: boolean,
  summary: KindSummary
): Promise<Observation[]> {
  const observations: Observation[] = [];
  const messages = await mail.fetch(state.kind, since);

  for (const message of messages) {
    if (!reprocess && state.ledger.has(message.messageId)) {
      summary.emailsSkipped++;
      continue;
    }

    try {
      let count = 0;
      for (const draft of extractListings(message.rawBody, state.kind, {
        origin: message.messageId,
        onSkip: () => summary.recordsSkipped++,
      })) {
        observations.push({
          draft,
          source: "email",
          origin: message.messageId,
          observedAt: message.receivedAt,
        });
        count++;
      }
      summary.emailsRead++;
      summary.draftsExtracted += count;
      state.ledger.add(message.messageId);
      console.log(`[run] ${state.kind}: ${message.messageId} -> ${count} listings`);
    } catch (err) {
      console.warn(
        `[run] ${state.kind}: could not read email ${message.messageId}, will retry next run:`,
        err instanceof Error ? err.message : err
      );
    }
  }
  return observations;
}

function emptyKindSummary(): KindSummary {
  return {
    emailsRead: 0,
    emailsSkipped: 0,
    draftsExtracted: 0,
    recordsSkipped: 0,
    masterListRows: 0,
    resolutions: emptyCounts(),
    enrichment: null,
    placesFound: 0,
    storedRecords: 0,
    filtered: 0,
    outputFile: "",
  };
}

/**
 * One batch run: read new alert emails and master lists, resolve them
 * against the stores, spend the API budget on what is missing, write the
 * stores and the filtered listings, and hand the result to the notifier.
 */
export async function runPipeline(
  config: RunConfig,
  deps: RunDeps,
  opts: RunOptions = {}
): Promise<RunSummary> {
  const now = deps.now ? deps.now() : new Date();
  const kinds = opts.kinds ?? enabledKinds(config);
  const reprocess = opts.reprocess ?? config.reprocessEmails;
  const budget = new ApiBudget({
    limits: config.apiLimits,
    warningThresholdPercent: config.warningThresholdPercent,
    hardStop: config.hardStopOnLimit,
  });

  if (kinds.length === 0) {
    console.log("[run] No property kinds enabled, nothing to do");
    return { kinds: {}, budget: budget.summary() };
  }

  const cache = GeocodeCache.load(config.dataDir);
  const states = loadState(config, kinds);
  const since = lookbackStart(now, config.daysBack);

  let workLocation: Coordinates | null = null;
  const getWorkLocation = async (): Promise<Coordinates> => {
    if (!workLocation) {
      workLocation = await resolveWorkLocation(config.workLocation, deps.maps, budget, cache);
    }
    return workLocation;
  };

  const summaries: Partial<Record<PropertyKind, KindSummary>> = {};
  const batches: NotificationBatch[] = [];
  const pending: Array<{ kind: PropertyKind; records: ListingRecord[]; summary: KindSummary }> = [];

  for (const state of states) {
    const { kind, store } = state;
    const summary = emptyKindSummary();
    summaries[kind] = summary;
    console.log(`\n[run] === ${kind} ===`);

    const fingerprint = configFingerprint({
      workLocation: config.workLocation,
      maxCommuteMinutes: config.maxCommuteMinutes,
      kind,
    });
    const resolveOpts = { fingerprint, retryAmbiguous: config.retryAmbiguous };

    const observations = await readEmails(state, deps.mail, since, reprocess, summary);
    summary.masterListRows = state.masterList.length;
    observations.push(...state.masterList);

    summary.resolutions = resolveObservations(store, observations, now, resolveOpts).counts;

    const work = planWork(store, resolveOpts);
    if (work.length > 0) {
      summary.enrichment = await enrichRecords(
        store,
        work,
        {
          maps: deps.maps,
          budget,
          cache,
          ambiguousLog: state.ambiguousLog,
          workLocation: await getWorkLocation(),
          fingerprint,
          now,
        },
        opts.limit
      );
    } else {
      console.log(`[run] ${kind}: every stored listing is up to date, no API calls needed`);
    }

    const filterOpts = {
      fingerprint,
      maxCommuteMinutes: config.maxCommuteMinutes,
      filter: config.filters[kind],
    };
    // Candidates pass every limit but the walking ones, which need the search first
    summary.placesFound = await findNearbyPlaces(store, filterRecords(store.all(), filterOpts), {
      maps: deps.maps,
      budget,
      categories: config.placeCategories,
      radiusMeters: config.searchRadiusMeters,
    });

    const filtered = filterRecords(store.all(), {
      ...filterOpts,
      placeCategories: config.placeCategories,
    });
    summary.storedRecords = store.size;
    summary.filtered = filtered.length;

    pending.push({ kind, records: filtered, summary });
  }

  // Stores before ledgers: an email is only marked consumed once its
  // listings are on disk.
  for (const state of states) {
    state.store.save();
    state.ambiguousLog.save();
  }
  cache.save();
  for (const state of states) state.ledger.save();
  for (const { kind, records, summary } of pending) {
    summary.outputFile = writeFilteredListings(config.outputDir, kind, records, config.placeCategories);
    batches.push({ kind, records, attachments: [summary.outputFile] });
  }

  try {
    await deps.notifier.notify(batches);
  } catch (err) {
    console.warn("[run] Notifier failed:", err instanceof Error ? err.message : err);
  }

  const result: RunSummary = { kinds: summaries, budget: budget.summary() };
  logRunSummary(result);
  return result;
}

export function logRunSummary(summary: RunSummary): void {
  console.log("\n[run] ===== Run summary =====");
  for (const [kind, s] of Object.entries(summary.kinds)) {
    if (!s) continue;
    console.log(`[run] ${kind}:`);
    console.log(`[run]   emails read ${s.emailsRead} (already processed ${s.emailsSkipped})`);
    console.log(
      `[run]   listings extracted ${s.draftsExtracted}, skipped ${s.recordsSkipped}, master list rows ${s.masterListRows}`
    );
    console.log(
      `[run]   resolved: ${RESOLUTION_KINDS.map((k) => `${k} ${s.resolutions[k]}`).join(", ")}`
    );
    if (s.enrichment) {
      const e = s.enrichment;
      console.log(
        `[run]   geocoded ${e.geocoded} (cache ${e.cacheHits}, ambiguous ${e.ambiguous}, failed ${e.geocodeFailed}), ` +
          `distances ${e.distanceComputed} (failed ${e.distanceFailed}), budget-skipped ${e.skippedForBudget}`
      );
    }
    console.log(
      `[run]   stored ${s.storedRecords}, within range ${s.filtered}, nearby places found ${s.placesFound}`
    );
  }
  for (const [category, line] of Object.entries(summary.budget)) {
    console.log(
      `[run] budget ${category}: ${line.callsMade} calls made, limit ${line.limit}, ${line.remaining} remaining`
    );
  }
}

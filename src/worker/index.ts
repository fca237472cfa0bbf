import "dotenv/config";
import * as path from "path";
import { runPipeline } from "./pipeline/run";
import { FolderMailSource } from "./email/mailbox";
import { GoogleMapsClient } from "./http/googleMaps";
import { LogNotifier } from "./notify/notifier";
import { DEFAULT_CONFIG_FILE, loadRunConfig } from "@/lib/config";
import { isPropertyKind } from "@/lib/domain/types";
import type { PropertyKind } from "@/lib/domain/types";
import { isFatal } from "@/lib/errors";

interface CliArgs {
  kind?: PropertyKind;
  limit?: number;
  config?: string;
  reprocess?: boolean;
}

/** Parse CLI args */
function parseArgs(): CliArgs {
  const args = process.argv.slice(2);
  const result: CliArgs = {};

  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--kind" && args[i + 1]) {
      const kind = args[++i];
      if (!isPropertyKind(kind)) {
        console.error(`[worker] Unknown kind: ${kind} (expected rental or sale)`);
        process.exit(1);
      }
      result.kind = kind;
    } else if (args[i] === "--limit" && args[i + 1]) {
      const limit = parseInt(args[++i], 10);
      if (!Number.isInteger(limit) || limit < 0) {
        console.error(`[worker] --limit expects a non-negative integer`);
        process.exit(1);
      }
      result.limit = limit;
    } else if (args[i] === "--config" && args[i + 1]) {
      result.config = args[++i];
    } else if (args[i] === "--reprocess") {
      result.reprocess = true;
    } else {
      console.error(`[worker] Unknown argument: ${args[i]}`);
      console.error("[worker] Usage: worker [--kind rental|sale] [--limit N] [--config path] [--reprocess]");
      process.exit(1);
    }
  }
  return result;
}

async function main() {
  const { kind, limit, config: configArg, reprocess } = parseArgs();
  const configPath = path.resolve(
    configArg ?? process.env.PROPERTY_FINDER_CONFIG ?? DEFAULT_CONFIG_FILE
  );

  console.log("=== Listing Commute Finder Starting ===");
  console.log(`Config: ${configPath}${kind ? ` (kind: ${kind})` : ""}${limit !== undefined ? ` (limit: ${limit})` : ""}`);

  const config = loadRunConfig(configPath);
  const maps = new GoogleMapsClient({ region: config.geocodeRegion });

  await runPipeline(
    config,
    {
      mail: new FolderMailSource(config.inboxDir),
      maps: { geocoder: maps, distance: maps, places: maps },
      notifier: new LogNotifier(),
    },
    { kinds: kind ? [kind] : undefined, limit, reprocess }
  );

  console.log("\n=== Listing Commute Finder Complete ===");
  process.exit(0);
}

main().catch((err) => {
  if (isFatal(err)) {
    console.error(`\n[worker] Run aborted, nothing was written: ${err instanceof Error ? err.message : err}`);
  } else {
    console.error("Worker failed:", err);
  }
  process.exit(1);
});

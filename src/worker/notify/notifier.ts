import type { ListingRecord, PropertyKind } from "@/lib/domain/types";

export interface NotificationBatch {
  kind: PropertyKind;
  records: ListingRecord[];
  /** Files to attach (filtered CSV per kind) */
  attachments: string[];
}

/**
 * Receives the filtered listings at the end of a run. Delivery is the
 * notifier's business; a failure there does not fail the run.
 */
export interface Notifier {
  notify(batches: NotificationBatch[]): Promise<void>;
}

/** Writes the summary to the log instead of sending it anywhere. */
export class LogNotifier implements Notifier {
  async notify(batches: NotificationBatch[]): Promise<void> {
    for (const batch of batches) {
      console.log(`[notify] ${batch.kind}: ${batch.records.length} listings within commute range`);
      for (const r of batch.records.slice(0, 10)) {
        console.log(
          `[notify]   ${r.distanceMinutes} min  ${r.price ?? "price n/a"}  ${r.size ?? "size n/a"}  ${r.title ?? r.rawAddress ?? r.link}`
        );
      }
      if (batch.records.length > 10) {
        console.log(`[notify]   ... and ${batch.records.length - 10} more`);
      }
      for (const file of batch.attachments) {
        console.log(`[notify]   attachment: ${file}`);
      }
    }
  }
}

import * as fs from "fs";
import * as path from "path";
import { writeFileAtomic } from "./csv";
import type { PropertyKind } from "@/lib/domain/types";

/**
 * Append-only set of consumed email message ids, one per line.
 */
export class ProcessedEmailLedger {
  private readonly ids = new Set<string>();
  private added = 0;

  private constructor(readonly filePath: string) {}

  static load(kind: PropertyKind, dataDir: string): ProcessedEmailLedger {
    const ledger = new ProcessedEmailLedger(
      path.join(dataDir, `${kind}_processed_emails.txt`)
    );
    if (fs.existsSync(ledger.filePath)) {
      for (const line of fs.readFileSync(ledger.filePath, "utf-8").split(/\r?\n/)) {
        const id = line.trim();
        if (id) ledger.ids.add(id);
      }
    }
    return ledger;
  }

  has(messageId: string): boolean {
    return this.ids.has(messageId);
  }

  add(messageId: string): void {
    if (this.ids.has(messageId)) return;
    this.ids.add(messageId);
    this.added++;
  }

  save(): void {
    if (this.added === 0) return;
    writeFileAtomic(this.filePath, [...this.ids].join("\n") + "\n");
    console.log(`[ledger] Recorded ${this.added} new message ids in ${this.filePath}`);
    this.added = 0;
  }
}

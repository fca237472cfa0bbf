import * as fs from "fs";
import * as path from "path";
import type { PropertyKind } from "@/lib/domain/types";

export interface MailMessage {
  messageId: string;
  rawBody: string;
  receivedAt: Date;
}

/**
 * Source of alert emails for one property kind, already narrowed to the
 * alert subject and the lookback window.
 */
export interface MailSource {
  name: string;
  fetch(kind: PropertyKind, since: Date): Promise<MailMessage[]>;
}

/**
 * Reads saved alert emails from <root>/<kind>/*.html. The message id is the
 * file name without extension and the received time is the file's mtime.
 */
export class FolderMailSource implements MailSource {
  readonly name = "folder";

  constructor(private readonly root: string) {}

  async fetch(kind: PropertyKind, since: Date): Promise<MailMessage[]> {
    const dir = path.join(this.root, kind);

    if (!fs.existsSync(dir)) {
      console.log(`[mailbox] No inbox directory at ${dir}, nothing to read`);
      return [];
    }

    const files = fs
      .readdirSync(dir)
      .filter((f) => f.toLowerCase().endsWith(".html"))
      .sort();

    const messages: MailMessage[] = [];
    for (const file of files) {
      const filePath = path.join(dir, file);
      const stat = fs.statSync(filePath);
      if (stat.mtime < since) continue;

      messages.push({
        messageId: path.basename(file, path.extname(file)),
        rawBody: fs.readFileSync(filePath, "utf-8"),
        receivedAt: stat.mtime,
      });
    }

    messages.sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime());
    console.log(
      `[mailbox] ${kind}: ${messages.length} of ${files.length} saved emails are inside the lookback window`
    );
    return messages;
  }
}

/** Start of the lookback window */
export function lookbackStart(now: Date, daysBack: number): Date {
  return new Date(now.getTime() - daysBack * 24 * 60 * 60 * 1000);
}

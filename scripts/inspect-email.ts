/**
 * Print what the extractor reads out of saved alert emails.
 * Run: npx tsx scripts/inspect-email.ts <file.html> [rental|sale]
 */
import * as fs from "fs";
import { extractListings, detectLayout } from "../src/worker/email/extract";
import { loadEmailHtml } from "../src/worker/html/cheerio";
import { isPropertyKind } from "../src/lib/domain/types";

const [file, kindArg = "rental"] = process.argv.slice(2);

if (!file || !isPropertyKind(kindArg)) {
  console.error("Usage: tsx scripts/inspect-email.ts <file.html> [rental|sale]");
  process.exit(1);
}

const html = fs.readFileSync(file, "utf-8");
console.log(`Layout: ${detectLayout(loadEmailHtml(html)).name}`);

let n = 0;
for (const draft of extractListings(html, kindArg, { origin: file })) {
  n++;
  console.log(`\n#${n} ${draft.externalId}`);
  console.log("  title:  ", draft.title);
  console.log("  address:", draft.rawAddress);
  console.log("  price:  ", draft.price);
  console.log("  size:   ", draft.size);
  console.log("  link:   ", draft.link);
}

console.log(`\n${n} listings extracted.`);

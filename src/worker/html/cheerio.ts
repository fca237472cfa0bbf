/**
 * cheerio loading for saved alert emails.
 */
import * as cheerio from "cheerio";

export type CheerioAPI = cheerio.CheerioAPI;
export type Cheerio<T> = cheerio.Cheerio<T>;

/** Soft line breaks or an encoded "=" mark a quoted-printable body */
const QUOTED_PRINTABLE_MARKER = /=3D|=\r?\n/i;

/**
 * Undo quoted-printable transfer encoding, as found in .eml sources saved
 * straight from a mail client. Bodies without the encoding come back as is.
 */
export function decodeQuotedPrintable(body: string): string {
  if (!QUOTED_PRINTABLE_MARKER.test(body)) return body;

  const unfolded = body.replace(/=\r?\n/g, "");
  return unfolded
    .split(/((?:=[0-9A-F]{2})+)/i)
    .map((part, i) =>
      i % 2 === 1 ? Buffer.from(part.replace(/=/g, ""), "hex").toString("utf-8") : part
    )
    .join("");
}

export function loadHtml(html: string): CheerioAPI {
  return cheerio.load(html);
}

/**
 * Load an email body for extraction: transfer encoding undone, styles and
 * scripts removed so their text never reaches the listing parser.
 */
export function loadEmailHtml(body: string): CheerioAPI {
  const $ = cheerio.load(decodeQuotedPrintable(body));
  $("style, script").remove();
  return $;
}

import { isText } from "domhandler";
import type { AnyNode } from "domhandler";
import type { Cheerio } from "./cheerio";
import { cleanText } from "@/lib/domain/normalize";

/**
 * Text of the first element under scope matching selector. Returns null if
 * not found or empty.
 */
export function parseText<T extends AnyNode>(
  scope: Cheerio<T>,
  selector: string
): string | null {
  return cleanText(scope.find(selector).first().text());
}

/**
 * All text under scope with a space between text nodes, so that adjacent
 * cells ("12" and "45 m²") do not run together.
 */
export function parseVisibleText<T extends AnyNode>(scope: Cheerio<T>): string {
  const parts: string[] = [];
  scope
    .find("*")
    .addBack()
    .contents()
    .each((_, node) => {
      if (isText(node)) parts.push(node.data);
    });
  return cleanText(parts.join(" ")) ?? "";
}

// "3 200 kr", "4 500 000 kr", "12.500 kr", "8000kr"
const PRICE_PATTERN = /(?<![\d.,])(\d{1,3}(?:[ .\u00a0\u202f]\d{3})+|\d+)\s*(?:kr|NOK)\b/i;

// "45 m²", "45m2", "62,5 m²"
const AREA_PATTERN = /(?<![\d.,])(\d+(?:[.,]\d+)?)\s*(?:m²|m2|kvm)(?![\w])/i;

/**
 * Find a currency amount in free text and return it in canonical form
 * ("3 200 kr" -> "3200 kr"). Returns null when the text has no price.
 */
export function parsePrice(str: string | null | undefined): string | null {
  if (!str) return null;
  const match = str.match(PRICE_PATTERN);
  if (!match) return null;
  const digits = match[1].replace(/[ .\u00a0\u202f]/g, "");
  return `${parseInt(digits, 10)} kr`;
}

/**
 * Find an area in free text and return it in canonical form
 * ("45m2" -> "45 m²"). Returns null when the text has no area.
 */
export function parseArea(str: string | null | undefined): string | null {
  if (!str) return null;
  const match = str.match(AREA_PATTERN);
  if (!match) return null;
  return `${match[1].replace(",", ".")} m²`;
}

/**
 * Numeric value of a canonical or free-text price/area ("3200 kr" -> 3200,
 * "62.5 m²" -> 62.5). Returns null if unparseable.
 */
export function parseAmount(str: string | null | undefined): number | null {
  if (!str) return null;
  const cleaned = str.replace(/[ \u00a0\u202f]/g, "").replace(",", ".");
  const match = cleaned.match(/\d+(?:\.\d+)?/);
  if (!match) return null;
  const num = parseFloat(match[0]);
  return isNaN(num) ? null : num;
}

/**
 * Strip the price and area tokens out of a line of text so the rest can be
 * read as an address.
 */
export function stripPriceAndArea(str: string): string {
  return str
    .replace(new RegExp(PRICE_PATTERN.source, "gi"), " ")
    .replace(new RegExp(AREA_PATTERN.source, "gi"), " ")
    .replace(/\s*[·|•]\s*/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

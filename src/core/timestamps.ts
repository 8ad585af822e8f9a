/**
 * Timestamp normalisation for the date formats found in platform exports.
 */
import { DateTime } from "luxon";

const OUTPUT_FORMAT = "yyyy-LL-dd'T'HH:mm:ss";

// "Jan 5, 2023, 9:15:00 PM"
const EN_FORMATS = ["MMM d, yyyy, h:mm:ss a", "MMM d, yyyy, h:mm a", "MMM d, yyyy, H:mm:ss"];
// "3 mrt 2023, 14:30:00"
const NL_FORMATS = ["d MMM yyyy, H:mm:ss", "d MMM yyyy, H:mm"];

// Takeout appends an abbreviation luxon cannot resolve ("CET", "CEST", "GMT+01:00").
const TRAILING_ZONE = /\s+(?:[A-Z]{2,5}|GMT[+-]\d{1,2}(?::\d{2})?)$/;

/** Drop every non-ASCII character (Takeout puts narrow spaces in dates). */
export function stripNonAscii(text: string): string {
  return text.replace(/[^\x00-\x7f]/g, "");
}

function fromIso(text: string): DateTime | null {
  const isoish = text.includes("T") ? text : text.replace(" ", "T");
  const dt = DateTime.fromISO(isoish, { setZone: true });
  return dt.isValid ? dt : null;
}

function fromFormats(text: string, formats: readonly string[], locale: string): DateTime | null {
  for (const format of formats) {
    const dt = DateTime.fromFormat(text, format, { locale, setZone: true });
    if (dt.isValid) return dt;
  }
  return null;
}

/**
 * Convert an export timestamp to `YYYY-MM-DDTHH:mm:ss` in the wall-clock
 * time it was written in.
 *
 * Timezone names and offsets are ignored. Returns "" when the text is not a
 * real date in a known format.
 */
export function toIsoTimestamp(text: string): string {
  const input = text
    .replace(/\s+/g, " ")
    .replace(/(\d)(am|pm)\b/gi, "$1 $2")
    .trim();
  if (!input) return "";

  const iso = fromIso(input);
  if (iso) return iso.toFormat(OUTPUT_FORMAT);

  // The zone pattern also matches a bare meridiem, so the full text goes first
  for (const candidate of [input, input.replace(TRAILING_ZONE, "")]) {
    const dt = fromFormats(candidate, EN_FORMATS, "en") ?? fromFormats(candidate, NL_FORMATS, "nl");
    if (dt) return dt.toFormat(OUTPUT_FORMAT);
  }
  return "";
}

/**
 * Parser for the TXT flavour of the TikTok export.
 *
 * Each file holds blocks separated by blank lines; every line of a block
 * is `Key: value`.
 */
export function parseTxtRecords(text: string): Record<string, string>[] {
  const records: Record<string, string>[] = [];

  for (const block of text.replace(/\r\n/g, "\n").split(/\n\s*\n/)) {
    const record: Record<string, string> = {};
    for (const line of block.split("\n")) {
      const colon = line.indexOf(":");
      if (colon <= 0) continue;
      record[line.slice(0, colon).trim()] = line.slice(colon + 1).trim();
    }
    if (Object.keys(record).length > 0) records.push(record);
  }

  return records;
}

/**
 * TikTok extraction strategy.
 *
 * Everything shown is also donated through the capped donation mapping,
 * so a browsing history longer than the display cap still reaches the
 * donation in full.
 */
import { readText, type Archive } from "../../core/archive.js";
import { assertNever, extractRows, type ExtractionStrategy } from "../../core/etl.js";
import { ExtractionFailedException } from "../../core/exceptions.js";
import type { Logger } from "../../core/logger.js";
import { chunkRows, makeTable } from "../../core/table.js";
import {
  ContainerType,
  type DDPCategory,
  type ExtractionOptions,
  type ExtractionResult,
  type Row,
  type Table,
} from "../../core/types.js";
import { TIKTOK_TABLES, recordToRow, type TikTokTableSpec } from "./activity.js";
import { streamList } from "./stream.js";
import { parseTxtRecords } from "./txt.js";

export class TikTokExtractionStrategy implements ExtractionStrategy {
  async extract(
    archive: Archive,
    category: DDPCategory,
    opts: ExtractionOptions,
    log: Logger,
  ): Promise<ExtractionResult> {
    const tables: Table[] = [];
    const donations: Record<string, Row[]> = {};

    for (const spec of TIKTOK_TABLES) {
      const rows = await extractRows(spec.name, log, () =>
        this.rows(archive, category, spec),
      );
      if (rows.length === 0) continue;

      if (spec.chunked) {
        chunkRows(rows, opts.rowCap).forEach((chunk, i) => {
          const name = `${spec.name}_${i}`;
          if (i === 0) tables.push(this.table(spec, name, chunk));
          donations[name] = chunk;
        });
        log.debug({ table: spec.name, rows: rows.length }, "Split table for review");
      } else {
        tables.push(this.table(spec, spec.name, rows));
        donations[spec.name] = rows;
      }
    }

    return { tables, cappedDonations: donations };
  }

  private table(spec: TikTokTableSpec, name: string, rows: Row[]): Table {
    return makeTable({
      name,
      title: spec.title,
      rows,
      description: spec.description,
      visualizations: spec.visualizations,
    });
  }

  private async rows(
    archive: Archive,
    category: DDPCategory,
    spec: TikTokTableSpec,
  ): Promise<Row[]> {
    switch (category.containerType) {
      case ContainerType.JSON: {
        const data = this.userData(archive, category);
        const items = await streamList(data, spec.listKey);
        return items.map((item) => recordToRow(item, spec.columns));
      }
      case ContainerType.TXT:
        return parseTxtRecords(readText(archive, spec.txtFile)).map((record) =>
          recordToRow(record, spec.columns),
        );
      case ContainerType.HTML:
      case ContainerType.CSV:
        throw new ExtractionFailedException(
          `no TikTok parser for ${category.containerType} exports`,
        );
      default:
        return assertNever(category.containerType);
    }
  }

  private userData(archive: Archive, category: DDPCategory): Uint8Array {
    for (const name of category.knownFiles) {
      const data = archive.readByBasename(name);
      if (data) return data;
    }
    throw new ExtractionFailedException("no user data file in archive");
  }
}

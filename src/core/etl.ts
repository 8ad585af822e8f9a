/**
 * Extraction core: strategy interface and the pipeline that runs it on a
 * validated archive.
 */
import { openArchive, type Archive, type BareFile } from "./archive.js";
import type { ValidationProfile } from "./classifier.js";
import { ExtractionFailedException } from "./exceptions.js";
import { describeError, type Logger } from "./logger.js";
import type {
  DDPCategory,
  ExtractionOptions,
  ExtractionResult,
  RecognizedValidation,
  Row,
} from "./types.js";

// ---------------------------------------------------------------------------
// Strategy interface
// ---------------------------------------------------------------------------

/**
 * Turns a recognized archive into tables for review.
 *
 * Implementations match `category.containerType` exhaustively to pick the
 * member names and parser.
 */
export interface ExtractionStrategy {
  extract(
    archive: Archive,
    category: DDPCategory,
    opts: ExtractionOptions,
    log: Logger,
  ): Promise<ExtractionResult>;
}

/**
 * Run a single table extractor. A failure is logged and the table comes out
 * empty, so one broken file never costs the rest of the package.
 */
export async function extractRows(
  table: string,
  log: Logger,
  fn: () => Row[] | Promise<Row[]>,
): Promise<Row[]> {
  try {
    return await fn();
  } catch (err) {
    log.error({ table }, `Exception was caught: ${describeError(err)}`);
    return [];
  }
}

/** Everything the donation flow needs to know about one platform. */
export interface PlatformDefinition extends ValidationProfile {
  /** Display name, also the donation key. */
  name: string;
  /** File-prompt hint for the host. */
  acceptedTypes: string;
  extraction: new () => ExtractionStrategy;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

// ---------------------------------------------------------------------------
// Pipeline runner
// ---------------------------------------------------------------------------

export class ExtractionPipeline {
  private extraction: ExtractionStrategy;
  private options: ExtractionOptions;
  private bareFile: BareFile | undefined;

  constructor(opts: {
    extraction: ExtractionStrategy;
    rowCap: number;
    bareFile?: BareFile;
  }) {
    this.extraction = opts.extraction;
    this.options = { rowCap: opts.rowCap };
    this.bareFile = opts.bareFile;
  }

  /** Open the archive, extract, and let the archive go. */
  async run(
    data: Uint8Array,
    validation: RecognizedValidation,
    log: Logger,
  ): Promise<ExtractionResult> {
    try {
      const archive = openArchive(data, { bareFile: this.bareFile });
      return await this.extraction.extract(
        archive,
        validation.category,
        this.options,
        log,
      );
    } catch (err) {
      throw new ExtractionFailedException(describeError(err));
    }
  }
}

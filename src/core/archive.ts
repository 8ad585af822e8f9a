/**
 * In-memory ZIP access with fflate.
 *
 * Archives are opened per call and never kept across a suspension point of
 * the donation flow.
 */
import { unzipSync } from "fflate";
import { posix } from "node:path";

import { BadArchiveError, ExtractionFailedException, UnhandledFormatError } from "./exceptions.js";
import { describeError } from "./logger.js";

/** A platform export that may arrive as one JSON file instead of a ZIP. */
export interface BareFile {
  /** Member name the file is listed under. */
  name: string;
  /** Top-level keys, one of which the export's object must open with. */
  sections: readonly string[];
}

export interface ArchiveOptions {
  bareFile?: BareFile;
}

export interface Archive {
  /** Normalised member paths, directories excluded. */
  readonly names: readonly string[];

  /** Bytes of the member at `name`, or null. */
  read(name: string): Uint8Array | null;

  /** Bytes of the first member whose basename is `basename`, or null. */
  readByBasename(basename: string): Uint8Array | null;
}

class MemoryArchive implements Archive {
  readonly names: readonly string[];
  private files: Map<string, Uint8Array>;

  constructor(files: Map<string, Uint8Array>) {
    this.files = files;
    this.names = [...files.keys()];
  }

  read(name: string): Uint8Array | null {
    return this.files.get(name) ?? null;
  }

  readByBasename(basename: string): Uint8Array | null {
    for (const [name, data] of this.files) {
      if (posix.basename(name) === basename) return data;
    }
    return null;
  }
}

const ZIP_SIGNATURES = [
  [0x50, 0x4b, 0x03, 0x04],
  [0x50, 0x4b, 0x05, 0x06],
];

export function isZip(data: Uint8Array): boolean {
  return ZIP_SIGNATURES.some((sig) => sig.every((byte, i) => data[i] === byte));
}

function isDirectory(name: string): boolean {
  return name.endsWith("/");
}

// Sections are looked for in the head only; the export is streamed later.
const BARE_HEAD_BYTES = 64 * 1024;

function parsesAsJson(data: Uint8Array): boolean {
  try {
    JSON.parse(decodeText(data));
    return true;
  } catch {
    return false;
  }
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function isBareExport(data: Uint8Array, bare: BareFile): boolean {
  const head = decodeText(data.subarray(0, BARE_HEAD_BYTES)).trimStart();
  if (!head.startsWith("{")) return false;
  return bare.sections.some((section) =>
    new RegExp(`"${escapeRegExp(section)}"\\s*:`).test(head),
  );
}

function bareMember(data: Uint8Array, opts: ArchiveOptions): string | null {
  if (!opts.bareFile || isZip(data)) return null;
  if (isBareExport(data, opts.bareFile)) return opts.bareFile.name;
  if (parsesAsJson(data)) throw new UnhandledFormatError("JSON file is not a known export");
  return null;
}

/**
 * Member names only; nothing is decompressed.
 *
 * With `bareFile` set, JSON that is not that export throws
 * `UnhandledFormatError` instead of `BadArchiveError`.
 */
export function listMembers(data: Uint8Array, opts: ArchiveOptions = {}): string[] {
  const bare = bareMember(data, opts);
  if (bare) return [bare];

  const names: string[] = [];
  try {
    unzipSync(data, {
      filter: (file) => {
        if (!isDirectory(file.name)) names.push(posix.normalize(file.name));
        return false;
      },
    });
  } catch (err) {
    throw new BadArchiveError(describeError(err));
  }
  return names;
}

export function openArchive(data: Uint8Array, opts: ArchiveOptions = {}): Archive {
  const bare = bareMember(data, opts);
  if (bare) return new MemoryArchive(new Map([[bare, data]]));

  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(data);
  } catch (err) {
    throw new BadArchiveError(describeError(err));
  }

  const files = new Map<string, Uint8Array>();
  for (const [name, content] of Object.entries(entries)) {
    // Skip directories (empty data with trailing /)
    if (isDirectory(name) && content.length === 0) continue;
    files.set(posix.normalize(name), content);
  }
  return new MemoryArchive(files);
}

/** UTF-8 decode; a leading byte order mark is dropped. */
export function decodeText(data: Uint8Array): string {
  return new TextDecoder().decode(data);
}

/** Text of the member with this basename; throws when it is missing. */
export function readText(archive: Archive, basename: string): string {
  const data = archive.readByBasename(basename);
  if (!data) throw new ExtractionFailedException(`${basename} not found in archive`);
  return decodeText(data);
}

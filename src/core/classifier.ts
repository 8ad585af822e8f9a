/**
 * DDP classification: decide which known export category an archive is.
 */
import { posix } from "node:path";

import { listMembers, type BareFile } from "./archive.js";
import { BadArchiveError, UnhandledFormatError, UnknownStatusCodeError } from "./exceptions.js";
import { describeError, logger, type Logger } from "./logger.js";
import {
  StatusId,
  type DDPCategory,
  type MatchRule,
  type StatusCode,
  type ValidationResult,
} from "./types.js";

/** What the validator needs to know about a platform. */
export interface ValidationProfile {
  statusCodes: readonly StatusCode[];
  categories: readonly DDPCategory[];
  /** Extensions (with dot) of the members that take part in classification. */
  memberExtensions: readonly string[];
  /** Accept the platform's export as a single bare JSON file. */
  bareFile?: BareFile;
}

function overlapSatisfies(rule: MatchRule, overlap: number, known: number): boolean {
  switch (rule) {
    case "any":
      return overlap > 0;
    case "majority":
      return overlap * 2 > known;
  }
}

/**
 * First category, in declared order, whose known files overlap `fileNames`
 * according to `rule`. Overlap size does not matter beyond the rule.
 */
export function classify(
  fileNames: Iterable<string>,
  categories: readonly DDPCategory[],
  rule: MatchRule = "any",
): DDPCategory | null {
  const present = new Set(fileNames);

  for (const category of categories) {
    const overlap = new Set(category.knownFiles.filter((f) => present.has(f))).size;
    if (overlapSatisfies(rule, overlap, new Set(category.knownFiles).size)) {
      return category;
    }
  }

  return null;
}

export function statusById(codes: readonly StatusCode[], id: number): StatusCode {
  const code = codes.find((c) => c.id === id);
  if (!code) throw new UnknownStatusCodeError(id);
  return code;
}

/**
 * Validate an uploaded file against a platform's known export shapes.
 *
 * Bad or corrupt archives, archives without files and archives in an
 * unknown layout each get their own status code.
 */
export function validateArchive(
  data: Uint8Array,
  profile: ValidationProfile,
  rule: MatchRule = "any",
  log: Logger = logger,
): ValidationResult {
  const { statusCodes, categories } = profile;
  const rejected = (id: number): ValidationResult => ({
    recognized: false,
    category: null,
    status: statusById(statusCodes, id),
    statusCodes,
    categories,
  });

  let names: string[];
  try {
    names = listMembers(data, { bareFile: profile.bareFile });
  } catch (err) {
    if (err instanceof UnhandledFormatError) {
      log.info(describeError(err));
      return rejected(StatusId.UnhandledFormat);
    }
    if (!(err instanceof BadArchiveError)) throw err;
    log.warn(`Could not open archive: ${describeError(err)}`);
    return rejected(StatusId.BadArchive);
  }

  if (names.length === 0) return rejected(StatusId.NotValid);

  const candidates: string[] = [];
  for (const name of names) {
    if (profile.memberExtensions.includes(posix.extname(name).toLowerCase())) {
      log.debug(`Found: ${posix.basename(name)} in zip`);
      candidates.push(posix.basename(name));
    }
  }

  const category = classify(candidates, categories, rule);
  if (!category) return rejected(StatusId.UnhandledFormat);

  log.info({ category: category.id }, "Recognized data download package");
  return {
    recognized: true,
    category,
    status: statusById(statusCodes, StatusId.Valid),
    statusCodes,
    categories,
  };
}

/**
 * Tree flattening and shallowest-match lookup.
 *
 * Platform exports move the same field to different nesting depths from
 * one release to the next. Extractors flatten each record into a table of
 * dash-joined paths and look fields up by substring instead of by path.
 */
import { describeError, logger } from "./logger.js";

export type Scalar = string | number | boolean | null;

/** Dash-joined path → leaf value, in insertion order. */
export type FlattenedTree = Map<string, Scalar>;

const SEPARATOR = "-";

function isMapping(node: unknown): node is Record<string, unknown> {
  if (typeof node !== "object" || node === null) return false;
  const proto = Object.getPrototypeOf(node);
  return proto === Object.prototype || proto === null;
}

function toScalar(value: unknown): Scalar {
  if (value === undefined || value === null) return null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return String(value);
}

function walk(node: unknown, path: string, table: FlattenedTree): void {
  if (Array.isArray(node)) {
    node.forEach((item, index) => walk(item, `${path}${SEPARATOR}${index}`, table));
    return;
  }
  if (isMapping(node)) {
    for (const [key, value] of Object.entries(node)) {
      walk(value, `${path}${SEPARATOR}${key}`, table);
    }
    return;
  }
  // Identical paths overwrite; the first write keeps its position.
  table.set(path.slice(SEPARATOR.length), toScalar(node));
}

/**
 * Flatten nested mappings and sequences into a path → leaf table.
 *
 * Empty containers contribute no entry. The input is not mutated.
 *
 * @example
 * flatten({ a: [{ b: 1 }, { b: 2 }] }) // Map { "a-0-b" => 1, "a-1-b" => 2 }
 */
export function flatten(tree: unknown): FlattenedTree {
  const table: FlattenedTree = new Map();
  walk(tree, "", table);
  return table;
}

function depthOf(key: string): number {
  return key.split(SEPARATOR).length - 1;
}

/**
 * Value of the least nested key containing `substring`, as a string.
 *
 * Keys of equal depth resolve to the one seen last. Returns "" when no key
 * matches.
 */
export function findFirst(table: FlattenedTree, substring: string): string {
  let out = "";
  let depth = Number.POSITIVE_INFINITY;

  try {
    for (const [key, value] of table) {
      if (!key.includes(substring)) continue;
      const current = depthOf(key);
      if (current <= depth) {
        depth = current;
        out = String(value);
      }
    }
  } catch (err) {
    logger.error({ substring }, `findFirst failed: ${describeError(err)}`);
    return "";
  }

  return out;
}

/** Every value whose key contains `substring`, in table order. */
export function findAll(table: FlattenedTree, substring: string): string[] {
  const out: string[] = [];

  try {
    for (const [key, value] of table) {
      if (key.includes(substring)) out.push(String(value));
    }
  } catch (err) {
    logger.error({ substring }, `findAll failed: ${describeError(err)}`);
    return [];
  }

  return out;
}

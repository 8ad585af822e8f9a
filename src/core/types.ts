/**
 * Shared types for validation, extraction and the donation flow.
 */

// ---------------------------------------------------------------------------
// Package categories
// ---------------------------------------------------------------------------

export enum ContainerType {
  JSON = "json",
  HTML = "html",
  CSV = "csv",
  TXT = "txt",
}

export enum Language {
  EN = "en",
  NL = "nl",
}

/** One concrete shape a platform's export can take. */
export interface DDPCategory {
  id: string;
  containerType: ContainerType;
  language: Language;
  knownFiles: readonly string[];
}

export interface StatusCode {
  id: number;
  description: string;
  message: string;
}

/** Well-known status ids shared by every platform catalogue. */
export const StatusId = {
  Valid: 0,
  UnhandledFormat: 1,
  NotValid: 2,
  BadArchive: 3,
} as const;

export type MatchRule = "any" | "majority";

interface ValidationBase {
  statusCodes: readonly StatusCode[];
  categories: readonly DDPCategory[];
  status: StatusCode;
}

export interface RecognizedValidation extends ValidationBase {
  recognized: true;
  category: DDPCategory;
}

export interface RejectedValidation extends ValidationBase {
  recognized: false;
  category: null;
}

export type ValidationResult = RecognizedValidation | RejectedValidation;

// ---------------------------------------------------------------------------
// Tables
// ---------------------------------------------------------------------------

export type Translatable = Record<Language, string>;

export type Cell = string | number | boolean | null;

export type Row = Record<string, Cell>;

export type DateFormat = "auto" | "year" | "quarter" | "month" | "day" | "hour_cycle" | "weekday" | "hour";

export interface WordcloudSpec {
  type: "wordcloud";
  title: Translatable;
  textColumn: string;
  tokenize?: boolean;
}

export interface ChartSpec {
  type: "area" | "bar" | "line";
  title: Translatable;
  group: { column: string; dateFormat?: DateFormat };
  values: { aggregate?: "count" | "sum" | "mean"; label?: Translatable | string }[];
}

export type VizSpec = WordcloudSpec | ChartSpec;

export interface Table {
  name: string;
  title: Translatable;
  rows: Row[];
  description?: Translatable;
  visualizations: VizSpec[];
}

/** Output of one platform's extraction. */
export interface ExtractionResult {
  tables: Table[];
  /** When set, donated key by key instead of the consent payload. */
  cappedDonations: Record<string, Row[]> | null;
}

export interface ExtractionOptions {
  rowCap: number;
}

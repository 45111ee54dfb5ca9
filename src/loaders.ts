/**
 * Dictionary loading.
 *
 * Both dictionaries come from one of two sources: an in-memory mapping or a
 * JSON file. Loading never throws; a missing or malformed file gives an
 * empty dictionary and a warning for the caller to report.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { EXPRESSION_TYPES } from "./types.js";
import type { ExpressionInfo, ExpressionType } from "./types.js";

/**
 * Expression metadata as written in a dictionary document.
 * Missing fields get defaults: lemma = surface form, pos = "X", type = "fixed".
 */
export const RawExpressionInfoSchema = z.object({
  lemma: z.string().optional(),
  pos: z.string().optional(),
  type: z.string().optional(),
});

export type RawExpressionInfo = z.infer<typeof RawExpressionInfoSchema>;

export const ExpressionDocumentSchema = z.record(
  z.string(),
  RawExpressionInfoSchema
);

export const OverrideDocumentSchema = z.record(z.string(), z.string());

export type DictionarySource =
  | { kind: "memory"; entries: Record<string, RawExpressionInfo> }
  | { kind: "file"; path: string };

export type OverrideSource =
  | { kind: "memory"; entries: Record<string, string> }
  | { kind: "file"; path: string };

export interface LoadResult<T> {
  data: T;
  /** Set when the source could not be used and `data` is empty */
  warning?: string;
}

type ReadResult = { ok: true; value: unknown } | { ok: false; warning: string };

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

function readJsonFile(path: string, label: string): ReadResult {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (error) {
    if (isMissingFile(error)) {
      return { ok: false, warning: `${label} file not found: ${path}` };
    }
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, warning: `Could not read ${label} ${path}: ${reason}` };
  }

  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false, warning: `Invalid JSON in ${label}: ${path}` };
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 3)
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Map a free-form type string onto a known expression type.
 */
export function toExpressionType(type: string | undefined): ExpressionType {
  if (type === undefined) {
    return "fixed";
  }
  const known = EXPRESSION_TYPES.find((t) => t === type);
  return known ?? "other";
}

/**
 * Fill in defaults for a raw dictionary entry.
 */
export function toExpressionInfo(
  surface: string,
  raw: RawExpressionInfo
): ExpressionInfo {
  return {
    lemma: raw.lemma ?? surface,
    pos: raw.pos ?? "X",
    type: toExpressionType(raw.type),
  };
}

function toExpressionMap(
  entries: Record<string, RawExpressionInfo>
): Map<string, ExpressionInfo> {
  const dictionary = new Map<string, ExpressionInfo>();
  for (const [surface, raw] of Object.entries(entries)) {
    dictionary.set(surface, toExpressionInfo(surface, raw));
  }
  return dictionary;
}

function toOverrideMap(entries: Record<string, string>): Map<string, string> {
  const overrides = new Map<string, string>();
  for (const [form, lemma] of Object.entries(entries)) {
    overrides.set(form.toLowerCase(), lemma.toLowerCase());
  }
  return overrides;
}

/**
 * Load an expression dictionary.
 *
 * @example
 * ```ts
 * const { data, warning } = loadExpressionDictionary({
 *   kind: "file",
 *   path: "data/portuguese/mwe_database.json",
 * });
 * ```
 */
export function loadExpressionDictionary(
  source?: DictionarySource
): LoadResult<Map<string, ExpressionInfo>> {
  if (!source) {
    return { data: new Map() };
  }
  if (source.kind === "memory") {
    return { data: toExpressionMap(source.entries) };
  }

  const read = readJsonFile(source.path, "MWE database");
  if (!read.ok) {
    return { data: new Map(), warning: read.warning };
  }

  const parsed = ExpressionDocumentSchema.safeParse(read.value);
  if (!parsed.success) {
    return {
      data: new Map(),
      warning: `Invalid MWE database ${source.path}: ${describeIssues(parsed.error)}`,
    };
  }
  return { data: toExpressionMap(parsed.data) };
}

/**
 * Load a wordform → lemma override dictionary. Keys and values are
 * lowercased.
 */
export function loadOverrideDictionary(
  source?: OverrideSource
): LoadResult<Map<string, string>> {
  if (!source) {
    return { data: new Map() };
  }
  if (source.kind === "memory") {
    return { data: toOverrideMap(source.entries) };
  }

  const read = readJsonFile(source.path, "lemma dictionary");
  if (!read.ok) {
    return { data: new Map(), warning: read.warning };
  }

  const parsed = OverrideDocumentSchema.safeParse(read.value);
  if (!parsed.success) {
    return {
      data: new Map(),
      warning: `Invalid lemma dictionary ${source.path}: ${describeIssues(parsed.error)}`,
    };
  }
  return { data: toOverrideMap(parsed.data) };
}

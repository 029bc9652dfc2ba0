/**
 * Per-field cleaning rules for the landholder extract.
 *
 * Rules take the raw cell text and return the cleaned text, or null when the
 * cell holds one of the dataset's pseudo-null markers. Type coercion happens
 * afterwards, in landholder.ts.
 */

export const LANDHOLDER_FIELDS = [
  "name",
  "gender",
  "pase_name",
  "description",
  "holder_1066",
  "lord_1066",
  "demesne_1086",
  "subtenanted_1086",
  "subtenant_1086",
  "editor",
  "editorial_status",
] as const;

export type LandholderField = (typeof LANDHOLDER_FIELDS)[number];

export type FieldKind = "text" | "optionalText" | "decimal";

export type FieldRule = (raw: string) => string | null;

export const FIELD_COUNT = LANDHOLDER_FIELDS.length;

const NULL_SENTINELS = new Set(["", "null", "undefined"]);

// Surrounding whitespace plus straight and curly double quotes.
const QUOTE_EDGES_RE = /^[\s"“”]+|[\s"“”]+$/g;
const SINGLE_QUOTES_RE = /[‘’]/g;

export function cleanNullSentinel(raw: string): string | null {
  return NULL_SENTINELS.has(raw.toLowerCase()) ? null : raw;
}

export function cleanQuotedText(raw: string): string {
  return raw.replace(QUOTE_EDGES_RE, "").replace(SINGLE_QUOTES_RE, "'");
}

export function collapseWhitespace(raw: string): string {
  return raw.split(/\s+/).filter(Boolean).join(" ");
}

function passThrough(raw: string): string {
  return raw;
}

export const FIELD_KINDS = {
  name: "optionalText",
  gender: "optionalText",
  pase_name: "text",
  description: "text",
  holder_1066: "decimal",
  lord_1066: "decimal",
  demesne_1086: "decimal",
  subtenanted_1086: "decimal",
  subtenant_1086: "decimal",
  editor: "optionalText",
  editorial_status: "text",
} as const satisfies Record<LandholderField, FieldKind>;

export const FIELD_RULES = {
  name: cleanNullSentinel,
  gender: cleanNullSentinel,
  pase_name: collapseWhitespace,
  description: cleanQuotedText,
  holder_1066: passThrough,
  lord_1066: passThrough,
  demesne_1086: passThrough,
  subtenanted_1086: passThrough,
  subtenant_1086: passThrough,
  editor: cleanNullSentinel,
  editorial_status: passThrough,
} satisfies Record<LandholderField, FieldRule>;

export type HoldingField = {
  [K in LandholderField]: (typeof FIELD_KINDS)[K] extends "decimal" ? K : never;
}[LandholderField];

export function cleanField(field: LandholderField, raw: string): string | null {
  return FIELD_RULES[field](raw);
}

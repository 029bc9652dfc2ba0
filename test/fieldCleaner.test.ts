import test from "node:test";
import assert from "node:assert/strict";
import {
  FIELD_KINDS,
  FIELD_RULES,
  LANDHOLDER_FIELDS,
  cleanField,
  cleanNullSentinel,
  cleanQuotedText,
  collapseWhitespace,
} from "../src/services/fieldCleaner.js";

test("null sentinels clean to null, case-insensitively", () => {
  for (const v of ["", "null", "NULL", "Undefined", "undefined"]) {
    assert.equal(cleanNullSentinel(v), null, JSON.stringify(v));
  }
});

test("other values pass the null rule unchanged", () => {
  assert.equal(cleanNullSentinel("Jones"), "Jones");
  assert.equal(cleanNullSentinel("  "), "  ");
  assert.equal(cleanNullSentinel("Null value"), "Null value");
  assert.equal(cleanNullSentinel("F"), "F");
});

test("quoted text loses edge quotes and gets plain apostrophes", () => {
  assert.equal(cleanQuotedText(' "held land, freely" '), "held land, freely");
  assert.equal(cleanQuotedText("“Wulfric’s land”"), "Wulfric's land");
  assert.equal(cleanQuotedText("‘thegn’"), "'thegn'");
  assert.equal(cleanQuotedText('said "so" twice'), 'said "so" twice');
});

test("pase_name whitespace collapses", () => {
  assert.equal(collapseWhitespace("  Aelfric \t 1 "), "Aelfric 1");
  assert.equal(collapseWhitespace("Thorkil 92"), "Thorkil 92");
});

test("every field has a rule and a kind", () => {
  assert.deepEqual(Object.keys(FIELD_RULES), [...LANDHOLDER_FIELDS]);
  assert.deepEqual(Object.keys(FIELD_KINDS), [...LANDHOLDER_FIELDS]);
});

test("cleanField dispatches by field", () => {
  assert.equal(cleanField("editor", "null"), null);
  assert.equal(cleanField("editorial_status", "null"), "null");
  assert.equal(cleanField("pase_name", " Wulfric  280 "), "Wulfric 280");
  assert.equal(cleanField("holder_1066", " 1.0 "), " 1.0 ");
});

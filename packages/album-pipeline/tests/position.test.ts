import test from "node:test";
import assert from "node:assert/strict";
import { classifyTier, coercePosition } from "../src/position";

test("coercePosition keeps finite numbers", () => {
  assert.equal(coercePosition(12), 12);
  assert.equal(coercePosition(0), 0);
  assert.equal(coercePosition(2.5), 2.5);
});

test("coercePosition parses numeric text", () => {
  assert.equal(coercePosition("3"), 3);
  assert.equal(coercePosition(" 42 "), 42);
  assert.equal(coercePosition("7.0"), 7);
  assert.equal(coercePosition("1e2"), 100);
  assert.equal(coercePosition("+4"), 4);
});

test("coercePosition maps placeholders and junk to null", () => {
  assert.equal(coercePosition("-"), null);
  assert.equal(coercePosition(" - "), null);
  assert.equal(coercePosition(undefined), null);
  assert.equal(coercePosition(null), null);
  assert.equal(coercePosition(""), null);
  assert.equal(coercePosition("n/a"), null);
  assert.equal(coercePosition("12abc"), null);
  assert.equal(coercePosition("0x10"), null);
  assert.equal(coercePosition("Infinity"), null);
  assert.equal(coercePosition("1e999"), null);
  assert.equal(coercePosition(true), null);
  assert.equal(coercePosition({ peak: 1 }), null);
  assert.equal(coercePosition(Number.NaN), null);
});

test("classifyTier uses inclusive upper bounds", () => {
  assert.equal(classifyTier(1), "Top 5");
  assert.equal(classifyTier(5), "Top 5");
  assert.equal(classifyTier(5.5), "Top 10");
  assert.equal(classifyTier(10), "Top 10");
  assert.equal(classifyTier(11), "Top 50");
  assert.equal(classifyTier(50), "Top 50");
  assert.equal(classifyTier(51), "No Chart");
  assert.equal(classifyTier(200), "No Chart");
  assert.equal(classifyTier(null), "No Chart");
});

test("coercePosition treats overflowing JSON numbers as missing", () => {
  assert.equal(coercePosition(JSON.parse("1e400")), null);
  assert.equal(coercePosition(Number.NEGATIVE_INFINITY), null);
});

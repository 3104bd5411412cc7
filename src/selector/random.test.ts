import test from "node:test";
import assert from "node:assert/strict";
import { createRandomSource, mulberry32, sampleWithoutReplacement } from "./random.js";

test("mulberry32 repeats its sequence for the same seed", () => {
  const first = mulberry32(1234);
  const second = mulberry32(1234);
  const draws = Array.from({ length: 20 }, () => first());

  assert.deepEqual(
    Array.from({ length: 20 }, () => second()),
    draws
  );
  assert.ok(draws.every((value) => value >= 0 && value < 1));
  assert.notDeepEqual(
    Array.from({ length: 20 }, mulberry32(4321)),
    draws
  );
});

test("createRandomSource uses Math.random without a seed", () => {
  assert.equal(createRandomSource(), Math.random);
  assert.equal(createRandomSource(null), Math.random);
  assert.equal(createRandomSource(7)(), mulberry32(7)());
});

test("sampleWithoutReplacement draws distinct items and leaves the input intact", () => {
  const items = ["a", "b", "c", "d", "e", "f"];
  const sample = sampleWithoutReplacement(items, 4, mulberry32(99));

  assert.equal(sample.length, 4);
  assert.equal(new Set(sample).size, 4);
  assert.ok(sample.every((item) => items.includes(item)));
  assert.deepEqual(items, ["a", "b", "c", "d", "e", "f"]);
});

test("sampleWithoutReplacement caps the count at the population", () => {
  assert.equal(sampleWithoutReplacement(["a", "b"], 5, mulberry32(1)).length, 2);
  assert.deepEqual(sampleWithoutReplacement(["a", "b"], -1, mulberry32(1)), []);
});

test("sampleWithoutReplacement with a zero draw keeps the original order", () => {
  assert.deepEqual(
    sampleWithoutReplacement(["a", "b", "c"], 3, () => 0),
    ["a", "b", "c"]
  );
});

// packages/structural-type-runtime/describe.test.ts

import { expect, test } from "vitest";
import { describe, formatLeaf } from "./describe.ts";
import {
  Book$,
  Library$,
  Loan$,
  Marker$,
  Sample$,
  Shape$,
} from "./testing/descriptors.ts";

test("describe: product with labeled fields", () => {
  expect(describe(Book$, { title: "Dune", pages: 412 })).toBe(
    'Book(title: "Dune", pages: 412)',
  );
});

test("describe: zero-field product", () => {
  expect(describe(Marker$, {})).toBe("Marker()");
});

test("describe: object sum cases", () => {
  expect(describe(Sample$, { type: "a", x: 5 })).toBe("Sample.a(x: 5)");
  expect(describe(Sample$, { type: "b" })).toBe("Sample.b");
});

test("describe: tuple sum cases", () => {
  expect(describe(Shape$, ["circle", 2])).toBe("Shape.circle(2)");
  expect(describe(Shape$, ["rect", 3, 4])).toBe("Shape.rect(w: 3, h: 4)");
  expect(describe(Shape$, "point")).toBe("Shape.point");
});

test("describe: nested descriptor is described recursively", () => {
  const library = { name: "Central", featured: { title: "Dune", pages: 412 } };
  expect(describe(Library$, library)).toBe(
    'Library(name: "Central", featured: Book(title: "Dune", pages: 412))',
  );
});

test("describe: dates, booleans and arrays", () => {
  const loan = {
    due: new Date("2024-03-01T00:00:00.000Z"),
    returned: false,
    tags: ["sf", "classic"],
  };
  expect(describe(Loan$, loan)).toBe(
    'Loan(due: 2024-03-01T00:00:00.000Z, returned: false, tags: ["sf", "classic"])',
  );
});

test("formatLeaf: plain values", () => {
  expect(formatLeaf(10n)).toBe("10n");
  expect(formatLeaf(null)).toBe("null");
  expect(formatLeaf(undefined)).toBe("undefined");
  expect(formatLeaf({ a: 1, b: "x" })).toBe('{ a: 1, b: "x" }');
});

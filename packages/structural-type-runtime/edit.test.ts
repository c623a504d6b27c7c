// packages/structural-type-runtime/edit.test.ts

import { expect, test } from "vitest";
import { controlFor, EditError, fields, update } from "./edit.ts";
import {
  Book$,
  Library$,
  Loan$,
  Marker$,
  Sample$,
  Shape$,
} from "./testing/descriptors.ts";

const dune = { title: "Dune", pages: 412 };

// ============================================================================
// fields
// ============================================================================

test("fields: one field per product member", () => {
  const model = fields(Book$, dune).map(({ path, label, control, value }) => ({
    path,
    label,
    control,
    value,
  }));
  expect(model).toEqual([
    { path: ["title"], label: "Title", control: "text", value: "Dune" },
    { path: ["pages"], label: "Pages", control: "number", value: 412 },
  ]);
});

test("fields: set returns the rebuilt value", () => {
  const [title, pages] = fields(Book$, dune);
  expect(title.set("Children of Dune")).toEqual({
    title: "Children of Dune",
    pages: 412,
  });
  expect(pages.set(500)).toEqual({ title: "Dune", pages: 500 });
  expect(dune).toEqual({ title: "Dune", pages: 412 });
});

test("fields: zero-field product and payload-less case have none", () => {
  expect(fields(Marker$, {})).toEqual([]);
  expect(fields(Sample$, { type: "b" })).toEqual([]);
});

test("fields: sum payloads are prefixed with the case name", () => {
  expect(fields(Sample$, { type: "a", x: 1 }).map((f) => f.path)).toEqual([
    ["a", "x"],
  ]);
  expect(fields(Shape$, ["rect", 3, 4]).map((f) => f.path)).toEqual([
    ["rect", "w"],
    ["rect", "h"],
  ]);
});

test("fields: unlabeled parameters use their position", () => {
  const [radius] = fields(Shape$, ["circle", 2]);
  expect(radius.path).toEqual(["circle", "0"]);
  expect(radius.label).toBe("0");
  expect(radius.set(5)).toEqual(["circle", 5]);
});

test("fields: nested descriptors are flattened", () => {
  const library = { name: "Central", featured: dune };
  const model = fields(Library$, library);
  expect(model.map((f) => f.path.join("."))).toEqual([
    "name",
    "featured.title",
    "featured.pages",
  ]);
  expect(model[2].label).toBe("Pages");
  expect(model[2].set(1)).toEqual({
    name: "Central",
    featured: { title: "Dune", pages: 1 },
  });
});

test("fields: controls follow the leaf value", () => {
  const loan = {
    due: new Date("2024-03-01T00:00:00.000Z"),
    returned: false,
    tags: ["sf"],
  };
  expect(fields(Loan$, loan).map((f) => f.control)).toEqual([
    "date",
    "toggle",
    "readonly",
  ]);
});

test("fields: set rejects input of the wrong kind", () => {
  const loan = { due: new Date(0), returned: false, tags: [] };
  const [due, returned, tags] = fields(Loan$, loan);
  expect(() => returned.set("yes")).toThrow("Field 'returned' expects toggle input");
  expect(() => due.set(new Date(Number.NaN))).toThrow(EditError);
  expect(() => tags.set(["x"])).toThrow("Field 'tags' is read-only");
});

// ============================================================================
// update
// ============================================================================

test("update: dotted and segmented paths", () => {
  const library = { name: "Central", featured: dune };
  expect(update(Library$, library, "featured.title", "Emma")).toEqual({
    name: "Central",
    featured: { title: "Emma", pages: 412 },
  });
  expect(update(Shape$, ["rect", 3, 4], ["rect", "h"], 10)).toEqual([
    "rect",
    3,
    10,
  ]);
});

test("update: unknown path throws EditError with the path", () => {
  try {
    update(Book$, dune, "author", "Herbert");
    expect.unreachable();
  } catch (error) {
    expect(error).toBeInstanceOf(EditError);
    if (error instanceof EditError) {
      expect(error.message).toBe("No editable field at 'author'");
      expect(error.path).toEqual(["author"]);
    }
  }
});

test("controlFor: primitive kinds", () => {
  expect(controlFor("x")).toBe("text");
  expect(controlFor(1)).toBe("number");
  expect(controlFor(true)).toBe("toggle");
  expect(controlFor(new Date(0))).toBe("date");
  expect(controlFor(null)).toBe("readonly");
});

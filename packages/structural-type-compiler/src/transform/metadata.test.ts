// packages/structural-type-compiler/src/transform/metadata.test.ts
import { expect, test } from "vitest";
import { printNode, statementOf } from "../testing/helpers.ts";
import { extractDeclaration } from "./member-extractor.ts";
import { linksTo, metadataExpression, type NestedLinks } from "./metadata.ts";
import { RuntimeScope } from "./runtime-scope.ts";

function metadata(source: string, links?: NestedLinks, scope = new RuntimeScope()) {
  const { sf, stmt } = statementOf(source);
  const model = extractDeclaration(stmt, { discriminant: "type" });
  return printNode(metadataExpression(model, scope, links), sf);
}

test("metadata: product names every field", () => {
  expect(metadata("interface Book { title: string; pages: number }")).toBe(
    `struct("Book", list(propertyName("title"), list(propertyName("pages"), empty)))`,
  );
});

test("metadata: empty product", () => {
  expect(metadata("interface Marker {}")).toBe(`struct("Marker", empty)`);
});

test("metadata: cases chain to nothing", () => {
  expect(metadata(`type Sample = { type: "a"; x: number } | "c"`)).toBe(
    `enumeration("Sample", caseOf("a", list(propertyName("x"), empty), caseOf("c", empty, nothing)))`,
  );
});

test("metadata: unlabeled tuple elements are leaves", () => {
  expect(metadata(`type Shape = ["circle", number] | ["rect", w: number, h: number]`))
    .toBe(
      `enumeration("Shape", caseOf("circle", list(leaf(), empty), caseOf("rect", list(propertyName("w"), list(propertyName("h"), empty)), nothing)))`,
    );
});

test("metadata: never", () => {
  expect(metadata("type Void = never")).toBe(`enumeration("Void", nothing)`);
});

test("metadata: linked fields carry a thunk to the nested descriptor", () => {
  const links = linksTo(new Set(["Book"]));
  expect(
    metadata(
      "type Library = { featured: Book; shelves: Book[]; other: Person }",
      links,
    ),
  ).toBe(
    `struct("Library", list(propertyName("featured", () => Book$), list(propertyName("shelves"), list(propertyName("other"), empty))))`,
  );
  expect(metadata(`type Slot = ["held", Book] | ["free"]`, links)).toBe(
    `enumeration("Slot", caseOf("held", list(leaf(() => Book$), empty), caseOf("free", empty, nothing)))`,
  );
});

test("metadata: generic references are not linked", () => {
  const links = linksTo(new Set(["Box"]));
  expect(metadata("interface Crate { inner: Box<string> }", links)).toBe(
    `struct("Crate", list(propertyName("inner"), empty))`,
  );
});

test("metadata: scope records runtime values", () => {
  const scope = new RuntimeScope("structural$");
  expect(metadata(`type Flag = "on"`, undefined, scope)).toBe(
    `structural$.enumeration("Flag", structural$.caseOf("on", structural$.empty, structural$.nothing))`,
  );
  expect([...scope.values].sort()).toEqual(["caseOf", "empty", "enumeration", "nothing"]);
});

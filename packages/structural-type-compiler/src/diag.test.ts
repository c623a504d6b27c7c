// packages/structural-type-compiler/src/diag.test.ts
import ts from "typescript";
import { afterEach, expect, test, vi } from "vitest";
import { diagnostic, formatCodeFrame, formatDiagnostic, printDiagnostics } from "./diag.ts";
import { parse } from "./testing/helpers.ts";

const SOURCE = [
  "interface A {",
  "  a: string;",
  "  b: number;",
  "  c: boolean;",
  "  d: Date;",
  "}",
].join("\n");

afterEach(() => {
  vi.restoreAllMocks();
});

test("code frame: two lines of context and a caret run", () => {
  const sf = parse(SOURCE, "/virtual/frame.ts");
  const start = SOURCE.indexOf("c: boolean");
  expect(formatCodeFrame(sf, start, "c: boolean".length)).toBe(
    [
      "2 |   a: string;",
      "3 |   b: number;",
      "4 |   c: boolean;",
      "  |   ^^^^^^^^^^",
      "5 |   d: Date;",
      "6 | }",
      "",
    ].join("\n"),
  );
});

test("code frame: multi-line spans are marked to the end of their first line", () => {
  const sf = parse(SOURCE, "/virtual/frame.ts");
  expect(formatCodeFrame(sf, 0, SOURCE.length, { context: 0 })).toBe(
    [
      "1 | interface A {",
      "  | ^^^^^^^^^^^^^",
      "2 |   a: string;",
      "3 |   b: number;",
      "4 |   c: boolean;",
      "5 |   d: Date;",
      "6 | }",
      "",
    ].join("\n"),
  );
});

test("code frame: label follows the carets", () => {
  const sf = parse(SOURCE, "/virtual/frame.ts");
  const start = SOURCE.indexOf("d: Date");
  expect(formatCodeFrame(sf, start, 1, { context: 1, label: "here" })).toBe(
    [
      "4 |   c: boolean;",
      "5 |   d: Date;",
      "  |   ^ here",
      "6 | }",
      "",
    ].join("\n"),
  );
});

test("diagnostic: position covers the node", () => {
  const sf = parse(SOURCE, "/virtual/frame.ts");
  const [decl] = sf.statements;
  if (!decl || !ts.isInterfaceDeclaration(decl)) throw new Error("expected interface");
  const d = diagnostic(decl.name, "Bad name", 9001, "UnsupportedPattern");
  expect(d.file).toBe(sf);
  expect(d.messageText).toBe(
    [
      "Bad name",
      "1 | interface A {",
      "  |           ^ UnsupportedPattern",
      "2 |   a: string;",
      "3 |   b: number;",
      "",
    ].join("\n"),
  );
  expect(d.code).toBe(9001);
  expect(d.start).toBe(10);
  expect(d.length).toBe(1);
  expect(formatDiagnostic("Derivation", d).split("\n")[0]).toBe("DerivationError: Bad name");
  expect(formatDiagnostic("Derivation", d).endsWith("(/virtual/frame.ts:1:11)")).toBe(true);
});

test("printDiagnostics: reports through console.error and returns an exit code", () => {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const plain: ts.Diagnostic = {
    category: ts.DiagnosticCategory.Error,
    code: 1,
    file: undefined,
    start: undefined,
    length: undefined,
    messageText: "Nothing to compile",
  };
  expect(printDiagnostics("Compile", [])).toBe(0);
  expect(printDiagnostics("Compile", [plain])).toBe(1);
  expect(error.mock.calls).toEqual([["CompileError: Nothing to compile"]]);
});

// packages/structural-type-compiler/src/testing/helpers.ts
// In-memory programs, printing and evaluation of generated code for tests.
import { basename, dirname } from "node:path";
import { fileURLToPath } from "node:url";
import ts from "typescript";
import type { StructuralOf } from "../../../structural-type-spec/src/mod.ts";

export const SPEC_MODULE_PATH = fileURLToPath(
  new URL("../../../structural-type-spec/src/mod.ts", import.meta.url),
);

export function parse(source: string, fileName = "/virtual/a.ts"): ts.SourceFile {
  return ts.createSourceFile(
    fileName,
    source,
    ts.ScriptTarget.ES2022,
    true,
    ts.ScriptKind.TS,
  );
}

/** The single top-level statement of `source`. */
export function statementOf(source: string): { sf: ts.SourceFile; stmt: ts.Statement } {
  const sf = parse(source);
  const [stmt] = sf.statements;
  if (!stmt) throw new Error("missing statement");
  return { sf, stmt };
}

export function printNode(node: ts.Node, sf: ts.SourceFile): string {
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  return printer.printNode(ts.EmitHint.Unspecified, node, sf);
}

/**
 * A program over in-memory files; everything else (lib files, the runtime
 * vocabulary) is read from disk. Directories holding in-memory files exist
 * for module resolution.
 */
export function createVirtualProgram(
  files: Readonly<Record<string, string>>,
  compilerOptions: ts.CompilerOptions = {
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.ES2022,
  },
): ts.Program {
  const virtual = new Map(Object.entries(files));
  const baseHost = ts.createCompilerHost(compilerOptions);
  const originalGetSourceFile = baseHost.getSourceFile.bind(baseHost);
  const originalReadFile = baseHost.readFile.bind(baseHost);
  const originalFileExists = baseHost.fileExists.bind(baseHost);

  baseHost.getSourceFile = (file, languageVersion, onError, shouldCreateNewSourceFile) => {
    const text = virtual.get(file);
    if (text !== undefined) {
      return ts.createSourceFile(file, text, languageVersion, true, ts.ScriptKind.TS);
    }
    return originalGetSourceFile(file, languageVersion, onError, shouldCreateNewSourceFile);
  };
  baseHost.readFile = (file) => virtual.get(file) ?? originalReadFile(file);
  baseHost.fileExists = (file) => virtual.has(file) || originalFileExists(file);

  const directories = new Set<string>();
  for (const file of virtual.keys()) {
    for (let dir = dirname(file); !directories.has(dir); dir = dirname(dir)) {
      directories.add(dir);
    }
  }
  const trimmed = (dir: string) => dir.length > 1 ? dir.replace(/\/+$/, "") : dir;
  baseHost.directoryExists = (dir) =>
    directories.has(trimmed(dir)) || ts.sys.directoryExists(dir);
  baseHost.getDirectories = (dir) => {
    const parent = trimmed(dir);
    const children = [...directories]
      .filter((d) => d !== parent && dirname(d) === parent)
      .map((d) => basename(d));
    return [...new Set([...ts.sys.getDirectories(dir), ...children])];
  };
  baseHost.realpath = (path) => virtual.has(path) ? path : ts.sys.realpath?.(path) ?? path;
  baseHost.writeFile = () => {};

  return ts.createProgram([...virtual.keys()], compilerOptions, baseHost);
}

/**
 * Options under which a generated companion must type-check against the real
 * runtime vocabulary.
 */
export function companionCheckOptions(): ts.CompilerOptions {
  return {
    target: ts.ScriptTarget.ES2022,
    module: ts.ModuleKind.ESNext,
    moduleResolution: ts.ModuleResolutionKind.Bundler,
    allowImportingTsExtensions: true,
    noEmit: true,
    strict: true,
    skipLibCheck: true,
    types: [],
    paths: { "structural-type-spec": [SPEC_MODULE_PATH] },
  };
}

export function typeErrors(program: ts.Program): string[] {
  return ts.getPreEmitDiagnostics(program).map((d) => {
    const message = ts.flattenDiagnosticMessageText(d.messageText, "\n");
    if (!d.file || d.start === undefined) return message;
    const { line } = d.file.getLineAndCharacterOfPosition(d.start);
    return `${d.file.fileName}:${line + 1}: ${message}`;
  });
}

/**
 * Evaluate a generated TypeScript module as CommonJS. Imports resolve
 * through `modules`; any other import fails.
 */
export function evaluateModule(
  code: string,
  modules: Readonly<Record<string, object>>,
  fileName = "module.ts",
  transformers?: ts.CustomTransformers,
): Map<string, unknown> {
  const { outputText } = ts.transpileModule(code, {
    fileName,
    compilerOptions: {
      module: ts.ModuleKind.CommonJS,
      target: ts.ScriptTarget.ES2022,
    },
    transformers,
  });
  const exports: Record<string, unknown> = {};
  const require = (id: string): object => {
    const found = modules[id];
    if (found) return found;
    throw new Error(`Unexpected import '${id}' in generated code`);
  };
  const run = new Function("exports", "require", outputText);
  run(exports, require);
  return new Map(Object.entries(exports));
}

/** Exports of an evaluated module as a `require`-able object. */
export function moduleObject(exports: ReadonlyMap<string, unknown>): object {
  return Object.fromEntries(exports);
}

export function isStructural(value: unknown): value is StructuralOf<unknown> {
  return typeof value === "object" && value !== null &&
    "metadata" in value && typeof value.metadata === "object" &&
    "to" in value && typeof value.to === "function" &&
    "from" in value && typeof value.from === "function";
}

export function structuralExport(
  exports: ReadonlyMap<string, unknown>,
  name: string,
): StructuralOf<unknown> {
  const value = exports.get(name);
  if (!isStructural(value)) throw new Error(`'${name}' is not a descriptor`);
  return value;
}

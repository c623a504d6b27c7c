// packages/structural-type-compiler/src/compiler.ts
import { mkdir, readdir, realpath, writeFile } from "node:fs/promises";
import { dirname, join, resolve, sep } from "node:path";
import ts from "typescript";
import type { StructuralConfig } from "./config.ts";
import { companionPath, isCompanion, renderCompanion } from "./generate.ts";
import {
  annotatedStatements,
  type DeriveMode,
  type DeriveResult,
  deriveSourceFile,
} from "./transform/derive.ts";
import { DerivationError, extractDeclaration } from "./transform/member-extractor.ts";
import {
  jsSpecifierRewriter,
  RUNTIME_NAMESPACE,
  structuralRewriter,
} from "./transform/structural-rewriter.ts";

type Options = { srcDir: string; config: StructuralConfig };

export type GenerateResult = {
  written: string[];
  diagnostics: ts.Diagnostic[];
};

export type CompileResult = {
  emitted: string[];
  diagnostics: ts.Diagnostic[];
};

/** One annotated declaration as seen by `listDeclarations`. */
export type DeclarationInfo =
  | {
    readonly file: string;
    readonly name: string;
    readonly kind: "product" | "sum";
    /** Field names of a product, case names of a sum. */
    readonly members: readonly string[];
  }
  | {
    readonly file: string;
    readonly name: string;
    readonly kind: "error";
    readonly message: string;
  };

const COMPILER_OPTIONS: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.ES2022,
  moduleResolution: ts.ModuleResolutionKind.Node10,
};

/**
 * Recursively discover `.ts` sources under `dir`, skipping declaration files.
 */
export async function findSources(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (entry.name === "node_modules" || entry.name.startsWith(".")) continue;
      files.push(...await findSources(path));
    } else if (
      entry.isFile() && entry.name.endsWith(".ts") && !entry.name.endsWith(".d.ts")
    ) {
      files.push(path);
    }
  }
  return files.sort();
}

/**
 * Derive every source file of a program that lives under `absSrcDir`.
 */
export function deriveProgram(
  program: ts.Program,
  absSrcDir: string,
  config: StructuralConfig,
  mode: DeriveMode,
): DeriveResult[] {
  const checker = program.getTypeChecker();
  const isDerived = (fileName: string) =>
    isUnder(fileName, absSrcDir) && !isCompanion(fileName, config);
  return program.getSourceFiles()
    .filter((sf) => !sf.isDeclarationFile && isDerived(sf.fileName))
    .map((sf) =>
      deriveSourceFile(sf, {
        config,
        mode,
        checker,
        namespace: mode === "inline" ? RUNTIME_NAMESPACE : undefined,
        isDerived,
      })
    );
}

/**
 * Write a companion module next to every source file with annotated
 * declarations. Nothing is written when any declaration fails.
 */
export async function generateProject(
  { srcDir, config }: Options,
): Promise<GenerateResult> {
  const absSrcDir = await realpath(srcDir);
  const files = (await findSources(absSrcDir)).filter((f) => !isCompanion(f, config));
  const program = ts.createProgram(files, { ...COMPILER_OPTIONS, noEmit: true });
  const results = deriveProgram(program, absSrcDir, config, "companion");

  const diagnostics = results.flatMap((r) => [...r.diagnostics]);
  if (diagnostics.length) return { written: [], diagnostics };

  const written: string[] = [];
  for (const result of results) {
    if (result.derived.length === 0) continue;
    const target = companionPath(result.sourceFile.fileName, config);
    await writeFile(target, renderCompanion(result, config));
    written.push(target);
  }
  return { written, diagnostics: [] };
}

/**
 * Emit JavaScript for `srcDir` into `outDir` with derived descriptors
 * injected into their declaring modules.
 */
export async function compileProject(
  { srcDir, outDir, config }: Options & { outDir: string },
): Promise<CompileResult> {
  const absSrcDir = await realpath(srcDir);
  const files = (await findSources(absSrcDir)).filter((f) => !isCompanion(f, config));
  const program = ts.createProgram(files, {
    ...COMPILER_OPTIONS,
    outDir: resolve(outDir),
    rootDir: absSrcDir,
  });

  const results = deriveProgram(program, absSrcDir, config, "inline");
  const diagnostics = results.flatMap((r) => [...r.diagnostics]);
  if (diagnostics.length) return { emitted: [], diagnostics };

  const derivations = new Map(results.map((r) => [r.sourceFile.fileName, r]));
  const transformers: ts.CustomTransformers = {
    before: [structuralRewriter(derivations, config.runtimeModule)],
    after: [jsSpecifierRewriter()],
  };

  const outputFiles = new Map<string, string>();
  const emitResult = program.emit(
    undefined,
    (fileName, text) => {
      outputFiles.set(fileName, text);
    },
    undefined,
    false,
    transformers,
  );
  if (emitResult.diagnostics.length > 0) {
    return { emitted: [], diagnostics: [...emitResult.diagnostics] };
  }

  const emitted: string[] = [];
  for (const [fileName, text] of outputFiles) {
    await mkdir(dirname(fileName), { recursive: true });
    await writeFile(fileName, text);
    emitted.push(fileName);
  }
  return { emitted, diagnostics: [] };
}

/**
 * Annotated declarations under `srcDir`, in file order. Declarations that
 * cannot be derived are reported with their error instead of failing the scan.
 */
export async function listDeclarations(
  { srcDir, config }: Options,
): Promise<DeclarationInfo[]> {
  const absSrcDir = await realpath(srcDir);
  const files = (await findSources(absSrcDir)).filter((f) => !isCompanion(f, config));
  const program = ts.createProgram(files, { ...COMPILER_OPTIONS, noEmit: true });
  const checker = program.getTypeChecker();

  const infos: DeclarationInfo[] = [];
  for (const file of files) {
    const sf = program.getSourceFile(file);
    if (!sf) continue;
    for (const stmt of annotatedStatements(sf, config.tag)) {
      const name = statementName(stmt);
      try {
        const model = extractDeclaration(stmt, {
          discriminant: config.discriminant,
          checker,
        });
        infos.push({
          file,
          name,
          kind: model.kind,
          members: model.kind === "product"
            ? model.fields.map((f) => f.name)
            : model.cases.map((c) => c.name),
        });
      } catch (err) {
        if (!(err instanceof DerivationError)) throw err;
        infos.push({ file, name, kind: "error", message: err.message });
      }
    }
  }
  return infos;
}

function statementName(stmt: ts.Statement): string {
  if (
    ts.isInterfaceDeclaration(stmt) || ts.isTypeAliasDeclaration(stmt) ||
    ts.isEnumDeclaration(stmt)
  ) {
    return stmt.name.text;
  }
  if (ts.isClassDeclaration(stmt) || ts.isFunctionDeclaration(stmt)) {
    return stmt.name?.text ?? "<anonymous>";
  }
  return "<anonymous>";
}

function isUnder(fileName: string, dir: string): boolean {
  const abs = resolve(fileName);
  return abs === dir || abs.startsWith(dir + sep);
}

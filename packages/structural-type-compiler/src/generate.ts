// packages/structural-type-compiler/src/generate.ts
// Companion module rendering: book.ts -> book.structural.ts
import { basename } from "node:path";
import ts from "typescript";
import type { StructuralConfig } from "./config.ts";
import type { DeriveResult } from "./transform/derive.ts";
import { importDeclaration } from "./transform/imports.ts";

export function companionPath(fileName: string, config: StructuralConfig): string {
  return fileName.replace(/\.ts$/, config.companionSuffix);
}

export function isCompanion(fileName: string, config: StructuralConfig): boolean {
  return fileName.endsWith(config.companionSuffix);
}

/**
 * Print the companion module of a derived file: a header, type imports of
 * the declarations and of the types their members name, the runtime imports
 * the generated code uses, descriptors of other files, then per declaration
 * its structure alias and descriptor.
 */
export function renderCompanion(
  result: DeriveResult,
  config: StructuralConfig,
): string {
  const sf = result.sourceFile;
  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  const print = (node: ts.Node) => printer.printNode(ts.EmitHint.Unspecified, node, sf);

  const runtime = (typeOnly: boolean, names: readonly string[]) =>
    names.length
      ? [
        importDeclaration(
          typeOnly,
          "named",
          names.map((name) => ({ name })),
          config.runtimeModule,
        ),
      ]
      : [];
  const imports = [
    ...result.imports.declarations(true),
    ...runtime(true, [...result.scope.types].sort()),
    ...runtime(false, [...result.scope.values].sort()),
    ...result.imports.declarations(false),
  ];

  const lines = [
    `// Generated by structural from ./${basename(sf.fileName)}. Regenerate rather than edit.`,
    "",
    ...imports.map(print),
  ];
  for (const d of result.derived) {
    lines.push("", print(d.structureAlias), "", print(d.descriptor));
  }
  return lines.join("\n") + "\n";
}

// packages/structural-type-compiler/src/transform/structural-rewriter.ts
import ts from "typescript";
import type { DeriveResult } from "./derive.ts";

export const RUNTIME_NAMESPACE = "structural$";

/**
 * Inject derived members into the emitted JavaScript of the declaring file.
 *
 * Before: export interface Book { title: string }   (tagged for derivation)
 * After:  import * as structural$ from "structural-type-spec";
 *         export interface Book { title: string }
 *         export const Book$ = { metadata: structural$.struct(...), ... };
 *
 * Descriptors of other files that metadata links to are imported as values.
 * `derivations` is keyed by source file name and must have been derived with
 * `namespace: RUNTIME_NAMESPACE`.
 */
export function structuralRewriter(
  derivations: ReadonlyMap<string, DeriveResult>,
  runtimeModule: string,
) {
  const factory = ts.factory;
  return (_ctx: ts.TransformationContext) => (sf: ts.SourceFile): ts.SourceFile => {
    const result = derivations.get(sf.fileName);
    if (!result || result.derived.length === 0) return sf;

    const importDecl = factory.createImportDeclaration(
      undefined,
      factory.createImportClause(
        false,
        undefined,
        factory.createNamespaceImport(factory.createIdentifier(RUNTIME_NAMESPACE)),
      ),
      factory.createStringLiteral(runtimeModule),
      undefined,
    );

    return factory.updateSourceFile(sf, [
      importDecl,
      ...result.imports.declarations(false),
      ...sf.statements,
      ...result.derived.map((d) => d.descriptor),
    ]);
  };
}

/**
 * Point relative `.ts` specifiers of imports and re-exports at the emitted
 * `.js` files. Runs as an `after` transformer: a `before` transformer that
 * replaces an import declaration keeps it from being elided.
 */
export function jsSpecifierRewriter() {
  return (ctx: ts.TransformationContext) => (sf: ts.SourceFile): ts.SourceFile => {
    const f = ctx.factory;
    const statements = sf.statements.map((stmt) => {
      if (ts.isImportDeclaration(stmt)) {
        const specifier = emittedSpecifier(stmt.moduleSpecifier);
        return specifier
          ? f.updateImportDeclaration(
            stmt,
            stmt.modifiers,
            stmt.importClause,
            specifier,
            stmt.attributes,
          )
          : stmt;
      }
      if (ts.isExportDeclaration(stmt) && stmt.moduleSpecifier) {
        const specifier = emittedSpecifier(stmt.moduleSpecifier);
        return specifier
          ? f.updateExportDeclaration(
            stmt,
            stmt.modifiers,
            stmt.isTypeOnly,
            stmt.exportClause,
            specifier,
            stmt.attributes,
          )
          : stmt;
      }
      return stmt;
    });
    return f.updateSourceFile(sf, statements);
  };
}

function emittedSpecifier(node: ts.Expression): ts.StringLiteral | undefined {
  if (!ts.isStringLiteral(node) || !node.text.startsWith(".") || !node.text.endsWith(".ts")) {
    return undefined;
  }
  return ts.factory.createStringLiteral(node.text.replace(/\.ts$/, ".js"));
}

// packages/structural-type-compiler/src/transform/derive.ts
// Finds annotated declarations in a source file and runs the derivation
// pipeline: member model, canonical type, metadata, isomorphism.
import ts from "typescript";
import type { StructuralConfig } from "../config.ts";
import { diagnostic } from "../diag.ts";
import { companionPath } from "../generate.ts";
import { selfType, structureAlias, structureType } from "./canonical-type.ts";
import { isomorphism } from "./isomorphism.ts";
import {
  type DeclarationModel,
  DerivationError,
  type DerivationErrorCode,
  extractDeclaration,
} from "./member-extractor.ts";
import {
  type ImportBinding,
  ModuleImports,
  rebaseSpecifier,
  relativeSpecifier,
  sameBinding,
} from "./imports.ts";
import { linksTo, metadataExpression, type NestedLinks } from "./metadata.ts";
import { RuntimeScope } from "./runtime-scope.ts";
import { moduleName, typeReferences } from "./type-references.ts";

export type DeriveMode = "inline" | "companion";

export type DeriveOptions = {
  config: StructuralConfig;
  mode: DeriveMode;
  checker?: ts.TypeChecker;
  /** Qualifies runtime references; used when injecting into the source file. */
  namespace?: string;
  /**
   * Whether another file gets descriptors of its own, so fields typed with
   * its declarations can link to them. Needs `checker`.
   */
  isDerived?: (fileName: string) => boolean;
};

export type DerivedDeclaration = {
  readonly model: DeclarationModel;
  readonly structureAlias: ts.TypeAliasDeclaration;
  readonly descriptor: ts.Statement;
};

export type DeriveResult = {
  readonly sourceFile: ts.SourceFile;
  readonly derived: readonly DerivedDeclaration[];
  readonly diagnostics: readonly ts.Diagnostic[];
  readonly scope: RuntimeScope;
  /** Declarations and descriptors the generated code imports. */
  readonly imports: ModuleImports;
};

export const DIAGNOSTIC_CODES: Record<DerivationErrorCode, number> = {
  UnsupportedMemberShape: 9001,
  UnsupportedPattern: 9002,
  MissingTypeAnnotation: 9003,
  UnsupportedDeclarationKind: 9004,
};

export function hasJSDocTag(node: ts.Node, tagName: string): boolean {
  const jsDocs = ts.getJSDocTags(node);
  return jsDocs.some((t) => t.tagName.text === tagName);
}

/**
 * Top-level statements carrying the derivation tag.
 */
export function annotatedStatements(
  sourceFile: ts.SourceFile,
  tag: string,
): ts.Statement[] {
  return sourceFile.statements.filter((stmt) => hasJSDocTag(stmt, tag));
}

/**
 * Derive every annotated declaration of a file. A `DerivationError` becomes a
 * diagnostic with a code frame and the remaining declarations are still
 * derived; any other error propagates.
 */
export function deriveSourceFile(
  sourceFile: ts.SourceFile,
  options: DeriveOptions,
): DeriveResult {
  const { config, mode, checker } = options;
  const scope = new RuntimeScope(options.namespace);
  const imports = new ModuleImports();
  const diagnostics: ts.Diagnostic[] = [];
  const models: DeclarationModel[] = [];
  const referenced = new Map<string, ImportBinding>();

  for (const stmt of annotatedStatements(sourceFile, config.tag)) {
    try {
      const model = extractDeclaration(stmt, {
        discriminant: config.discriminant,
        checker,
      });
      if (mode === "companion") {
        if (!model.exported) {
          throw new DerivationError(
            "UnsupportedDeclarationKind",
            model.node.name,
            `Declaration '${model.name}' must be exported to derive a companion module`,
          );
        }
        for (const binding of companionReferences(model, sourceFile, config, referenced)) {
          referenced.set(binding.name, binding);
        }
      }
      models.push(model);
    } catch (err) {
      if (!(err instanceof DerivationError)) throw err;
      diagnostics.push(derivationDiagnostic(err));
    }
  }

  if (mode === "companion") {
    const module = relativeSpecifier(
      sourceFile.fileName,
      sourceFile.fileName,
      config.importExtension,
    );
    for (const model of models) {
      imports.add({ module, form: "named", name: model.name, typeOnly: true });
    }
    for (const binding of referenced.values()) imports.add(binding);
  }

  const linkable = new Set(
    models.filter((m) => m.typeParameters.length === 0).map((m) => m.name),
  );
  const local = linksTo(linkable);
  const links: NestedLinks = checker
    ? (type) => local(type) ?? linkAcrossFiles(type, sourceFile, options, imports)
    : local;
  const derived = models.map((model) => deriveDeclaration(model, scope, links, mode));
  return { sourceFile, derived, diagnostics, scope, imports };
}

export function derivationDiagnostic(err: DerivationError): ts.Diagnostic {
  return diagnostic(err.node, err.message, DIAGNOSTIC_CODES[err.code], err.code);
}

/**
 * Type-only bindings a companion of `sourceFile` needs for the names member
 * types of `model` mention. Member types of object cases resolved through
 * the checker may come from another file and are resolved there.
 */
function companionReferences(
  model: DeclarationModel,
  sourceFile: ts.SourceFile,
  config: StructuralConfig,
  bound: ReadonlyMap<string, ImportBinding>,
): ImportBinding[] {
  const bindings: ImportBinding[] = [];
  for (const node of typeReferences(model)) {
    const file = node.getSourceFile();
    const resolved = moduleName(file, node.text);
    if (!resolved) continue;

    let binding: ImportBinding;
    if (resolved.kind === "local") {
      if (resolved.exportedAs === undefined) {
        throw new DerivationError(
          "UnsupportedDeclarationKind",
          node,
          `Type '${node.text}' must be exported for the companion module to import it`,
        );
      }
      binding = {
        module: relativeSpecifier(sourceFile.fileName, file.fileName, config.importExtension),
        form: "named",
        name: node.text,
        imported: resolved.exportedAs === node.text ? undefined : resolved.exportedAs,
        typeOnly: true,
      };
    } else {
      binding = {
        module: rebaseSpecifier(resolved.module, file.fileName, sourceFile.fileName),
        form: resolved.form,
        name: node.text,
        imported: resolved.imported,
        typeOnly: true,
      };
    }

    const previous = bound.get(node.text);
    if (previous && !sameBinding(previous, binding)) {
      throw new DerivationError(
        "UnsupportedPattern",
        node,
        `Type name '${node.text}' refers to different declarations in one companion module`,
      );
    }
    bindings.push(binding);
  }
  return bindings;
}

/**
 * Links `author: Person` to `Person$` when the checker resolves `Person` to
 * an annotated, non-generic declaration of another derived file, and records
 * the import of that descriptor.
 */
function linkAcrossFiles(
  type: ts.TypeNode,
  sourceFile: ts.SourceFile,
  options: DeriveOptions,
  imports: ModuleImports,
): string | undefined {
  const { checker, config, mode, isDerived } = options;
  if (
    !checker || !ts.isTypeReferenceNode(type) || type.typeArguments?.length ||
    !ts.isIdentifier(type.typeName)
  ) {
    return undefined;
  }
  let symbol = checker.getSymbolAtLocation(type.typeName);
  if (symbol && symbol.flags & ts.SymbolFlags.Alias) {
    symbol = checker.getAliasedSymbol(symbol);
  }
  const decl = (symbol?.declarations ?? [])
    .filter((d): d is ts.InterfaceDeclaration | ts.TypeAliasDeclaration =>
      ts.isInterfaceDeclaration(d) || ts.isTypeAliasDeclaration(d)
    )
    .find((d) => !d.typeParameters?.length && hasJSDocTag(d, config.tag));
  if (!decl) return undefined;
  const file = decl.getSourceFile();
  if (
    file === sourceFile || file.isDeclarationFile ||
    (isDerived !== undefined && !isDerived(file.fileName))
  ) {
    return undefined;
  }

  const name = `${type.typeName.text}$`;
  const exported = `${decl.name.text}$`;
  const module = mode === "companion"
    ? relativeSpecifier(
      sourceFile.fileName,
      companionPath(file.fileName, config),
      config.importExtension,
    )
    : relativeSpecifier(sourceFile.fileName, file.fileName, ".js");
  const clash = imports.add({
    module,
    form: "named",
    name,
    imported: exported === name ? undefined : exported,
    typeOnly: false,
  });
  return clash ? undefined : name;
}

/**
 * Structure alias plus the `Name$` descriptor. Generic declarations get a
 * factory function instead of a constant.
 *
 * @example
 * ```ts
 * export type BookStructure = Struct<List<Property<string>, Empty>>;
 * export const Book$: Structural<Book, BookStructure> = {
 *   metadata: struct("Book", list(propertyName("title"), empty)),
 *   to: value => [value.title, []],
 *   from: canonical => ({ title: canonical[0] }),
 * };
 * ```
 */
export function deriveDeclaration(
  model: DeclarationModel,
  scope: RuntimeScope,
  links: NestedLinks,
  mode: DeriveMode,
): DerivedDeclaration {
  const f = ts.factory;
  const exported = mode === "companion" || model.exported;
  const modifiers = exported
    ? [f.createModifier(ts.SyntaxKind.ExportKeyword)]
    : undefined;

  const { to, from } = isomorphism(model, scope);
  const body = f.createObjectLiteralExpression([
    f.createPropertyAssignment("metadata", metadataExpression(model, scope, links)),
    f.createPropertyAssignment("to", to),
    f.createPropertyAssignment("from", from),
  ], true);
  const descriptorType = scope.type("Structural", [
    selfType(model),
    structureType(model),
  ]);
  const name = `${model.name}$`;

  const descriptor = model.typeParameters.length
    ? f.createFunctionDeclaration(
      modifiers,
      undefined,
      name,
      model.typeParameters,
      [],
      descriptorType,
      f.createBlock([f.createReturnStatement(body)], true),
    )
    : f.createVariableStatement(
      modifiers,
      f.createVariableDeclarationList([
        f.createVariableDeclaration(name, undefined, descriptorType, body),
      ], ts.NodeFlags.Const),
    );

  return {
    model,
    structureAlias: structureAlias(model, scope, exported),
    descriptor,
  };
}

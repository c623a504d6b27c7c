// packages/structural-type-compiler/src/transform/type-references.ts
import ts from "typescript";
import type { DeclarationModel } from "./member-extractor.ts";

/**
 * Names that member types of a declaration mention (`author: Person`,
 * `tags: readonly Tag[]`, `ns.Id`), first occurrence each. Type parameters
 * of the declaration and names bound inside a member type are excluded.
 */
export function typeReferences(model: DeclarationModel): ts.Identifier[] {
  const types = model.kind === "product"
    ? model.fields.map((f) => f.type)
    : model.cases.flatMap((c) => c.parameters.map((p) => p.type));
  const declared = new Set(model.typeParameters.map((p) => p.name.text));
  const found = new Map<string, ts.Identifier>();

  const note = (name: ts.EntityName, bound: ReadonlySet<string>) => {
    const head = leftmost(name);
    if (!bound.has(head.text) && !found.has(head.text)) found.set(head.text, head);
  };
  const visit = (node: ts.Node, bound: ReadonlySet<string>): void => {
    if (ts.isTypeReferenceNode(node)) note(node.typeName, bound);
    else if (ts.isTypeQueryNode(node)) note(node.exprName, bound);
    const inner = bindsNames(node, bound);
    ts.forEachChild(node, (child) => visit(child, inner));
  };

  for (const type of types) {
    visit(type, new Set([...declared, ...inferNames(type)]));
  }
  return [...found.values()];
}

function leftmost(name: ts.EntityName): ts.Identifier {
  return ts.isIdentifier(name) ? name : leftmost(name.left);
}

function bindsNames(node: ts.Node, bound: ReadonlySet<string>): ReadonlySet<string> {
  if (ts.isMappedTypeNode(node)) {
    return new Set([...bound, node.typeParameter.name.text]);
  }
  if (
    (ts.isFunctionTypeNode(node) || ts.isConstructorTypeNode(node) ||
      ts.isMethodSignature(node) || ts.isCallSignatureDeclaration(node) ||
      ts.isConstructSignatureDeclaration(node)) && node.typeParameters
  ) {
    return new Set([...bound, ...node.typeParameters.map((p) => p.name.text)]);
  }
  return bound;
}

function inferNames(type: ts.TypeNode): string[] {
  const names: string[] = [];
  const visit = (node: ts.Node): void => {
    if (ts.isInferTypeNode(node)) names.push(node.typeParameter.name.text);
    ts.forEachChild(node, visit);
  };
  visit(type);
  return names;
}

/** How a name is bound at the top level of a module. */
export type ModuleName =
  | { readonly kind: "local"; readonly exportedAs?: string }
  | {
    readonly kind: "import";
    readonly module: string;
    readonly form: "named" | "default" | "namespace";
    readonly imported?: string;
  };

/**
 * Resolve `name` against the top-level declarations and imports of `file`.
 * `undefined` means the name is global.
 */
export function moduleName(file: ts.SourceFile, name: string): ModuleName | undefined {
  for (const stmt of file.statements) {
    if (ts.isImportDeclaration(stmt) && ts.isStringLiteral(stmt.moduleSpecifier)) {
      const imported = importedName(stmt, name);
      if (imported) return { kind: "import", module: stmt.moduleSpecifier.text, ...imported };
    } else if (declaredNames(stmt).includes(name)) {
      return { kind: "local", exportedAs: exportedAs(file, stmt, name) };
    }
  }
  return undefined;
}

function importedName(
  decl: ts.ImportDeclaration,
  name: string,
): Pick<Extract<ModuleName, { kind: "import" }>, "form" | "imported"> | undefined {
  const clause = decl.importClause;
  if (!clause) return undefined;
  if (clause.name?.text === name) return { form: "default" };
  const bindings = clause.namedBindings;
  if (!bindings) return undefined;
  if (ts.isNamespaceImport(bindings)) {
    return bindings.name.text === name ? { form: "namespace" } : undefined;
  }
  const element = bindings.elements.find((e) => e.name.text === name);
  if (!element) return undefined;
  return { form: "named", imported: element.propertyName?.text };
}

function declaredNames(stmt: ts.Statement): string[] {
  if (
    ts.isInterfaceDeclaration(stmt) || ts.isTypeAliasDeclaration(stmt) ||
    ts.isEnumDeclaration(stmt)
  ) {
    return [stmt.name.text];
  }
  if (ts.isClassDeclaration(stmt) || ts.isFunctionDeclaration(stmt)) {
    return stmt.name ? [stmt.name.text] : [];
  }
  if (ts.isModuleDeclaration(stmt) && ts.isIdentifier(stmt.name)) {
    return [stmt.name.text];
  }
  if (ts.isVariableStatement(stmt)) {
    return stmt.declarationList.declarations.flatMap((d) =>
      ts.isIdentifier(d.name) ? [d.name.text] : []
    );
  }
  return [];
}

function hasExportModifier(stmt: ts.Statement): boolean {
  return ts.canHaveModifiers(stmt) &&
    (ts.getModifiers(stmt) ?? []).some((m) => m.kind === ts.SyntaxKind.ExportKeyword) &&
    !(ts.getModifiers(stmt) ?? []).some((m) => m.kind === ts.SyntaxKind.DefaultKeyword);
}

/** The name under which `file` exports its local `name`, if it does. */
function exportedAs(
  file: ts.SourceFile,
  stmt: ts.Statement,
  name: string,
): string | undefined {
  if (hasExportModifier(stmt)) return name;
  for (const other of file.statements) {
    if (
      !ts.isExportDeclaration(other) || other.moduleSpecifier ||
      !other.exportClause || !ts.isNamedExports(other.exportClause)
    ) {
      continue;
    }
    const element = other.exportClause.elements.find((e) =>
      (e.propertyName ?? e.name).text === name
    );
    if (element) return element.name.text;
  }
  return undefined;
}

// packages/structural-type-compiler/src/transform/member-extractor.ts
// Turns an annotated declaration into the ordered member model the
// builders fold over.
import ts from "typescript";
import { match as patternMatch } from "ts-pattern";

// ============================================================================
// Model
// ============================================================================

export type DerivationErrorCode =
  | "UnsupportedMemberShape"
  | "UnsupportedPattern"
  | "MissingTypeAnnotation"
  | "UnsupportedDeclarationKind";

export class DerivationError extends Error {
  constructor(
    public readonly code: DerivationErrorCode,
    public readonly node: ts.Node,
    detail: string,
  ) {
    super(`${code}: ${detail}`);
    this.name = "DerivationError";
  }
}

export type FieldModel = {
  readonly name: string;
  readonly type: ts.TypeNode;
};

/** A case parameter; `label` is absent for unnamed tuple elements. */
export type ParameterModel = {
  readonly label?: string;
  readonly type: ts.TypeNode;
};

export type CaseModel = {
  readonly name: string;
  readonly form: "object" | "tuple" | "literal";
  readonly parameters: readonly ParameterModel[];
};

type DeclarationCommon = {
  readonly name: string;
  readonly typeParameters: readonly ts.TypeParameterDeclaration[];
  readonly exported: boolean;
  readonly node: ts.InterfaceDeclaration | ts.TypeAliasDeclaration;
};

export type ProductModel = DeclarationCommon & {
  readonly kind: "product";
  readonly fields: readonly FieldModel[];
};

export type SumModel = DeclarationCommon & {
  readonly kind: "sum";
  readonly discriminant: string;
  readonly family: "object" | "tuple";
  readonly cases: readonly CaseModel[];
};

export type DeclarationModel = ProductModel | SumModel;

export type ExtractOptions = {
  discriminant: string;
  /** Lets object cases be named through type aliases and interfaces. */
  checker?: ts.TypeChecker;
};

// ============================================================================
// Declarations
// ============================================================================

/**
 * Build the member model of one declaration. Pure; the first unsupported
 * member aborts the whole declaration with a `DerivationError`.
 *
 * @example
 * ```ts
 * // interface Book { title: string; pages: number }
 * extractDeclaration(stmt, { discriminant: "type" });
 * // { kind: "product", name: "Book", fields: [{ name: "title", ... }, ...] }
 * ```
 */
export function extractDeclaration(
  stmt: ts.Statement,
  options: ExtractOptions,
): DeclarationModel {
  return patternMatch<ts.Statement, DeclarationModel>(stmt)
    .when(ts.isInterfaceDeclaration, (decl) => extractInterface(decl))
    .when(ts.isTypeAliasDeclaration, (decl) => extractAlias(decl, options))
    .otherwise((other) => {
      throw new DerivationError(
        "UnsupportedDeclarationKind",
        other,
        `Only interfaces and type aliases can be derived, found ${
          describeStatement(other)
        }`,
      );
    });
}

function extractInterface(decl: ts.InterfaceDeclaration): ProductModel {
  if (decl.heritageClauses?.length) {
    throw new DerivationError(
      "UnsupportedDeclarationKind",
      decl.heritageClauses[0],
      `Interface '${decl.name.text}' extends other types; declare its members directly`,
    );
  }
  return {
    kind: "product",
    ...common(decl),
    fields: extractFields(decl.members),
  };
}

function extractAlias(
  decl: ts.TypeAliasDeclaration,
  options: ExtractOptions,
): DeclarationModel {
  const body = unwrap(decl.type);
  if (ts.isTypeLiteralNode(body)) {
    return { kind: "product", ...common(decl), fields: extractFields(body.members) };
  }
  if (body.kind === ts.SyntaxKind.NeverKeyword) {
    return sum(decl, options, []);
  }
  if (ts.isUnionTypeNode(body)) {
    return sum(decl, options, body.types);
  }
  if (ts.isTupleTypeNode(body) || isStringLiteralType(body)) {
    return sum(decl, options, [body]);
  }
  throw new DerivationError(
    "UnsupportedDeclarationKind",
    decl.type,
    `Type alias '${decl.name.text}' must be an object type, a union of cases or never`,
  );
}

function common(
  decl: ts.InterfaceDeclaration | ts.TypeAliasDeclaration,
): DeclarationCommon {
  return {
    name: decl.name.text,
    typeParameters: decl.typeParameters ?? [],
    exported: decl.modifiers?.some((m) => m.kind === ts.SyntaxKind.ExportKeyword) ??
      false,
    node: decl,
  };
}

function describeStatement(stmt: ts.Statement): string {
  if (ts.isClassDeclaration(stmt)) return "a class";
  if (ts.isEnumDeclaration(stmt)) return "an enum";
  if (ts.isFunctionDeclaration(stmt)) return "a function";
  if (ts.isVariableStatement(stmt)) return "a variable";
  if (ts.isModuleDeclaration(stmt)) return "a namespace";
  return ts.SyntaxKind[stmt.kind];
}

// ============================================================================
// Products
// ============================================================================

/**
 * Stored fields in declaration order. Accessors, methods, call and construct
 * signatures are computed members and are skipped.
 */
export function extractFields(
  members: readonly ts.TypeElement[],
  skip?: string,
): FieldModel[] {
  const fields: FieldModel[] = [];
  for (const member of members) {
    const field = patternMatch<ts.TypeElement, FieldModel | null>(member)
      .when(ts.isPropertySignature, (prop) => extractField(prop))
      .when(ts.isIndexSignatureDeclaration, (index) => {
        throw new DerivationError(
          "UnsupportedMemberShape",
          index,
          "Index signatures bind many names to one type",
        );
      })
      .when(ts.isGetAccessorDeclaration, () => null)
      .when(ts.isSetAccessorDeclaration, () => null)
      .when(ts.isMethodSignature, () => null)
      .when(ts.isCallSignatureDeclaration, () => null)
      .when(ts.isConstructSignatureDeclaration, () => null)
      .otherwise((other) => {
        throw new DerivationError(
          "UnsupportedMemberShape",
          other,
          `Unsupported member ${ts.SyntaxKind[other.kind]}`,
        );
      });
    if (field && field.name !== skip) fields.push(field);
  }
  return fields;
}

function extractField(prop: ts.PropertySignature): FieldModel {
  if (!ts.isIdentifier(prop.name)) {
    throw new DerivationError(
      "UnsupportedPattern",
      prop.name,
      `Member name '${prop.name.getText()}' must be a plain identifier`,
    );
  }
  const name = prop.name.text;
  if (prop.questionToken) {
    throw new DerivationError(
      "UnsupportedMemberShape",
      prop,
      `Optional member '${name}' cannot be derived`,
    );
  }
  if (!prop.type) {
    throw new DerivationError(
      "MissingTypeAnnotation",
      prop,
      `Member '${name}' needs an explicit type annotation`,
    );
  }
  return { name, type: prop.type };
}

// ============================================================================
// Sums
// ============================================================================

type Variant =
  | { readonly form: "object"; readonly node: ts.TypeNode; readonly members: readonly ts.TypeElement[] }
  | { readonly form: "tuple"; readonly node: ts.TupleTypeNode }
  | { readonly form: "literal"; readonly node: ts.LiteralTypeNode; readonly name: string };

function sum(
  decl: ts.TypeAliasDeclaration,
  options: ExtractOptions,
  members: readonly ts.TypeNode[],
): SumModel {
  const variants = members.map((m) => classifyVariant(m, options));

  const firstObject = variants.find((v) => v.form === "object");
  const firstTuple = variants.find((v) => v.form === "tuple");
  if (firstObject && firstTuple) {
    const later = variants.indexOf(firstObject) > variants.indexOf(firstTuple)
      ? firstObject
      : firstTuple;
    throw new DerivationError(
      "UnsupportedMemberShape",
      later.node,
      "Cannot mix object and tuple cases in one sum",
    );
  }

  const cases: CaseModel[] = [];
  const seen = new Set<string>();
  for (const variant of variants) {
    const model = extractCase(variant, options.discriminant);
    if (seen.has(model.name)) {
      throw new DerivationError(
        "UnsupportedMemberShape",
        variant.node,
        `Duplicate case '${model.name}'`,
      );
    }
    seen.add(model.name);
    cases.push(model);
  }

  return {
    kind: "sum",
    ...common(decl),
    discriminant: options.discriminant,
    family: firstTuple ? "tuple" : "object",
    cases,
  };
}

function classifyVariant(member: ts.TypeNode, options: ExtractOptions): Variant {
  const node = unwrap(member);
  if (isStringLiteralType(node)) {
    return { form: "literal", node, name: node.literal.text };
  }
  if (ts.isTupleTypeNode(node)) return { form: "tuple", node };
  if (ts.isTypeLiteralNode(node)) {
    return { form: "object", node, members: node.members };
  }
  if (ts.isUnionTypeNode(node)) {
    throw new DerivationError(
      "UnsupportedMemberShape",
      node,
      "A nested union names several cases at once; list each case separately",
    );
  }
  if (ts.isTypeReferenceNode(node) && options.checker) {
    const members = resolveObjectMembers(node, options.checker);
    if (members) return { form: "object", node, members };
  }
  throw new DerivationError(
    "UnsupportedMemberShape",
    node,
    `Case '${node.getText()}' must be an object type, a tuple or a string literal`,
  );
}

function extractCase(variant: Variant, discriminant: string): CaseModel {
  switch (variant.form) {
    case "literal":
      return { name: variant.name, form: "literal", parameters: [] };
    case "tuple":
      return extractTupleCase(variant.node);
    case "object": {
      const name = caseName(variant.node, variant.members, discriminant);
      const parameters = extractFields(variant.members, discriminant).map((f) => ({
        label: f.name,
        type: f.type,
      }));
      return { name, form: "object", parameters };
    }
  }
}

function caseName(
  node: ts.TypeNode,
  members: readonly ts.TypeElement[],
  discriminant: string,
): string {
  const tag = members.find((m): m is ts.PropertySignature =>
    ts.isPropertySignature(m) && ts.isIdentifier(m.name) &&
    m.name.text === discriminant
  );
  if (!tag) {
    throw new DerivationError(
      "UnsupportedMemberShape",
      node,
      `Case is missing the '${discriminant}' discriminant`,
    );
  }
  const type = tag.type ? unwrap(tag.type) : undefined;
  if (type && ts.isUnionTypeNode(type)) {
    throw new DerivationError(
      "UnsupportedMemberShape",
      tag,
      `Discriminant '${discriminant}' must name exactly one case`,
    );
  }
  if (tag.questionToken || !type || !isStringLiteralType(type)) {
    throw new DerivationError(
      "UnsupportedMemberShape",
      tag,
      `Discriminant '${discriminant}' must be a required string literal type`,
    );
  }
  return type.literal.text;
}

function extractTupleCase(node: ts.TupleTypeNode): CaseModel {
  const [head, ...rest] = node.elements;
  const tag = head && unwrap(ts.isNamedTupleMember(head) ? head.type : head);
  if (!tag || !isStringLiteralType(tag)) {
    throw new DerivationError(
      "UnsupportedMemberShape",
      head ?? node,
      "A tuple case must start with a string literal naming the case",
    );
  }
  return {
    name: tag.literal.text,
    form: "tuple",
    parameters: rest.map(extractTupleElement),
  };
}

function extractTupleElement(element: ts.TypeNode): ParameterModel {
  if (ts.isRestTypeNode(element) || (ts.isNamedTupleMember(element) && element.dotDotDotToken)) {
    throw new DerivationError(
      "UnsupportedPattern",
      element,
      "Rest elements bind a variable number of parameters",
    );
  }
  if (ts.isOptionalTypeNode(element) || (ts.isNamedTupleMember(element) && element.questionToken)) {
    throw new DerivationError(
      "UnsupportedMemberShape",
      element,
      "Optional tuple elements cannot be derived",
    );
  }
  if (ts.isNamedTupleMember(element)) {
    return { label: element.name.text, type: element.type };
  }
  return { type: element };
}

// ============================================================================
// Helpers
// ============================================================================

function unwrap(node: ts.TypeNode): ts.TypeNode {
  return ts.isParenthesizedTypeNode(node) ? unwrap(node.type) : node;
}

function isStringLiteralType(
  node: ts.TypeNode,
): node is ts.LiteralTypeNode & { readonly literal: ts.StringLiteral } {
  return ts.isLiteralTypeNode(node) && ts.isStringLiteral(node.literal);
}

/**
 * Members of a case named through a reference: an alias of a type literal or
 * an interface without heritage clauses. Generic references are not resolved.
 */
function resolveObjectMembers(
  node: ts.TypeReferenceNode,
  checker: ts.TypeChecker,
): readonly ts.TypeElement[] | null {
  if (node.typeArguments?.length || !ts.isIdentifier(node.typeName)) return null;
  const sym = checker.getSymbolAtLocation(node.typeName);
  const decl = sym?.declarations?.[0];
  if (!decl) return null;
  if (ts.isTypeAliasDeclaration(decl)) {
    const body = unwrap(decl.type);
    return ts.isTypeLiteralNode(body) ? body.members : null;
  }
  if (ts.isInterfaceDeclaration(decl) && !decl.heritageClauses?.length) {
    return decl.members;
  }
  return null;
}

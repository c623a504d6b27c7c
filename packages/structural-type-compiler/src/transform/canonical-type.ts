// packages/structural-type-compiler/src/transform/canonical-type.ts
import ts from "typescript";
import type {
  CaseModel,
  DeclarationModel,
  ParameterModel,
} from "./member-extractor.ts";
import type { RuntimeScope } from "./runtime-scope.ts";

/**
 * Canonical type of a declaration, folded right to left.
 *
 * Products: `Struct<List<Property<T1>, List<Property<T2>, Empty>>>`.
 * Sums: `Enum<Choice<Payload1, Choice<Payload2, Nothing>>>`, where a payload
 * is a list of `Property<T>` for labeled parameters and bare `T` otherwise.
 */
export function canonicalType(
  model: DeclarationModel,
  scope: RuntimeScope,
): ts.TypeNode {
  if (model.kind === "product") {
    const properties = payloadType(
      model.fields.map((f) => ({ label: f.name, type: f.type })),
      scope,
    );
    return scope.type("Struct", [properties]);
  }
  return scope.type("Enum", [casesType(model.cases, scope)]);
}

export function payloadType(
  parameters: readonly ParameterModel[],
  scope: RuntimeScope,
): ts.TypeNode {
  return parameters.reduceRight<ts.TypeNode>(
    (tail, p) =>
      scope.type("List", [
        p.label !== undefined ? scope.type("Property", [p.type]) : p.type,
        tail,
      ]),
    scope.type("Empty", []),
  );
}

function casesType(cases: readonly CaseModel[], scope: RuntimeScope): ts.TypeNode {
  return cases.reduceRight<ts.TypeNode>(
    (rest, c) => scope.type("Choice", [payloadType(c.parameters, scope), rest]),
    scope.type("Nothing", []),
  );
}

/** `Name<A, B>` for the declaration itself. */
export function selfType(model: DeclarationModel): ts.TypeReferenceNode {
  return typeReference(model.name, model);
}

/** `NameStructure<A, B>` for the canonical alias. */
export function structureType(model: DeclarationModel): ts.TypeReferenceNode {
  return typeReference(structureName(model), model);
}

export function structureName(model: DeclarationModel): string {
  return `${model.name}Structure`;
}

/**
 * `export type NameStructure<A, B> = ...;`
 */
export function structureAlias(
  model: DeclarationModel,
  scope: RuntimeScope,
  exported: boolean,
): ts.TypeAliasDeclaration {
  const f = ts.factory;
  return f.createTypeAliasDeclaration(
    exported ? [f.createModifier(ts.SyntaxKind.ExportKeyword)] : undefined,
    structureName(model),
    model.typeParameters.length ? model.typeParameters : undefined,
    canonicalType(model, scope),
  );
}

function typeReference(name: string, model: DeclarationModel): ts.TypeReferenceNode {
  const f = ts.factory;
  const args = model.typeParameters.map((p) =>
    f.createTypeReferenceNode(p.name.text, undefined)
  );
  return f.createTypeReferenceNode(name, args.length ? args : undefined);
}

// packages/structural-type-compiler/src/transform/metadata.ts
import ts from "typescript";
import type { DeclarationModel, ParameterModel } from "./member-extractor.ts";
import type { RuntimeScope } from "./runtime-scope.ts";

/**
 * Returns the descriptor name for a field type that is itself derived, in
 * this file or another, so metadata can link to it.
 */
export type NestedLinks = (type: ts.TypeNode) => string | undefined;

export const noLinks: NestedLinks = () => undefined;

/**
 * Links plain references (`author: Person`) to the descriptors of the given
 * non-generic declarations.
 */
export function linksTo(names: ReadonlySet<string>): NestedLinks {
  return (type) => {
    if (!ts.isTypeReferenceNode(type) || type.typeArguments?.length) {
      return undefined;
    }
    if (!ts.isIdentifier(type.typeName)) return undefined;
    const name = type.typeName.text;
    return names.has(name) ? `${name}$` : undefined;
  };
}

/**
 * Metadata value mirroring the canonical type:
 * `struct("Book", list(propertyName("title"), empty))` or
 * `enumeration("Sample", caseOf("a", list(propertyName("x"), empty), nothing))`.
 */
export function metadataExpression(
  model: DeclarationModel,
  scope: RuntimeScope,
  links: NestedLinks = noLinks,
): ts.Expression {
  const f = ts.factory;
  const name = f.createStringLiteral(model.name);
  if (model.kind === "product") {
    const parameters = model.fields.map((field) => ({
      label: field.name,
      type: field.type,
    }));
    return scope.call("struct", [name, payloadMetadata(parameters, scope, links)]);
  }
  const cases = model.cases.reduceRight<ts.Expression>(
    (next, c) =>
      scope.call("caseOf", [
        f.createStringLiteral(c.name),
        payloadMetadata(c.parameters, scope, links),
        next,
      ]),
    scope.value("nothing"),
  );
  return scope.call("enumeration", [name, cases]);
}

export function payloadMetadata(
  parameters: readonly ParameterModel[],
  scope: RuntimeScope,
  links: NestedLinks = noLinks,
): ts.Expression {
  return parameters.reduceRight<ts.Expression>(
    (tail, p) => scope.call("list", [headMetadata(p, scope, links), tail]),
    scope.value("empty"),
  );
}

function headMetadata(
  parameter: ParameterModel,
  scope: RuntimeScope,
  links: NestedLinks,
): ts.Expression {
  const f = ts.factory;
  const linked = links(parameter.type);
  const thunk = linked === undefined ? [] : [
    f.createArrowFunction(
      undefined,
      undefined,
      [],
      undefined,
      f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
      f.createIdentifier(linked),
    ),
  ];
  return parameter.label !== undefined
    ? scope.call("propertyName", [f.createStringLiteral(parameter.label), ...thunk])
    : scope.call("leaf", thunk);
}

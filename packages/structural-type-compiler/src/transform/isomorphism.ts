// packages/structural-type-compiler/src/transform/isomorphism.ts
// Emits the `to` / `from` conversions between a declaration and its
// canonical form. Generated code has no error paths of its own: the only
// throw is `absurd`, which the type system proves unreachable.
import ts from "typescript";
import type {
  CaseModel,
  DeclarationModel,
  FieldModel,
  ProductModel,
  SumModel,
} from "./member-extractor.ts";
import type { RuntimeScope } from "./runtime-scope.ts";

const f = ts.factory;

export const VALUE = "value";
export const CANONICAL = "canonical";

export type Isomorphism = {
  readonly to: ts.ArrowFunction;
  readonly from: ts.ArrowFunction;
};

export function isomorphism(
  model: DeclarationModel,
  scope: RuntimeScope,
): Isomorphism {
  return model.kind === "product"
    ? productIsomorphism(model)
    : sumIsomorphism(model, scope);
}

// ============================================================================
// Products
// ============================================================================

function productIsomorphism(model: ProductModel): Isomorphism {
  if (model.fields.length === 0) {
    return {
      to: arrow(undefined, f.createArrayLiteralExpression([], false)),
      from: arrow(
        undefined,
        f.createParenthesizedExpression(f.createObjectLiteralExpression([], false)),
      ),
    };
  }
  return {
    to: arrow(VALUE, productTuple(model.fields, f.createIdentifier(VALUE))),
    from: arrow(
      CANONICAL,
      f.createParenthesizedExpression(
        productRebuild(model.fields, f.createIdentifier(CANONICAL)),
      ),
    ),
  };
}

/**
 * `[value.f1, [value.f2, []]]`
 */
export function productTuple(
  fields: readonly FieldModel[],
  value: ts.Expression,
): ts.Expression {
  return fields.reduceRight<ts.Expression>(
    (tail, field) =>
      f.createArrayLiteralExpression(
        [f.createPropertyAccessExpression(value, field.name), tail],
        false,
      ),
    f.createArrayLiteralExpression([], false),
  );
}

/**
 * `{ f1: canonical[0], f2: canonical[1][0] }`: field i is read at depth i.
 */
export function productRebuild(
  fields: readonly FieldModel[],
  canonical: ts.Expression,
): ts.ObjectLiteralExpression {
  return f.createObjectLiteralExpression(
    fields.map((field, depth) =>
      f.createPropertyAssignment(field.name, tupleAccess(canonical, depth))
    ),
    false,
  );
}

function tupleAccess(canonical: ts.Expression, depth: number): ts.Expression {
  let access = canonical;
  for (let i = 0; i < depth; i++) {
    access = f.createElementAccessExpression(access, 1);
  }
  return f.createElementAccessExpression(access, 0);
}

// ============================================================================
// Sums
// ============================================================================

function sumIsomorphism(model: SumModel, scope: RuntimeScope): Isomorphism {
  if (model.cases.length === 0) {
    return {
      to: arrow(VALUE, scope.call("absurd", [f.createIdentifier(VALUE)])),
      from: arrow(
        CANONICAL,
        scope.call("absurd", [
          f.createPropertyAccessExpression(f.createIdentifier(CANONICAL), "cases"),
        ]),
      ),
    };
  }
  return {
    to: arrow(VALUE, f.createBlock(sumToStatements(model, scope), true)),
    from: arrow(CANONICAL, f.createBlock(sumFromStatements(model, scope), true)),
  };
}

/**
 * Narrow `value` to each case and inject it:
 * literal cases by `switch (value)`, object cases by
 * `switch (value.<discriminant>)`, tuple cases by `switch (value[0])`.
 */
export function sumToStatements(model: SumModel, scope: RuntimeScope): ts.Statement[] {
  const value = f.createIdentifier(VALUE);
  const indexed = model.cases.map((c, index) => ({ c, index }));
  const literals = indexed.filter(({ c }) => c.form === "literal");
  const others = indexed.filter(({ c }) => c.form !== "literal");

  const clauses = (entries: typeof indexed) =>
    f.createCaseBlock(entries.map(({ c, index }) =>
      f.createCaseClause(f.createStringLiteral(c.name), [
        f.createReturnStatement(buildCaseInjection(model, index, value, scope)),
      ])
    ));

  const literalSwitch = f.createSwitchStatement(value, clauses(literals));
  if (others.length === 0) return [literalSwitch];

  const tag = model.family === "tuple"
    ? f.createElementAccessExpression(value, 0)
    : f.createPropertyAccessExpression(value, model.discriminant);
  const statements: ts.Statement[] = [];
  if (literals.length > 0) {
    statements.push(
      f.createIfStatement(
        f.createStrictEquality(
          f.createTypeOfExpression(value),
          f.createStringLiteral("string"),
        ),
        f.createBlock([literalSwitch], true),
      ),
    );
  }
  statements.push(f.createSwitchStatement(tag, clauses(others)));
  return statements;
}

/**
 * `enumeration("Name", second(second(first(payload))))` for the case at
 * `index`, reading the payload from `value`.
 */
export function buildCaseInjection(
  model: SumModel,
  index: number,
  value: ts.Expression,
  scope: RuntimeScope,
): ts.Expression {
  const c = model.cases[index];
  let injected = scope.call("first", [casePayload(c, value, scope)]);
  for (let i = 0; i < index; i++) {
    injected = scope.call("second", [injected]);
  }
  return scope.call("enumeration", [f.createStringLiteral(model.name), injected]);
}

function casePayload(
  c: CaseModel,
  value: ts.Expression,
  scope: RuntimeScope,
): ts.Expression {
  return c.parameters.reduceRight<ts.Expression>(
    (tail, p, i) => {
      const read = c.form === "tuple"
        ? f.createElementAccessExpression(value, i + 1)
        : f.createPropertyAccessExpression(value, p.label ?? String(i));
      const head = p.label !== undefined
        ? scope.call("property", [f.createStringLiteral(p.label), read])
        : read;
      return scope.call("list", [head, tail]);
    },
    scope.value("empty"),
  );
}

/**
 * Mirror walk over the choice chain:
 *
 * ```ts
 * const c0 = canonical.cases;
 * switch (c0.kind) {
 *   case "first": return <case 0>;
 *   case "second": { const c1 = c0.second; switch (c1.kind) { ... } }
 * }
 * ```
 */
export function sumFromStatements(model: SumModel, scope: RuntimeScope): ts.Statement[] {
  const cases = f.createPropertyAccessExpression(f.createIdentifier(CANONICAL), "cases");
  return chooseFrom(model, 0, cases, scope);
}

function chooseFrom(
  model: SumModel,
  index: number,
  source: ts.Expression,
  scope: RuntimeScope,
): ts.Statement[] {
  const layer = f.createIdentifier(`c${index}`);
  const bind = f.createVariableStatement(
    undefined,
    f.createVariableDeclarationList(
      [f.createVariableDeclaration(layer, undefined, undefined, source)],
      ts.NodeFlags.Const,
    ),
  );
  const rest = f.createPropertyAccessExpression(layer, "second");
  const onSecond = index + 1 < model.cases.length
    ? [f.createBlock(chooseFrom(model, index + 1, rest, scope), true)]
    : [f.createReturnStatement(scope.call("absurd", [rest]))];

  return [
    bind,
    f.createSwitchStatement(
      f.createPropertyAccessExpression(layer, "kind"),
      f.createCaseBlock([
        f.createCaseClause(f.createStringLiteral("first"), [
          f.createReturnStatement(
            buildCaseRebuild(model, index, f.createPropertyAccessExpression(layer, "first")),
          ),
        ]),
        f.createCaseClause(f.createStringLiteral("second"), onSecond),
      ]),
    ),
  ];
}

/**
 * Rebuild case `index` from its payload list: `.tail` j times then `.head`,
 * plus `.value` for labeled parameters.
 */
export function buildCaseRebuild(
  model: SumModel,
  index: number,
  payload: ts.Expression,
): ts.Expression {
  const c = model.cases[index];
  const reads = c.parameters.map((p, depth) => {
    let access = payload;
    for (let i = 0; i < depth; i++) {
      access = f.createPropertyAccessExpression(access, "tail");
    }
    access = f.createPropertyAccessExpression(access, "head");
    return p.label !== undefined
      ? f.createPropertyAccessExpression(access, "value")
      : access;
  });

  switch (c.form) {
    case "literal":
      return f.createStringLiteral(c.name);
    case "tuple":
      return f.createArrayLiteralExpression(
        [f.createStringLiteral(c.name), ...reads],
        false,
      );
    case "object":
      return f.createObjectLiteralExpression(
        [
          f.createPropertyAssignment(model.discriminant, f.createStringLiteral(c.name)),
          ...c.parameters.map((p, i) =>
            f.createPropertyAssignment(p.label ?? String(i), reads[i])
          ),
        ],
        false,
      );
  }
}

function arrow(param: string | undefined, body: ts.ConciseBody): ts.ArrowFunction {
  return f.createArrowFunction(
    undefined,
    undefined,
    param === undefined
      ? []
      : [f.createParameterDeclaration(undefined, undefined, param)],
    undefined,
    f.createToken(ts.SyntaxKind.EqualsGreaterThanToken),
    body,
  );
}

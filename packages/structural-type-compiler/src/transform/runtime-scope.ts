// packages/structural-type-compiler/src/transform/runtime-scope.ts
import ts from "typescript";

export type RuntimeValue =
  | "absurd"
  | "caseOf"
  | "empty"
  | "enumeration"
  | "first"
  | "leaf"
  | "list"
  | "nothing"
  | "property"
  | "propertyName"
  | "second"
  | "struct";

export type RuntimeType =
  | "Choice"
  | "Empty"
  | "Enum"
  | "List"
  | "Nothing"
  | "Property"
  | "Struct"
  | "Structural";

/**
 * Hands out references to the canonical vocabulary and records which names
 * generated code used, so the emitter can import exactly those.
 *
 * With a `namespace` every reference is qualified (`ns.list(...)`), which is
 * how code injected into an existing module avoids clashing with its names.
 */
export class RuntimeScope {
  readonly values = new Set<RuntimeValue>();
  readonly types = new Set<RuntimeType>();

  constructor(readonly namespace?: string) {}

  value(name: RuntimeValue): ts.Expression {
    this.values.add(name);
    const f = ts.factory;
    return this.namespace
      ? f.createPropertyAccessExpression(f.createIdentifier(this.namespace), name)
      : f.createIdentifier(name);
  }

  call(name: RuntimeValue, args: readonly ts.Expression[]): ts.Expression {
    return ts.factory.createCallExpression(this.value(name), undefined, args);
  }

  type(name: RuntimeType, args: readonly ts.TypeNode[]): ts.TypeReferenceNode {
    this.types.add(name);
    const f = ts.factory;
    const typeName = this.namespace
      ? f.createQualifiedName(f.createIdentifier(this.namespace), name)
      : f.createIdentifier(name);
    return f.createTypeReferenceNode(typeName, args.length ? args : undefined);
  }
}

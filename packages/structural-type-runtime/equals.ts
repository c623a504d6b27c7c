// packages/structural-type-runtime/equals.ts
// Structural equality over canonical trees

import type { StructuralOf } from "../structural-type-spec/src/mod.ts";
import { type Algebra, fold } from "./fold.ts";

/**
 * Uniform tree produced from any derived value. Nested descriptors are
 * expanded in place so equality recurses through them.
 */
export type Tree =
  | { readonly kind: "node"; readonly label: string; readonly children: readonly Tree[] }
  | { readonly kind: "leaf"; readonly value: unknown };

export function toTree<T>(structural: StructuralOf<T>, value: T): readonly Tree[] {
  return fold(structural, value, treeAlgebra<T>());
}

function treeAlgebra<Out>(): Algebra<readonly Tree[], Out> {
  const node = (label: string, children: readonly Tree[]): readonly Tree[] => [
    { kind: "node", label, children },
  ];
  return {
    struct: (name, properties) => node(`struct ${name}`, properties),
    enumeration: (name, selected) => node(`enum ${name}`, selected),
    choice: (caseName, payload) => node(`case ${caseName}`, payload),
    list: (head, tail) => [...head, ...tail],
    empty: () => [],
    property: (name, value) => node(`property ${name}`, value),
    leaf: (focus, metadata) =>
      metadata.nested
        ? toTree(metadata.nested(), focus.value)
        : [{ kind: "leaf", value: focus.value }],
  };
}

/**
 * Compare two values of a derived type field by field (or case and payload).
 */
export function equals<T>(structural: StructuralOf<T>, a: T, b: T): boolean {
  return treesEqual(toTree(structural, a), toTree(structural, b));
}

export function treesEqual(a: readonly Tree[], b: readonly Tree[]): boolean {
  if (a.length !== b.length) return false;
  return a.every((left, index) => {
    const right = b[index];
    if (left.kind === "leaf") {
      return right.kind === "leaf" && leafEquals(left.value, right.value);
    }
    return right.kind === "node" && left.label === right.label &&
      treesEqual(left.children, right.children);
  });
}

export function leafEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length &&
      a.every((item, index) => leafEquals(item, b[index]));
  }
  if (
    typeof a === "object" && a !== null && typeof b === "object" && b !== null &&
    !Array.isArray(a) && !Array.isArray(b)
  ) {
    const keys = Object.keys(a);
    const other = new Map(Object.entries(b));
    return keys.length === other.size &&
      Object.entries(a).every(([key, inner]) =>
        other.has(key) && leafEquals(inner, other.get(key))
      );
  }
  return false;
}

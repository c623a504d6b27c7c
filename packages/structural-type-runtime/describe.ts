// packages/structural-type-runtime/describe.ts
// Human-readable rendering of any derived value

import type { HeadMetadata, StructuralOf } from "../structural-type-spec/src/mod.ts";
import { type Algebra, fold, type Focus } from "./fold.ts";

/**
 * Render a value of a derived type from its canonical form.
 *
 * @example
 * ```ts
 * describe(Book$, { title: "Dune", pages: 412 });
 * // Book(title: "Dune", pages: 412)
 * describe(Shape$, ["circle", 2]);
 * // Shape.circle(2)
 * ```
 */
export function describe<T>(structural: StructuralOf<T>, value: T): string {
  return fold(structural, value, describeAlgebra<T>()).join("");
}

function describeAlgebra<Out>(): Algebra<readonly string[], Out> {
  return {
    struct: (name, properties) => [`${name}(${properties.join(", ")})`],
    enumeration: (name, selected) => [`${name}.${selected.join("")}`],
    choice: (caseName, payload) => [
      payload.length === 0 ? caseName : `${caseName}(${payload.join(", ")})`,
    ],
    list: (head, tail) => [...head, ...tail],
    empty: () => [],
    property: (name, value) => [`${name}: ${value.join("")}`],
    leaf: (focus: Focus<Out>, metadata: HeadMetadata) => [
      metadata.nested
        ? describe(metadata.nested(), focus.value)
        : formatLeaf(focus.value),
    ],
  };
}

export function formatLeaf(value: unknown): string {
  if (typeof value === "string") return JSON.stringify(value);
  if (typeof value === "bigint") return `${value}n`;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `[${value.map(formatLeaf).join(", ")}]`;
  if (typeof value === "object" && value !== null) {
    const entries = Object.entries(value).map(([key, inner]) =>
      `${key}: ${formatLeaf(inner)}`
    );
    return `{ ${entries.join(", ")} }`;
  }
  return String(value);
}

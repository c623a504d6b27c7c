// packages/structural-type-runtime/fold.ts
// Lockstep walk over a descriptor's metadata and a canonical value.

import {
  type AnyMetadata,
  type HeadMetadata,
  enumeration,
  first,
  isChoice,
  isEnum,
  isList,
  isPair,
  isProperty,
  isUnit,
  list,
  property,
  second,
  type StructuralOf,
} from "../structural-type-spec/src/mod.ts";

/**
 * A leaf reached during a fold.
 *
 * `position` is the index of the leaf inside its enclosing list; `replace`
 * returns the outermost value rebuilt with this leaf swapped for `next`.
 */
export type Focus<Out> = {
  readonly value: unknown;
  readonly position: number;
  replace(next: unknown): Out;
};

/**
 * One handler per canonical container. A capability written as an algebra
 * applies to every derived type without per-type code.
 */
export interface Algebra<R, Out> {
  struct(name: string, properties: R): R;
  enumeration(name: string, selected: R): R;
  choice(caseName: string, payload: R): R;
  list(head: R, tail: R): R;
  empty(): R;
  property(name: string, value: R): R;
  leaf(focus: Focus<Out>, metadata: HeadMetadata): R;
}

export class StructureMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructureMismatchError";
  }
}

function mismatch(expected: string, metadata: AnyMetadata): StructureMismatchError {
  return new StructureMismatchError(
    `Canonical value does not match '${metadata.kind}' metadata: expected ${expected}`,
  );
}

/**
 * Fold a value of a derived type through an algebra.
 *
 * @example
 * ```ts
 * const count = fold(Book$, book, {
 *   struct: (_, p) => p, enumeration: (_, s) => s, choice: (_, p) => p,
 *   list: (h, t) => h + t, empty: () => 0, property: (_, v) => v, leaf: () => 1,
 * });
 * ```
 */
export function fold<T, R>(
  structural: StructuralOf<T>,
  value: T,
  algebra: Algebra<R, T>,
): R {
  return foldInto(structural, value, algebra, (next: T) => next);
}

/**
 * Like `fold`, but every `replace` result is passed through `rebuild`.
 * Used to descend into nested descriptors while still rebuilding the
 * outermost value.
 */
export function foldInto<T, R, Out>(
  structural: StructuralOf<T>,
  value: T,
  algebra: Algebra<R, Out>,
  rebuild: (value: T) => Out,
): R {
  const metadata = structural.metadata;
  const canonical = structural.to(value);
  const restore = (next: unknown): Out => rebuild(structural.from(next));

  switch (metadata.kind) {
    case "struct":
      return algebra.struct(
        metadata.name,
        walkProduct(metadata.properties, canonical, 0, algebra, restore),
      );
    case "enum": {
      if (!isEnum(canonical)) throw mismatch("an enum value", metadata);
      return algebra.enumeration(
        metadata.name,
        walkCases(
          metadata.cases,
          canonical.cases,
          algebra,
          (cases) => restore(enumeration(canonical.name, cases)),
        ),
      );
    }
    default:
      throw new StructureMismatchError(
        `Descriptor metadata must be a struct or an enum, found '${metadata.kind}'`,
      );
  }
}

/**
 * Apply `fn` to the canonical form of `value` and convert back.
 */
export function overStructure<T>(
  structural: StructuralOf<T>,
  value: T,
  fn: (canonical: unknown) => unknown,
): T {
  return structural.from(fn(structural.to(value)));
}

// Product values are bare tuples: [field, [field, []]].
function walkProduct<R, Out>(
  metadata: AnyMetadata,
  value: unknown,
  position: number,
  algebra: Algebra<R, Out>,
  rebuild: (value: unknown) => Out,
): R {
  if (metadata.kind === "empty") {
    if (!isUnit(value)) throw mismatch("[]", metadata);
    return algebra.empty();
  }
  if (metadata.kind !== "list") throw mismatch("a list", metadata);
  if (!isPair(value)) throw mismatch("a [head, tail] pair", metadata);

  const [head, tail] = value;
  const focus: Focus<Out> = {
    value: head,
    position,
    replace: (next) => rebuild([next, tail]),
  };
  return algebra.list(
    wrapHead(metadata.head, algebra.leaf(focus, headMetadata(metadata.head)), algebra),
    walkProduct(
      metadata.tail,
      tail,
      position + 1,
      algebra,
      (next) => rebuild([head, next]),
    ),
  );
}

// Sum payloads are List/Property instances.
function walkPayload<R, Out>(
  metadata: AnyMetadata,
  value: unknown,
  position: number,
  algebra: Algebra<R, Out>,
  rebuild: (value: unknown) => Out,
): R {
  if (metadata.kind === "empty") return algebra.empty();
  if (metadata.kind !== "list") throw mismatch("a list", metadata);
  if (!isList(value)) throw mismatch("a list value", metadata);
  const node = value;
  const layer = metadata;

  const rest = (): R =>
    walkPayload(
      layer.tail,
      node.tail,
      position + 1,
      algebra,
      (next) => rebuild(list(node.head, next)),
    );
  const head = metadata.head;

  if (head.kind === "property") {
    const named = node.head;
    if (!isProperty(named)) throw mismatch("a property value", metadata);
    const focus: Focus<Out> = {
      value: named.value,
      position,
      replace: (next) => rebuild(list(property(named.name, next), node.tail)),
    };
    const visited = algebra.property(head.name, algebra.leaf(focus, head));
    return algebra.list(visited, rest());
  }
  if (head.kind !== "leaf") throw mismatch("a property or leaf", metadata);

  const focus: Focus<Out> = {
    value: node.head,
    position,
    replace: (next) => rebuild(list(next, node.tail)),
  };
  const visited = algebra.leaf(focus, head);
  return algebra.list(visited, rest());
}

function walkCases<R, Out>(
  metadata: AnyMetadata,
  value: unknown,
  algebra: Algebra<R, Out>,
  rebuild: (value: unknown) => Out,
): R {
  if (metadata.kind !== "case") throw mismatch("a case", metadata);
  if (!isChoice(value)) throw mismatch("a choice value", metadata);

  if (value.kind === "first") {
    return algebra.choice(
      metadata.name,
      walkPayload(
        metadata.parameters,
        value.first,
        0,
        algebra,
        (next) => rebuild(first(next)),
      ),
    );
  }
  return walkCases(
    metadata.next,
    value.second,
    algebra,
    (next) => rebuild(second(next)),
  );
}

function headMetadata(metadata: AnyMetadata): HeadMetadata {
  if (metadata.kind === "property" || metadata.kind === "leaf") return metadata;
  throw mismatch("a property or leaf", metadata);
}

function wrapHead<R, Out>(
  metadata: AnyMetadata,
  leafResult: R,
  algebra: Algebra<R, Out>,
): R {
  return metadata.kind === "property"
    ? algebra.property(metadata.name, leafResult)
    : leafResult;
}

// packages/structural-type-spec/src/mod.ts
// Canonical container vocabulary shared by the derivation compiler, the
// generated descriptors and the generic traversal runtime.

// ============================================================================
// Containers
// ============================================================================

/** End of a product chain. */
export interface Empty {
  readonly kind: "empty";
}

/** One element of a product plus the rest of the chain. */
export interface List<Head, Tail> {
  readonly kind: "list";
  readonly head: Head;
  readonly tail: Tail;
}

/** A labeled leaf value. */
export interface Property<Value> {
  readonly kind: "property";
  readonly name: string;
  readonly value: Value;
}

/**
 * One sum alternative (`first`) versus the remaining alternatives (`second`).
 * The two branches use distinct field names so that type-level inference
 * never mixes their parameters.
 */
export type Choice<First, Second> =
  | { readonly kind: "first"; readonly first: First }
  | { readonly kind: "second"; readonly second: Second };

/** Exhausted alternatives. Only ever appears as the seed of a choice chain. */
export type Nothing = never;

/** Canonical form of a product type. */
export interface Struct<Properties> {
  readonly kind: "struct";
  readonly name: string;
  readonly properties: Properties;
}

/** Canonical form of a sum type. */
export interface Enum<Cases> {
  readonly kind: "enum";
  readonly name: string;
  readonly cases: Cases;
}

// ============================================================================
// Metadata
// ============================================================================

/** Descriptor of a derived type, erased to what generic algorithms need. */
export interface StructuralOf<T> {
  readonly metadata: AnyMetadata;
  to(value: T): unknown;
  from(canonical: unknown): T;
}

export type AnyStructural = StructuralOf<unknown>;

export type PropertyMetadata = {
  readonly kind: "property";
  readonly name: string;
  readonly nested?: () => AnyStructural;
};

export type LeafMetadata = {
  readonly kind: "leaf";
  readonly nested?: () => AnyStructural;
};

export type HeadMetadata = PropertyMetadata | LeafMetadata;

export interface CaseMetadata<Parameters, Next> {
  readonly kind: "case";
  readonly name: string;
  readonly parameters: Parameters;
  readonly next: Next;
}

export type NothingMetadata = { readonly kind: "nothing" };

export type AnyMetadata =
  | Struct<AnyMetadata>
  | Enum<AnyMetadata>
  | List<AnyMetadata, AnyMetadata>
  | CaseMetadata<AnyMetadata, AnyMetadata>
  | HeadMetadata
  | NothingMetadata
  | Empty;

// ============================================================================
// Type-level projections
// ============================================================================

/**
 * Value shape of a product structure: right-nested tuples of bare field
 * values, `readonly []` at the end.
 *
 * @example
 * ```ts
 * type V = Value<Struct<List<Property<string>, List<Property<number>, Empty>>>>;
 * // readonly [string, readonly [number, readonly []]]
 * ```
 */
export type Value<S> = [S] extends [Struct<infer P>] ? Value<P>
  : [S] extends [List<infer H, infer T>] ? readonly [Value<H>, Value<T>]
  : [S] extends [Property<infer V>] ? V
  : [S] extends [Empty] ? readonly []
  : S;

/** What `to` produces and `from` consumes. */
export type Canonical<S> = [S] extends [Struct<infer P>] ? Value<P> : S;

/** Metadata shape mirroring a structure, one node per container. */
export type Metadata<S> = [S] extends [never] ? NothingMetadata
  : [S] extends [Struct<infer P>] ? Struct<Metadata<P>>
  : [S] extends [Enum<infer C>] ? Enum<Metadata<C>>
  : [S] extends [List<infer _H, infer T>] ? List<HeadMetadata, Metadata<T>>
  : [S] extends [Empty] ? Empty
  : [S] extends [Choice<infer F, infer R>]
    ? CaseMetadata<Metadata<F>, Metadata<R>>
  : LeafMetadata;

/**
 * Generated companion of a derived type `T` with canonical structure `S`.
 *
 * Invariant: `from(to(v))` equals `v`, and `to(from(c))` equals `c` for every
 * `c` returned by `to`.
 */
export interface Structural<T, S> {
  readonly metadata: Metadata<S>;
  to(value: T): Canonical<S>;
  from(canonical: Canonical<S>): T;
}

// ============================================================================
// Constructors
// ============================================================================

export const empty: Empty = { kind: "empty" };

export const nothing: NothingMetadata = { kind: "nothing" };

export function list<H, T>(head: H, tail: T): List<H, T> {
  return { kind: "list", head, tail };
}

export function property<V>(name: string, value: V): Property<V> {
  return { kind: "property", name, value };
}

export function first<F>(first: F): Choice<F, never> {
  return { kind: "first", first };
}

export function second<S>(second: S): Choice<never, S> {
  return { kind: "second", second };
}

export function struct<P>(name: string, properties: P): Struct<P> {
  return { kind: "struct", name, properties };
}

export function enumeration<C>(name: string, cases: C): Enum<C> {
  return { kind: "enum", name, cases };
}

export function propertyName(
  name: string,
  nested?: () => AnyStructural,
): PropertyMetadata {
  return nested ? { kind: "property", name, nested } : { kind: "property", name };
}

export function leaf(nested?: () => AnyStructural): LeafMetadata {
  return nested ? { kind: "leaf", nested } : { kind: "leaf" };
}

export function caseOf<P, N>(
  name: string,
  parameters: P,
  next: N,
): CaseMetadata<P, N> {
  return { kind: "case", name, parameters, next };
}

/** Closes an exhaustive match over `Nothing`. */
export function absurd(value: never): never {
  throw new Error(`Unreachable canonical value: ${show(value)}`);
}

function show(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    // bigint and cyclic values
    return String(value);
  }
}

// ============================================================================
// Guards
// ============================================================================

function hasKind(value: unknown): value is { readonly kind: unknown } {
  return typeof value === "object" && value !== null && "kind" in value;
}

export function isEmpty(value: unknown): value is Empty {
  return hasKind(value) && value.kind === "empty";
}

export function isList(value: unknown): value is List<unknown, unknown> {
  return hasKind(value) && value.kind === "list" && "head" in value &&
    "tail" in value;
}

export function isProperty(value: unknown): value is Property<unknown> {
  return hasKind(value) && value.kind === "property" && "name" in value &&
    typeof value.name === "string" && "value" in value;
}

export function isChoice(value: unknown): value is Choice<unknown, unknown> {
  if (!hasKind(value)) return false;
  return (value.kind === "first" && "first" in value) ||
    (value.kind === "second" && "second" in value);
}

export function isEnum(value: unknown): value is Enum<unknown> {
  return hasKind(value) && value.kind === "enum" && "name" in value &&
    typeof value.name === "string" && "cases" in value;
}

/** Product value layer: `[head, tail]`. */
export function isPair(value: unknown): value is readonly [unknown, unknown] {
  return Array.isArray(value) && value.length === 2;
}

/** Product value terminator: `[]`. */
export function isUnit(value: unknown): value is readonly [] {
  return Array.isArray(value) && value.length === 0;
}

// packages/structural-type-runtime/edit.ts
// UI-agnostic field model for editing any derived value

import type { HeadMetadata, StructuralOf } from "../structural-type-spec/src/mod.ts";
import { type Algebra, fold, type Focus, foldInto } from "./fold.ts";

/**
 * Editor control suggested for a leaf, chosen from its current value.
 */
export type Control = "text" | "number" | "toggle" | "date" | "readonly";

/**
 * One editable leaf of a value.
 *
 * `path` is the dotted route from the root: property names, case names, and
 * positions for unlabeled parameters. `set` returns the whole value rebuilt.
 */
export type EditableField<T> = {
  readonly path: readonly string[];
  readonly label: string;
  readonly control: Control;
  readonly value: unknown;
  set(next: unknown): T;
};

export class EditError extends Error {
  constructor(message: string, public readonly path: readonly string[]) {
    super(message);
    this.name = "EditError";
  }
}

/**
 * List the editable fields of a value. Fields whose type is itself a derived
 * type are flattened into their own fields.
 *
 * @example
 * ```ts
 * const [title] = fields(Book$, book);
 * title.path;              // ["title"]
 * title.set("Children of Dune");
 * ```
 */
export function fields<T>(
  structural: StructuralOf<T>,
  value: T,
): readonly EditableField<T>[] {
  return fold(structural, value, locateAlgebra<T>()).map(({ path, focus }) =>
    field(path, focus)
  );
}

/**
 * Replace the leaf at `path` and return the rebuilt value.
 */
export function update<T>(
  structural: StructuralOf<T>,
  value: T,
  path: string | readonly string[],
  next: unknown,
): T {
  const segments = typeof path === "string" ? path.split(".") : path;
  const key = segments.join(".");
  const found = fields(structural, value).find((f) => f.path.join(".") === key);
  if (!found) {
    throw new EditError(`No editable field at '${key}'`, segments);
  }
  return found.set(next);
}

export function controlFor(value: unknown): Control {
  if (typeof value === "string") return "text";
  if (typeof value === "number") return "number";
  if (typeof value === "boolean") return "toggle";
  if (value instanceof Date) return "date";
  return "readonly";
}

// A leaf together with the route that reaches it.
type Located<Out> = {
  readonly path: readonly string[];
  readonly focus: Focus<Out>;
};

function locateAlgebra<Out>(): Algebra<readonly Located<Out>[], Out> {
  return {
    struct: (_name, properties) => properties,
    enumeration: (_name, selected) => selected,
    choice: (caseName, payload) => payload.map((l) => prefixed(caseName, l)),
    list: (head, tail) => [...head, ...tail],
    empty: () => [],
    property: (name, value) => value.map((l) => prefixed(name, l)),
    leaf: (focus, metadata) => locateLeaf(focus, metadata),
  };
}

function locateLeaf<Out>(
  focus: Focus<Out>,
  metadata: HeadMetadata,
): readonly Located<Out>[] {
  // Labeled leaves get their name from the enclosing property handler.
  const own = metadata.kind === "leaf" ? [String(focus.position)] : [];
  if (!metadata.nested) return [{ path: own, focus }];

  const nested = foldInto(
    metadata.nested(),
    focus.value,
    locateAlgebra<Out>(),
    focus.replace,
  );
  return nested.map((l) => ({ path: [...own, ...l.path], focus: l.focus }));
}

function prefixed<Out>(segment: string, located: Located<Out>): Located<Out> {
  return { path: [segment, ...located.path], focus: located.focus };
}

function field<Out>(path: readonly string[], focus: Focus<Out>): EditableField<Out> {
  const control = controlFor(focus.value);
  const dotted = path.join(".");
  return {
    path,
    label: capitalizeFirst(path.length > 0 ? path[path.length - 1] : ""),
    control,
    value: focus.value,
    set: (next) => {
      if (control === "readonly") {
        throw new EditError(`Field '${dotted}' is read-only`, path);
      }
      if (!accepts(control, next)) {
        throw new EditError(`Field '${dotted}' expects ${control} input`, path);
      }
      return focus.replace(next);
    },
  };
}

function accepts(control: Control, next: unknown): boolean {
  switch (control) {
    case "text":
      return typeof next === "string";
    case "number":
      return typeof next === "number" && !Number.isNaN(next);
    case "toggle":
      return typeof next === "boolean";
    case "date":
      return next instanceof Date && !Number.isNaN(next.getTime());
    case "readonly":
      return false;
  }
}

function capitalizeFirst(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

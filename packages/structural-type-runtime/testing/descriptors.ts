// packages/structural-type-runtime/testing/descriptors.ts
// Hand-written descriptors in the shape the compiler emits, shared by tests.

import {
  absurd,
  caseOf,
  type Choice,
  type Empty,
  empty,
  type Enum,
  enumeration,
  first,
  leaf,
  type List,
  list,
  nothing,
  type Nothing,
  type Property,
  property,
  propertyName,
  second,
  type Struct,
  struct,
  type Structural,
} from "../../structural-type-spec/src/mod.ts";

// ============================================================================
// Products
// ============================================================================

export interface Book {
  readonly title: string;
  readonly pages: number;
}

export type BookStructure = Struct<
  List<Property<string>, List<Property<number>, Empty>>
>;

export const Book$: Structural<Book, BookStructure> = {
  metadata: struct(
    "Book",
    list(propertyName("title"), list(propertyName("pages"), empty)),
  ),
  to: (value) => [value.title, [value.pages, []]],
  from: (canonical) => ({ title: canonical[0], pages: canonical[1][0] }),
};

export type Library = {
  name: string;
  featured: Book;
};

export type LibraryStructure = Struct<
  List<Property<string>, List<Property<Book>, Empty>>
>;

export const Library$: Structural<Library, LibraryStructure> = {
  metadata: struct(
    "Library",
    list(
      propertyName("name"),
      list(propertyName("featured", () => Book$), empty),
    ),
  ),
  to: (value) => [value.name, [value.featured, []]],
  from: (canonical) => ({ name: canonical[0], featured: canonical[1][0] }),
};

export type Loan = {
  due: Date;
  returned: boolean;
  tags: string[];
};

export type LoanStructure = Struct<
  List<
    Property<Date>,
    List<Property<boolean>, List<Property<string[]>, Empty>>
  >
>;

export const Loan$: Structural<Loan, LoanStructure> = {
  metadata: struct(
    "Loan",
    list(
      propertyName("due"),
      list(propertyName("returned"), list(propertyName("tags"), empty)),
    ),
  ),
  to: (value) => [value.due, [value.returned, [value.tags, []]]],
  from: (canonical) => ({
    due: canonical[0],
    returned: canonical[1][0],
    tags: canonical[1][1][0],
  }),
};

// A product with no fields.
export type Marker = Record<string, never>;

export const Marker$: Structural<Marker, Struct<Empty>> = {
  metadata: struct("Marker", empty),
  to: () => [],
  from: () => ({}),
};

// ============================================================================
// Sums
// ============================================================================

export type Sample =
  | { type: "a"; x: number }
  | { type: "b" };

export type SampleStructure = Enum<
  Choice<List<Property<number>, Empty>, Choice<Empty, Nothing>>
>;

export const Sample$: Structural<Sample, SampleStructure> = {
  metadata: enumeration(
    "Sample",
    caseOf("a", list(propertyName("x"), empty), caseOf("b", empty, nothing)),
  ),
  to: (value) => {
    switch (value.type) {
      case "a":
        return enumeration("Sample", first(list(property("x", value.x), empty)));
      case "b":
        return enumeration("Sample", second(first(empty)));
    }
  },
  from: (canonical) => {
    const c0 = canonical.cases;
    switch (c0.kind) {
      case "first":
        return { type: "a", x: c0.first.head.value };
      case "second": {
        const c1 = c0.second;
        switch (c1.kind) {
          case "first":
            return { type: "b" };
          case "second":
            return absurd(c1.second);
        }
      }
    }
  },
};

export type Shape =
  | ["circle", number]
  | ["rect", w: number, h: number]
  | "point";

export type ShapeStructure = Enum<
  Choice<
    List<number, Empty>,
    Choice<
      List<Property<number>, List<Property<number>, Empty>>,
      Choice<Empty, Nothing>
    >
  >
>;

export const Shape$: Structural<Shape, ShapeStructure> = {
  metadata: enumeration(
    "Shape",
    caseOf(
      "circle",
      list(leaf(), empty),
      caseOf(
        "rect",
        list(propertyName("w"), list(propertyName("h"), empty)),
        caseOf("point", empty, nothing),
      ),
    ),
  ),
  to: (value) => {
    if (typeof value === "string") {
      return enumeration("Shape", second(second(first(empty))));
    }
    if (value[0] === "circle") {
      return enumeration("Shape", first(list(value[1], empty)));
    }
    return enumeration(
      "Shape",
      second(first(list(property("w", value[1]), list(property("h", value[2]), empty)))),
    );
  },
  from: (canonical) => {
    const c0 = canonical.cases;
    if (c0.kind === "first") return ["circle", c0.first.head];
    const c1 = c0.second;
    if (c1.kind === "first") {
      return ["rect", c1.first.head.value, c1.first.tail.head.value];
    }
    const c2 = c1.second;
    if (c2.kind === "first") return "point";
    return absurd(c2.second);
  },
};

export type Never = never;

export const Never$: Structural<Never, Enum<Nothing>> = {
  metadata: enumeration("Never", nothing),
  to: (value) => absurd(value),
  from: (canonical) => absurd(canonical.cases),
};

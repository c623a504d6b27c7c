// packages/structural-type-compiler/src/transform/imports.test.ts
import { expect, test } from "vitest";
import { parse, printNode } from "../testing/helpers.ts";
import { ModuleImports, rebaseSpecifier, relativeSpecifier } from "./imports.ts";

function printed(imports: ModuleImports, typeOnly: boolean): string[] {
  const sf = parse("");
  return imports.declarations(typeOnly).map((d) => printNode(d, sf));
}

test("imports: named bindings group per module in first-use order", () => {
  const imports = new ModuleImports();
  imports.add({ module: "./book.js", form: "named", name: "Book", typeOnly: true });
  imports.add({ module: "./person.ts", form: "named", name: "Author", imported: "Person", typeOnly: true });
  imports.add({ module: "./book.js", form: "named", name: "Edition", typeOnly: true });
  imports.add({ module: "./ids.ts", form: "namespace", name: "ids", typeOnly: true });
  imports.add({ module: "./clock.ts", form: "default", name: "Clock", typeOnly: true });
  imports.add({ module: "./person.structural.js", form: "named", name: "Person$", typeOnly: false });

  expect(printed(imports, true)).toEqual([
    `import type { Book, Edition } from "./book.js";`,
    `import type { Person as Author } from "./person.ts";`,
    `import type * as ids from "./ids.ts";`,
    `import type Clock from "./clock.ts";`,
  ]);
  expect(printed(imports, false)).toEqual([
    `import { Person$ } from "./person.structural.js";`,
  ]);
});

test("imports: a name bound twice must mean the same thing", () => {
  const imports = new ModuleImports();
  const book = { module: "./book.js", form: "named", name: "Book", typeOnly: true } as const;
  expect(imports.add(book)).toBeUndefined();
  expect(imports.add({ ...book })).toBeUndefined();
  expect(imports.add({ ...book, module: "./other.js" })).toEqual(book);
  expect(imports.size).toBe(1);
});

test("specifiers: relative paths between modules", () => {
  expect(relativeSpecifier("/src/book.ts", "/src/book.ts", ".js")).toBe("./book.js");
  expect(relativeSpecifier("/src/book.ts", "/src/people/person.structural.ts", ".js"))
    .toBe("./people/person.structural.js");
  expect(relativeSpecifier("/src/a/book.ts", "/src/b/person.ts", ".ts")).toBe("../b/person.ts");
  expect(relativeSpecifier("/src/book.ts", "/src/person.js")).toBe("./person.js");
});

test("specifiers: rebased from the file that wrote them", () => {
  expect(rebaseSpecifier("./point.ts", "/src/shapes/circle.ts", "/src/scene.ts"))
    .toBe("./shapes/point.ts");
  expect(rebaseSpecifier("../point.ts", "/src/shapes/circle.ts", "/src/scene.ts"))
    .toBe("./point.ts");
  expect(rebaseSpecifier("./point.ts", "/src/circle.ts", "/src/scene.ts")).toBe("./point.ts");
  expect(rebaseSpecifier("decimal.js", "/src/shapes/circle.ts", "/src/scene.ts"))
    .toBe("decimal.js");
});

// packages/structural-type-compiler/src/transform/imports.ts
// Import bindings generated code needs beyond the runtime vocabulary: the
// declarations a companion names, and descriptors derived in other files.
import { dirname, relative, resolve, sep } from "node:path";
import ts from "typescript";

export type ImportBinding = {
  readonly module: string;
  readonly form: "named" | "default" | "namespace";
  /** Name bound in the generated module. */
  readonly name: string;
  /** Exported name, when it differs from `name`. */
  readonly imported?: string;
  readonly typeOnly: boolean;
};

export function sameBinding(a: ImportBinding, b: ImportBinding): boolean {
  return a.module === b.module && a.form === b.form &&
    (a.imported ?? a.name) === (b.imported ?? b.name) && a.typeOnly === b.typeOnly;
}

export class ModuleImports {
  private readonly bindings = new Map<string, ImportBinding>();

  /**
   * Record a binding. Returns the binding already holding `name` when it
   * points somewhere else; the new one is then dropped.
   */
  add(binding: ImportBinding): ImportBinding | undefined {
    const existing = this.bindings.get(binding.name);
    if (!existing) {
      this.bindings.set(binding.name, binding);
      return undefined;
    }
    return sameBinding(existing, binding) ? undefined : existing;
  }

  get size(): number {
    return this.bindings.size;
  }

  /**
   * One declaration per module for named bindings, in first-use order;
   * default and namespace bindings get a declaration each.
   */
  declarations(typeOnly: boolean): ts.ImportDeclaration[] {
    const groups = new Map<string, ImportBinding[]>();
    for (const binding of this.bindings.values()) {
      if (binding.typeOnly !== typeOnly) continue;
      const key = binding.form === "named"
        ? `named:${binding.module}`
        : `${binding.form}:${binding.module}:${binding.name}`;
      groups.set(key, [...groups.get(key) ?? [], binding]);
    }
    return [...groups.values()].flatMap((group) => {
      const [head] = group;
      return head ? [importDeclaration(typeOnly, head.form, group, head.module)] : [];
    });
  }
}

export function importDeclaration(
  typeOnly: boolean,
  form: ImportBinding["form"],
  bindings: readonly Pick<ImportBinding, "name" | "imported">[],
  module: string,
): ts.ImportDeclaration {
  const f = ts.factory;
  const [head] = bindings;
  const clause = form === "default" && head
    ? f.createImportClause(typeOnly, f.createIdentifier(head.name), undefined)
    : f.createImportClause(
      typeOnly,
      undefined,
      form === "namespace" && head
        ? f.createNamespaceImport(f.createIdentifier(head.name))
        : f.createNamedImports(
          bindings.map((b) =>
            f.createImportSpecifier(
              false,
              b.imported === undefined ? undefined : f.createIdentifier(b.imported),
              f.createIdentifier(b.name),
            )
          ),
        ),
    );
  return f.createImportDeclaration(
    undefined,
    clause,
    f.createStringLiteral(module),
    undefined,
  );
}

/**
 * Relative specifier from the module `fromFile` to `toFile`, with a trailing
 * `.ts` replaced by `extension` when one is given.
 */
export function relativeSpecifier(
  fromFile: string,
  toFile: string,
  extension?: string,
): string {
  const target = extension === undefined ? toFile : toFile.replace(/\.ts$/, extension);
  const path = relative(dirname(fromFile), target).split(sep).join("/");
  return path.startsWith(".") ? path : `./${path}`;
}

/**
 * A specifier written in `writtenIn`, as seen from `seenFrom`. Package
 * specifiers are unchanged.
 */
export function rebaseSpecifier(
  specifier: string,
  writtenIn: string,
  seenFrom: string,
): string {
  if (!specifier.startsWith(".") || dirname(writtenIn) === dirname(seenFrom)) {
    return specifier;
  }
  return relativeSpecifier(seenFrom, resolve(dirname(writtenIn), specifier));
}

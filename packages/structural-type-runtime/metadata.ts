// packages/structural-type-runtime/metadata.ts
// Read-only queries over descriptor metadata

import type { AnyMetadata, StructuralOf } from "../structural-type-spec/src/mod.ts";
import { StructureMismatchError } from "./fold.ts";

export type ParameterInfo = {
  readonly position: number;
  readonly label?: string;
  readonly nested: boolean;
};

export type CaseInfo = {
  readonly name: string;
  readonly parameters: readonly ParameterInfo[];
};

/**
 * Field names of a product descriptor, in declaration order.
 */
export function fieldNames(structural: StructuralOf<unknown>): readonly string[] {
  const metadata = structural.metadata;
  if (metadata.kind !== "struct") {
    throw new StructureMismatchError(
      `fieldNames expects struct metadata, found '${metadata.kind}'`,
    );
  }
  return parametersOf(metadata.properties).map((p) =>
    p.label ?? String(p.position)
  );
}

/**
 * Case names of a sum descriptor, in declaration order.
 */
export function caseNames(structural: StructuralOf<unknown>): readonly string[] {
  return casesOf(structural).map((c) => c.name);
}

/**
 * Parameters of one case, or `undefined` when the sum has no such case.
 */
export function caseParameters(
  structural: StructuralOf<unknown>,
  caseName: string,
): readonly ParameterInfo[] | undefined {
  return casesOf(structural).find((c) => c.name === caseName)?.parameters;
}

/** Every case with its parameters; the chain must end in `nothing`. */
export function casesOf(structural: StructuralOf<unknown>): readonly CaseInfo[] {
  const metadata = structural.metadata;
  if (metadata.kind !== "enum") {
    throw new StructureMismatchError(
      `Case queries expect enum metadata, found '${metadata.kind}'`,
    );
  }
  const cases: CaseInfo[] = [];
  let current: AnyMetadata = metadata.cases;
  while (current.kind === "case") {
    cases.push({ name: current.name, parameters: parametersOf(current.parameters) });
    current = current.next;
  }
  if (current.kind !== "nothing") {
    throw new StructureMismatchError(
      `Case chain must end in 'nothing', found '${current.kind}'`,
    );
  }
  return cases;
}

function parametersOf(metadata: AnyMetadata): readonly ParameterInfo[] {
  const parameters: ParameterInfo[] = [];
  let current = metadata;
  while (current.kind === "list") {
    const head = current.head;
    const position = parameters.length;
    if (head.kind === "property") {
      parameters.push({ position, label: head.name, nested: head.nested !== undefined });
    } else if (head.kind === "leaf") {
      parameters.push({ position, nested: head.nested !== undefined });
    } else {
      throw new StructureMismatchError(
        `List head must be a property or leaf, found '${head.kind}'`,
      );
    }
    current = current.tail;
  }
  if (current.kind !== "empty") {
    throw new StructureMismatchError(
      `Parameter list must end in 'empty', found '${current.kind}'`,
    );
  }
  return parameters;
}

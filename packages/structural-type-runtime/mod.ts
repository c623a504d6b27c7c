// packages/structural-type-runtime/mod.ts
// Generic algorithms over derived descriptors

export {
  type Algebra,
  fold,
  foldInto,
  type Focus,
  overStructure,
  StructureMismatchError,
} from "./fold.ts";

export { describe, formatLeaf } from "./describe.ts";

export { equals, leafEquals, toTree, type Tree, treesEqual } from "./equals.ts";

export {
  type Control,
  controlFor,
  type EditableField,
  EditError,
  fields,
  update,
} from "./edit.ts";

export {
  type CaseInfo,
  caseNames,
  caseParameters,
  casesOf,
  fieldNames,
  type ParameterInfo,
} from "./metadata.ts";

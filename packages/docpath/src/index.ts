export {
  deletePath,
  findAll,
  findFirst,
  get,
  getList,
  getSection,
  getString,
  has,
  set,
} from "./document"
export {
  DocPathError,
  type DocPathErrorKind,
  IncorrectTypeError,
  IndexNotationError,
  LabelSelectorError,
  MissingArrayTraversalError,
  MissingNameError,
  NotAnArrayError,
  NotFoundError,
  NotTraversableError,
  PatchOperationError,
  UnsupportedHashTypeError,
} from "./error"
export {
  type CleanFieldsOptions,
  cleanFields,
  type FieldCleaner,
  MANAGED_FIELDS,
} from "./fieldCleaner"
export { type GeneratedPatch, generatePatch } from "./generatePatch"
export { hash, hashString } from "./hash"
export type { JSONObject, JSONPrimitive, JSONRecord, JSONValue } from "./json"
export {
  type LabelSelector,
  type LabelSelectorOperator,
  type LabelSelectorRequirement,
  parseLabelSelector,
} from "./labelSelector"
export { type Logger, silentLogger } from "./logger"
export { NamedObject, type NamedObjectOptions } from "./namedObject"
export {
  ArrayNotation,
  concatPaths,
  getArrayNotation,
  isArray,
  newPath,
  PATH_ANNOTATIONS,
  PATH_LABELS,
  PATH_METADATA,
  PATH_METADATA_GENERATE_NAME,
  PATH_METADATA_NAME,
  PATH_METADATA_NAMESPACE,
  PATH_OWNER_REFERENCE,
  PATH_OWNER_REFERENCE_KIND,
  PATH_SPEC,
  type Path,
  parseJQPath,
  parseJSONPointerPath,
  splitKey,
  TRAVERSAL,
  toJSONPointer,
} from "./path"
export {
  applyPatches,
  applyPatchesInPlace,
  createAddPatch,
  createCopyPatch,
  createMovePatch,
  createRemovePatch,
  createReplacePatch,
  createTestPatch,
  type PatchOperation,
} from "./patchOperation"
export { walk, type WalkArgs } from "./walk"

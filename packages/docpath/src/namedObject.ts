import {
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
import { DocPathError, failure, MissingNameError } from "./error"
import { cleanFields, type FieldCleaner, MANAGED_FIELDS } from "./fieldCleaner"
import { type GeneratedPatch, generatePatch } from "./generatePatch"
import { hash, hashString } from "./hash"
import type { JSONRecord, JSONValue } from "./json"
import { type Logger, silentLogger } from "./logger"
import {
  newPath,
  PATH_ANNOTATIONS,
  PATH_LABELS,
  PATH_METADATA_GENERATE_NAME,
  PATH_METADATA_NAME,
  PATH_METADATA_NAMESPACE,
  PATH_OWNER_REFERENCE_KIND,
  type Path,
  toJSONPointer,
} from "./path"
import {
  createAddPatch,
  createRemovePatch,
  createReplacePatch,
  type PatchOperation,
} from "./patchOperation"
import { isRecord } from "./utils"
import { walk, type WalkArgs } from "./walk"

export interface NamedObjectOptions {
  /**
   * Receives debug output, e.g. when `set` has to create missing parts of
   * the path.
   * Default: silent.
   */
  logger?: Logger
}

/**
 * A cluster resource document (an object with `metadata.name`) with accessors
 * for the common fields.
 *
 * All operations work on `root` in place.
 */
export class NamedObject {
  private readonly logger: Logger

  constructor(
    readonly root: JSONRecord,
    options: NamedObjectOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger
  }

  /**
   * Creates a new object with only `metadata.name` set.
   */
  static create(name: string, options?: NamedObjectOptions): NamedObject {
    return new NamedObject({ metadata: { name } }, options)
  }

  /**
   * Wraps a parsed document. It must have `metadata.name` or
   * `metadata.generateName` set; the latter is used by pods before their
   * controller assigned a name.
   *
   * @throws MissingNameError
   */
  static fromRecord(record: JSONRecord, options?: NamedObjectOptions): NamedObject {
    const obj = new NamedObject(record, options)
    if (!obj.has(PATH_METADATA_NAME) && !obj.has(PATH_METADATA_GENERATE_NAME)) {
      throw new MissingNameError()
    }
    return obj
  }

  /**
   * Parses a JSON document, see `fromRecord`.
   */
  static fromJSON(json: string, options?: NamedObjectOptions): NamedObject {
    const parsed: unknown = JSON.parse(json)
    if (!isRecord(parsed)) {
      failure("document is not a JSON object")
    }
    return NamedObject.fromRecord(parsed, options)
  }

  walk(path: Path, args?: WalkArgs): JSONValue | undefined {
    return walk(this.root, path, args)
  }

  get(path: Path): JSONValue | undefined {
    return get(this.root, path)
  }

  has(path: Path): boolean {
    return has(this.root, path)
  }

  /**
   * Sets a value, creating the path if it does not exist.
   */
  set(path: Path, value: JSONValue): void {
    const writtenPath = set(this.root, path, value)
    if (writtenPath.length !== path.length) {
      this.logger.debug(`created ${toJSONPointer(writtenPath)} to set ${toJSONPointer(path)}`)
    }
  }

  delete(path: Path): void {
    deletePath(this.root, path)
  }

  findAll(path: Path, value?: JSONValue): Path[] {
    return findAll(this.root, path, value)
  }

  findFirst(path: Path, value?: JSONValue): Path | undefined {
    return findFirst(this.root, path, value)
  }

  getString(path: Path): string {
    return getString(this.root, path)
  }

  getSection(path: Path): JSONRecord {
    return getSection(this.root, path)
  }

  getList(path: Path): JSONValue[] {
    return getList(this.root, path)
  }

  generatePatch(path: Path, value: JSONValue): GeneratedPatch {
    return generatePatch(this.root, path, value)
  }

  private getOptionalString(path: Path): string | undefined {
    try {
      return this.getString(path)
    } catch (err) {
      if (err instanceof DocPathError) return undefined
      throw err
    }
  }

  /**
   * Returns the name of the object, or its name prefix (generateName) if no
   * name has been assigned yet. Empty if neither is set.
   */
  getName(): string {
    return (
      this.getOptionalString(PATH_METADATA_NAME) ??
      this.getOptionalString(PATH_METADATA_GENERATE_NAME) ??
      ""
    )
  }

  getNamespace(): string {
    return this.getOptionalString(PATH_METADATA_NAMESPACE) ?? ""
  }

  getKind(): string {
    return this.getOptionalString(["kind"]) ?? ""
  }

  getVersion(): string {
    return this.getOptionalString(["apiVersion"]) ?? ""
  }

  getUID(): string {
    return this.getOptionalString(["metadata", "uid"]) ?? ""
  }

  /**
   * Returns the kind of the first owning resource, e.g. ReplicaSet for a pod
   * managed by a ReplicaSet.
   */
  getOwnerKind(): string {
    return this.getOptionalString(PATH_OWNER_REFERENCE_KIND) ?? ""
  }

  setName(name: string): void {
    this.set(PATH_METADATA_NAME, name)
  }

  setNamespace(namespace: string): void {
    this.set(PATH_METADATA_NAMESPACE, namespace)
  }

  getLabel(key: string): string {
    return this.getString(newPath(PATH_LABELS, key))
  }

  hasLabels(): boolean {
    return this.has(PATH_LABELS)
  }

  /**
   * Case-insensitive check of a label value. False if the label is not set.
   */
  isLabelSetTo(key: string, value: string): boolean {
    return equalFold(this.getOptionalString(newPath(PATH_LABELS, key)), value)
  }

  /**
   * Case-insensitive check of a label value. True if the label is not set.
   */
  isLabelNotSetTo(key: string, value: string): boolean {
    return !this.isLabelSetTo(key, value)
  }

  setLabel(key: string, value: string): void {
    this.set(newPath(PATH_LABELS, key), value)
  }

  getAnnotation(key: string): string {
    return this.getString(newPath(PATH_ANNOTATIONS, key))
  }

  hasAnnotations(): boolean {
    return this.has(PATH_ANNOTATIONS)
  }

  isAnnotationSetTo(key: string, value: string): boolean {
    return equalFold(this.getOptionalString(newPath(PATH_ANNOTATIONS, key)), value)
  }

  isAnnotationNotSetTo(key: string, value: string): boolean {
    return !this.isAnnotationSetTo(key, value)
  }

  setAnnotation(key: string, value: string): void {
    this.set(newPath(PATH_ANNOTATIONS, key), value)
  }

  /**
   * Checks kind and apiVersion (case-insensitive). An empty string matches
   * any value.
   */
  isOfKind(kind: string, apiVersion: string): boolean {
    if (kind !== "" && !equalFold(this.getOptionalString(["kind"]), kind)) {
      return false
    }
    if (apiVersion !== "" && !equalFold(this.getOptionalString(["apiVersion"]), apiVersion)) {
      return false
    }
    return true
  }

  createAddPatch(path: Path, value: JSONValue): PatchOperation {
    return createAddPatch(path, value)
  }

  createReplacePatch(path: Path, value: JSONValue): PatchOperation {
    return createReplacePatch(path, value)
  }

  createRemovePatch(path: Path): PatchOperation {
    return createRemovePatch(path)
  }

  /**
   * Removes fields maintained by the cluster, see MANAGED_FIELDS.
   */
  removeManagedFields(cleaner: FieldCleaner = MANAGED_FIELDS): void {
    cleanFields(cleaner, this.root, { logger: this.logger })
  }

  hash(): bigint {
    return hash(this.root)
  }

  hashString(): string {
    return hashString(this.root)
  }

  toJSON(): JSONRecord {
    return this.root
  }
}

function equalFold(actual: string | undefined, expected: string): boolean {
  return actual !== undefined && actual.toLowerCase() === expected.toLowerCase()
}

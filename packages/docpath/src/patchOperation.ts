import { current, Immer, isDraft } from "immer"
import { NotFoundError, PatchOperationError } from "./error"
import type { JSONObject, JSONValue } from "./json"
import {
  ArrayNotation,
  getArrayNotation,
  parseJSONPointerPath,
  type Path,
  toJSONPointer,
} from "./path"
import { deepEqual, isRecord } from "./utils"
import { walk } from "./walk"

/**
 * A JSON patch operation (RFC 6902).
 * Paths are JSON Pointers.
 */
export type PatchOperation =
  | { op: "add"; path: string; value: JSONValue }
  | { op: "remove"; path: string }
  | { op: "replace"; path: string; value: JSONValue }
  | { op: "copy"; from: string; path: string }
  | { op: "move"; from: string; path: string }
  | { op: "test"; path: string; value: JSONValue }

export function createAddPatch(path: Path, value: JSONValue): PatchOperation {
  return { op: "add", path: toJSONPointer(path), value }
}

export function createRemovePatch(path: Path): PatchOperation {
  return { op: "remove", path: toJSONPointer(path) }
}

export function createReplacePatch(path: Path, value: JSONValue): PatchOperation {
  return { op: "replace", path: toJSONPointer(path), value }
}

export function createCopyPatch(from: Path, path: Path): PatchOperation {
  return { op: "copy", from: toJSONPointer(from), path: toJSONPointer(path) }
}

export function createMovePatch(from: Path, path: Path): PatchOperation {
  return { op: "move", from: toJSONPointer(from), path: toJSONPointer(path) }
}

export function createTestPatch(path: Path, value: JSONValue): PatchOperation {
  return { op: "test", path: toJSONPointer(path), value }
}

function lookup(target: JSONObject, path: Path): JSONValue | undefined {
  try {
    return walk(target, path)
  } catch (err) {
    if (err instanceof NotFoundError) return undefined
    throw err
  }
}

/**
 * Resolves the value at an existing location. Traversal notation is not a
 * location, so "-" is rejected.
 */
function resolve(target: JSONObject, op: string, path: Path): JSONValue {
  if (path.some((segment) => getArrayNotation(segment) === ArrayNotation.Traversal)) {
    throw new PatchOperationError(op, `"-" does not address an existing value`)
  }
  const value = lookup(target, path)
  if (value === undefined) {
    throw new PatchOperationError(op, `path ${toJSONPointer(path)} does not exist`)
  }
  return value
}

function add(target: JSONObject, path: Path, value: JSONValue): void {
  const key = path[path.length - 1]
  const container = resolve(target, "add", path.slice(0, -1))

  if (Array.isArray(container)) {
    switch (getArrayNotation(key)) {
      case ArrayNotation.Traversal:
        container.push(value)
        return
      case ArrayNotation.Index: {
        const idx = Number(key)
        if (idx > container.length) {
          throw new PatchOperationError("add", `index ${key} out of bounds`)
        }
        container.splice(idx, 0, value)
        return
      }
      default:
        throw new PatchOperationError("add", `"${key}" is not an array index`)
    }
  }

  if (!isRecord(container)) {
    throw new PatchOperationError("add", `${toJSONPointer(path)} has no object or array parent`)
  }
  container[key] = value
}

function remove(target: JSONObject, op: string, path: Path): JSONValue {
  const value = resolve(target, op, path)
  walk(target, path, { mutate: () => undefined })
  return value
}

/**
 * Takes a detached copy of a value, so it can be inserted a second time.
 */
function snapshot(value: JSONValue): JSONValue {
  return structuredClone(isDraft(value) ? current(value) : value)
}

function applyOp(target: JSONObject, op: PatchOperation): void {
  const path = parseJSONPointerPath(op.path)
  if (path.length === 0 && op.op !== "test") {
    throw new PatchOperationError(op.op, "cannot modify the document root")
  }

  switch (op.op) {
    case "add":
      add(target, path, op.value)
      break

    case "remove":
      remove(target, op.op, path)
      break

    case "replace": {
      const { value } = op
      resolve(target, op.op, path)
      walk(target, path, { mutate: () => value })
      break
    }

    case "copy":
      add(target, path, snapshot(resolve(target, op.op, parseJSONPointerPath(op.from))))
      break

    case "move": {
      const from = parseJSONPointerPath(op.from)
      add(target, path, snapshot(remove(target, op.op, from)))
      break
    }

    case "test":
      if (!deepEqual(resolve(target, op.op, path), op.value)) {
        throw new PatchOperationError(op.op, `value at ${op.path} does not match`)
      }
      break
  }
}

/**
 * Applies a list of patch operations to a mutable target object.
 * Operations are applied in order; the first failing one throws and leaves
 * the target with the operations before it applied.
 */
export function applyPatchesInPlace(target: JSONObject, ops: readonly PatchOperation[]): void {
  for (const op of ops) {
    applyOp(target, op)
  }
}

// results of applyPatches stay mutable so they can be walked and mutated again
const immer = new Immer({ autoFreeze: false })

/**
 * Applies a list of patch operations to a copy-on-write draft of `state`.
 * The base state is never mutated; unchanged subtrees are shared with it.
 */
export function applyPatches(state: JSONObject, ops: readonly PatchOperation[]): JSONObject {
  return immer.produce<JSONObject, JSONObject>(state, (draft) => {
    applyPatchesInPlace(draft, ops)
  })
}

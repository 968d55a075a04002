import { IncorrectTypeError, NotFoundError } from "./error"
import { generatePatch } from "./generatePatch"
import type { JSONRecord, JSONValue } from "./json"
import type { Path } from "./path"
import { deepEqual, isRecord, typeName } from "./utils"
import { walk } from "./walk"

/**
 * Returns the value at the given path.
 * If "-" is used, the first element the rest of the path resolves in is used.
 */
export function get(root: JSONValue, path: Path): JSONValue | undefined {
  return walk(root, path)
}

/**
 * Returns true if the path resolves.
 */
export function has(root: JSONValue, path: Path): boolean {
  try {
    walk(root, path)
    return true
  } catch (err) {
    if (err instanceof NotFoundError) return false
    throw err
  }
}

/**
 * Sets the value at the given path, creating missing objects and arrays on
 * the way (see generatePatch). A path ending in "-" appends to the array.
 *
 * @returns The path of the location that was written.
 */
export function set(root: JSONValue, path: Path, value: JSONValue): Path {
  const patch = generatePatch(root, path, value)
  walk(root, patch.path, { mutate: () => patch.value })
  return patch.path
}

/**
 * Removes the key or array element at the given path.
 * Removing a key that does not exist is not an error, but every segment
 * before it has to resolve.
 */
export function deletePath(root: JSONValue, path: Path): void {
  walk(root, path, { mutate: () => undefined })
}

function matchValue(value: JSONValue | undefined) {
  return (v: JSONValue | undefined) =>
    value === undefined || (v !== undefined && deepEqual(v, value))
}

/**
 * Returns the resolved paths of all values matching `value`.
 * If `value` is undefined, every resolved path is returned.
 */
export function findAll(root: JSONValue, path: Path, value?: JSONValue): Path[] {
  const matches = matchValue(value)
  const matchedPaths: Path[] = []

  try {
    walk(root, path, {
      matchAll: true,
      match: (v, resolvedPath) => {
        if (!matches(v)) return false
        matchedPaths.push(resolvedPath)
        return true
      },
    })
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err
  }
  return matchedPaths
}

/**
 * Returns the resolved path of the first value matching `value`, or undefined.
 * If `value` is undefined, the first resolved path is returned.
 */
export function findFirst(root: JSONValue, path: Path, value?: JSONValue): Path | undefined {
  const matches = matchValue(value)
  let matchedPath: Path | undefined

  try {
    walk(root, path, {
      match: (v, resolvedPath) => {
        if (!matches(v)) return false
        matchedPath = resolvedPath
        return true
      },
    })
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err
  }
  return matchedPath
}

export function getString(root: JSONValue, path: Path): string {
  const value = get(root, path)
  if (typeof value !== "string") {
    throw new IncorrectTypeError(typeName(value))
  }
  return value
}

export function getSection(root: JSONValue, path: Path): JSONRecord {
  const value = get(root, path)
  if (!isRecord(value)) {
    throw new IncorrectTypeError(typeName(value))
  }
  return value
}

export function getList(root: JSONValue, path: Path): JSONValue[] {
  const value = get(root, path)
  if (!Array.isArray(value)) {
    throw new IncorrectTypeError(typeName(value))
  }
  return value
}

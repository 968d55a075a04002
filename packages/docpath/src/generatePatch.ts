import { IndexNotationError, NotFoundError } from "./error"
import type { JSONValue } from "./json"
import { ArrayNotation, getArrayNotation, type Path, TRAVERSAL } from "./path"
import { walk } from "./walk"

/**
 * Arguments of a single JSON patch "add" operation.
 */
export interface GeneratedPatch {
  path: Path
  value: JSONValue
}

/**
 * Wraps `value` into the structure described by `segments`: keys become
 * objects, traversal notation becomes one-element arrays.
 */
function extendValue(segments: Path, value: JSONValue): JSONValue {
  let extended = value
  for (let idx = segments.length - 1; idx >= 0; idx--) {
    const segment = segments[idx]
    switch (getArrayNotation(segment)) {
      case ArrayNotation.Invalid:
        extended = { [segment]: extended }
        break
      case ArrayNotation.Traversal:
        extended = [extended]
        break
      case ArrayNotation.Index:
        throw new IndexNotationError()
    }
  }
  return extended
}

/**
 * Reduces the given path so that only existing elements are included (plus the
 * first missing key), and extends the value so that the missing part of the path
 * is created along with it. Adding the returned value at the returned path makes
 * `path` resolve to `value`.
 *
 * If the path ends in "-" and the array exists, the returned path keeps the
 * "-" so the value is appended.
 *
 * When an existing array is traversed and none of its elements resolves the
 * rest of the path, a new element is appended to the outermost such array.
 *
 * @example
 * // document: { spec: {} }
 * generatePatch(doc, ["spec", "template", "labels", "app"], "web")
 * // => { path: ["spec", "template"], value: { labels: { app: "web" } } }
 *
 * @throws IndexNotationError if the document would have to be extended through
 * an explicit array index.
 */
export function generatePatch(
  root: JSONValue | undefined,
  path: Path,
  value: JSONValue
): GeneratedPatch {
  if (path.length === 0) {
    return { path, value }
  }

  const endsInTraversal = getArrayNotation(path[path.length - 1]) === ArrayNotation.Traversal
  let validPath: Path = []

  try {
    walk(root, path, {
      match: (_, resolvedPath) => {
        // keep the traversal notation in case an append is requested
        validPath = endsInTraversal ? [...resolvedPath.slice(0, -1), TRAVERSAL] : resolvedPath
        return true
      },
      notFound: (walkedPath) => {
        validPath = walkedPath
      },
    })
    return { path: validPath, value }
  } catch (err) {
    if (!(err instanceof NotFoundError)) throw err
  }

  // only the last key is missing, adding it is enough
  if (validPath.length === path.length) {
    return { path: validPath, value }
  }

  // an element that does not exist cannot be extended
  if (getArrayNotation(validPath[validPath.length - 1]) === ArrayNotation.Index) {
    throw new IndexNotationError()
  }

  return { path: validPath, value: extendValue(path.slice(validPath.length), value) }
}

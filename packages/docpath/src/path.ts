/**
 * A path to a value within a document.
 *
 * Array access is denoted by two segments: the name of the array followed by
 * either an index ("0", "12", ...) or the traversal notation "-", which means
 * "any element" on read and "append" on write.
 *
 * Paths are never mutated in place. Helpers that derive a path from another one
 * always allocate a new array.
 */
export type Path = readonly string[]

/**
 * The kind of array access a path segment denotes.
 */
export enum ArrayNotation {
  /** Neither index nor traversal notation: an object key */
  Invalid = -1,
  /** Explicit element access */
  Index = 0,
  /** "Any" access on read, append on write */
  Traversal = 1,
}

export const TRAVERSAL = "-"

const INDEX_PATTERN = /^[0-9]+$/

const frozenPath = (...segments: string[]): Path => Object.freeze(segments)

export const PATH_METADATA = frozenPath("metadata")
export const PATH_METADATA_NAME = frozenPath("metadata", "name")
export const PATH_METADATA_GENERATE_NAME = frozenPath("metadata", "generateName")
export const PATH_METADATA_NAMESPACE = frozenPath("metadata", "namespace")
export const PATH_LABELS = frozenPath("metadata", "labels")
export const PATH_ANNOTATIONS = frozenPath("metadata", "annotations")
export const PATH_OWNER_REFERENCE = frozenPath("metadata", "ownerReferences")
export const PATH_OWNER_REFERENCE_KIND = frozenPath("metadata", "ownerReferences", TRAVERSAL, "kind")
export const PATH_SPEC = frozenPath("spec")

/**
 * Creates a new path by appending keys to the given path.
 */
export function newPath(path: Path, ...keys: string[]): Path {
  return [...path, ...keys]
}

/**
 * Creates a new path by concatenating both paths.
 */
export function concatPaths(a: Path, b: Path): Path {
  return [...a, ...b]
}

/**
 * Returns the notation type of an array access segment.
 */
export function getArrayNotation(segment: string): ArrayNotation {
  if (segment === TRAVERSAL) return ArrayNotation.Traversal
  if (INDEX_PATTERN.test(segment)) return ArrayNotation.Index
  return ArrayNotation.Invalid
}

/**
 * Parses a JQ-style path.
 *
 * Keys are separated by "." and can be quoted using single ticks, in which case
 * ".", "[" and "]" are taken literally. Arrays use bracket postfixes: `name[]`
 * becomes `name, "-"` and `name[1]` becomes `name, "1"`.
 *
 * @example
 * parseJQPath("spec.containers[].'app.io/name'") // ["spec", "containers", "-", "app.io/name"]
 */
export function parseJQPath(jqPath: string): Path {
  const path: string[] = []
  if (jqPath.length === 0) return path

  let lastSplitIdx = 0
  let quoted = false

  const addElement = (idx: number, char: string) => {
    const element = jqPath.slice(lastSplitIdx, idx)
    if (element.length > 0) {
      path.push(element)
    } else if (char === "]") {
      path.push(TRAVERSAL)
    }
    lastSplitIdx = idx + 1
  }

  for (let idx = 0; idx < jqPath.length; idx++) {
    const char = jqPath[idx]
    switch (char) {
      case "'":
        if (quoted) {
          quoted = false
          addElement(idx, char)
        } else {
          quoted = true
          lastSplitIdx = idx + 1
        }
        break

      case ".":
      case "[":
      case "]":
        if (!quoted) {
          addElement(idx, char)
        }
        break
    }
  }

  addElement(jqPath.length, "")
  return path
}

const unescapeSegment = (segment: string) =>
  segment.replace(/~[01]/g, (escaped) => (escaped === "~1" ? "/" : "~"))

const escapeSegment = (segment: string) =>
  segment.replace(/[~/]/g, (char) => (char === "/" ? "~1" : "~0"))

/**
 * Parses a JSON Pointer (RFC 6901).
 * Both "" and "/" denote the root.
 */
export function parseJSONPointerPath(pointer: string): Path {
  if (pointer.length === 0 || pointer === "/") return []

  const segments = pointer.split("/")
  if (segments[0].length === 0) {
    segments.shift()
  }
  return segments.map((s) => (s.includes("~") ? unescapeSegment(s) : s))
}

/**
 * Renders the path as a JSON Pointer usable in a JSON patch.
 * The empty path is rendered as "/".
 */
export function toJSONPointer(path: Path): string {
  if (path.length === 0) return "/"

  let pointer = ""
  for (const segment of path) {
    pointer += "/" + escapeSegment(segment)
  }
  return pointer
}

/**
 * Splits the last key from the path. If the path ends in array notation, the
 * notation is dropped and the name of the array is returned as key.
 */
export function splitKey(path: Path): { prefix: Path; key: string } {
  if (path.length === 0) return { prefix: [], key: "" }

  let keyIdx = path.length - 1
  while (keyIdx > 0 && getArrayNotation(path[keyIdx]) !== ArrayNotation.Invalid) {
    keyIdx--
  }
  return { prefix: path.slice(0, keyIdx), key: path[keyIdx] }
}

/**
 * Checks if the segment at `idx` addresses an array, either because it is an
 * array notation itself or because it names an array (the next segment is an
 * array notation).
 */
export function isArray(path: Path, idx: number): { isArray: boolean; notation: ArrayNotation } {
  if (idx < 0 || idx >= path.length) {
    return { isArray: false, notation: ArrayNotation.Invalid }
  }

  // Unnamed array
  let notation = getArrayNotation(path[idx])
  if (notation !== ArrayNotation.Invalid) {
    return { isArray: true, notation }
  }

  // Named array
  if (idx + 1 < path.length) {
    notation = getArrayNotation(path[idx + 1])
    if (notation !== ArrayNotation.Invalid) {
      return { isArray: true, notation }
    }
  }

  return { isArray: false, notation: ArrayNotation.Invalid }
}

import {
  DocPathError,
  MissingArrayTraversalError,
  NotAnArrayError,
  NotFoundError,
  NotTraversableError,
} from "./error"
import type { JSONObject, JSONRecord, JSONValue } from "./json"
import { ArrayNotation, getArrayNotation, newPath, type Path, TRAVERSAL } from "./path"
import { isRecord, typeName } from "./utils"

/**
 * Parameters of a walk.
 */
export interface WalkArgs {
  /**
   * Collect every match of a traversal ("-") instead of stopping at the first.
   */
  matchAll?: boolean

  /**
   * Called for every value found at the end of the path.
   * The path is the resolved path, i.e. traversal notation replaced by the
   * index of the element that matched.
   * Returning false treats the value as not found.
   */
  match?: (value: JSONValue | undefined, resolvedPath: Path) => boolean

  /**
   * Replaces the value found at the end of the path. It receives `undefined`
   * when the last key does not exist yet; returning `undefined` deletes the
   * key or array element.
   */
  mutate?: (value: JSONValue | undefined) => JSONValue | undefined

  /**
   * Called whenever the walk has to stop. The path contains the traversed
   * path up to (including) the key that was not found.
   */
  notFound?: (walkedPath: Path) => void
}

/**
 * Per-level bookkeeping, passed down the recursion.
 */
interface WalkFrame {
  readonly walkedPath: Path
  /** Container holding the current node, undefined for the root */
  readonly parent: JSONObject | undefined
  /** Mutations append to `parent` instead of overwriting the current index */
  readonly appendOnMutate: boolean
}

const rootFrame: WalkFrame = { walkedPath: [], parent: undefined, appendOnMutate: false }

function push(frame: WalkFrame, key: string, node: JSONObject, appendOnMutate = false): WalkFrame {
  return { walkedPath: newPath(frame.walkedPath, key), parent: node, appendOnMutate }
}

function currentKey(frame: WalkFrame): string {
  const { walkedPath } = frame
  return walkedPath.length > 0 ? walkedPath[walkedPath.length - 1] : ""
}

function notFound(segment: string, frame: WalkFrame, args: WalkArgs): never {
  args.notFound?.(segment.length > 0 ? newPath(frame.walkedPath, segment) : frame.walkedPath)
  throw new NotFoundError(segment)
}

/**
 * Calls the mutate function and writes the result back into the parent
 * container. Returns the new value and the path it ended up at.
 */
function applyMutation(
  mutate: NonNullable<WalkArgs["mutate"]>,
  value: JSONValue | undefined,
  frame: WalkFrame
): { value: JSONValue | undefined; resolvedPath: Path } {
  const newValue = mutate(value)
  const { parent } = frame
  const key = currentKey(frame)
  let resolvedPath = frame.walkedPath

  if (Array.isArray(parent)) {
    const idx = Number(key)
    if (newValue === undefined) {
      parent.splice(idx, 1)
    } else if (frame.appendOnMutate) {
      parent.push(newValue)
      resolvedPath = newPath(frame.walkedPath.slice(0, -1), String(parent.length - 1))
    } else {
      parent[idx] = newValue
    }
  } else if (parent !== undefined) {
    if (newValue === undefined) {
      delete parent[key]
    } else {
      parent[key] = newValue
    }
  }
  // no parent: the root itself was mutated, there is nothing to write back to

  return { value: newValue, resolvedPath }
}

function visitTarget(
  value: JSONValue | undefined,
  frame: WalkFrame,
  args: WalkArgs
): JSONValue | undefined {
  let resolvedPath = frame.walkedPath
  if (args.mutate) {
    ;({ value, resolvedPath } = applyMutation(args.mutate, value, frame))
  }
  if (args.match && !args.match(value, resolvedPath)) {
    return notFound("", frame, args)
  }
  return value
}

function walkRecord(
  node: JSONRecord,
  path: Path,
  args: WalkArgs,
  frame: WalkFrame
): JSONValue | undefined {
  const key = path[0]
  if (getArrayNotation(key) !== ArrayNotation.Invalid) {
    throw new NotAnArrayError(currentKey(frame))
  }

  if (!Object.hasOwn(node, key)) {
    // the last key is created when mutating
    if (path.length === 1 && args.mutate) {
      return visitTarget(undefined, push(frame, key, node), args)
    }
    return notFound(key, frame, args)
  }

  return walkNode(node[key], path.slice(1), args, push(frame, key, node))
}

function walkFirst(
  node: JSONValue[],
  rest: Path,
  args: WalkArgs,
  frame: WalkFrame
): JSONValue | undefined {
  // "-" as last segment addresses the array itself: mutations append
  const appendOnMutate = rest.length === 0

  if (node.length === 0 && appendOnMutate && args.mutate) {
    return visitTarget(undefined, push(frame, "0", node, true), args)
  }

  for (let idx = 0; idx < node.length; idx++) {
    try {
      return walkNode(node[idx], rest, args, push(frame, String(idx), node, appendOnMutate))
    } catch (err) {
      if (!(err instanceof DocPathError)) throw err
      // no match in this element, try the next one
    }
  }
  return notFound(TRAVERSAL, frame, args)
}

function walkAll(
  node: JSONValue[],
  rest: Path,
  args: WalkArgs,
  frame: WalkFrame
): JSONValue | undefined {
  const results: (JSONValue | undefined)[] = []
  const length = node.length
  let removed = 0

  for (let i = 0; i < length; i++) {
    // elements deleted by a mutation shift the remaining ones down
    const idx = i - removed
    const lengthBefore = node.length
    try {
      results.push(walkNode(node[idx], rest, args, push(frame, String(idx), node)))
    } catch (err) {
      if (!(err instanceof DocPathError)) throw err
      // errors in sub-paths only mean this element does not match
    }
    removed += lengthBefore - node.length
  }

  if (results.length === 0) {
    return notFound(TRAVERSAL, frame, args)
  }
  if (results.length === 1) {
    return results[0]
  }
  return results.filter((v): v is JSONValue => v !== undefined)
}

function walkArray(
  node: JSONValue[],
  path: Path,
  args: WalkArgs,
  frame: WalkFrame
): JSONValue | undefined {
  const segment = path[0]
  const rest = path.slice(1)

  switch (getArrayNotation(segment)) {
    case ArrayNotation.Index: {
      const idx = Number(segment)
      if (idx >= node.length) {
        return notFound(segment, frame, args)
      }
      return walkNode(node[idx], rest, args, push(frame, segment, node))
    }

    case ArrayNotation.Traversal:
      return args.matchAll ? walkAll(node, rest, args, frame) : walkFirst(node, rest, args, frame)

    default:
      throw new MissingArrayTraversalError(currentKey(frame))
  }
}

function walkNode(
  node: JSONValue | undefined,
  path: Path,
  args: WalkArgs,
  frame: WalkFrame
): JSONValue | undefined {
  if (path.length === 0) {
    return visitTarget(node, frame, args)
  }

  if (node === undefined || node === null) {
    throw new NotTraversableError(`${currentKey(frame)} is nil`)
  }
  if (Array.isArray(node)) {
    return walkArray(node, path, args, frame)
  }
  if (isRecord(node)) {
    return walkRecord(node, path, args, frame)
  }
  throw new NotTraversableError(`${currentKey(frame)} is ${typeName(node)}`)
}

/**
 * Walks the path through the document and returns the value found at its end.
 *
 * Objects are addressed by key, arrays by an index or "-" segment following the
 * key of the array. "-" resolves to the first element the rest of the path
 * resolves in, or to all of them when `matchAll` is set (a single match is
 * returned unwrapped, several as an array).
 *
 * Mutations are written into `root` in place.
 *
 * @throws NotFoundError if a key, index or traversal does not resolve, or the
 * match function rejected the value.
 * @throws NotTraversableError, NotAnArrayError, MissingArrayTraversalError if
 * the path does not fit the structure of the document.
 */
export function walk(
  root: JSONValue | undefined,
  path: Path,
  args: WalkArgs = {}
): JSONValue | undefined {
  return walkNode(root, path, args, rootFrame)
}

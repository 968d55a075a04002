export class DocPathError extends Error {
  constructor(msg: string) {
    super(msg)

    // Set the prototype explicitly for better instanceof support
    Object.setPrototypeOf(this, new.target.prototype)
    this.name = new.target.name
  }
}

export function failure(message: string): never {
  throw new DocPathError(message)
}

/**
 * A key, array index or traversal did not resolve, or a match function
 * rejected the value found at the end of the path.
 */
export class NotFoundError extends DocPathError {
  readonly kind = "notFound"

  constructor(readonly segment: string) {
    super(`Not found: ${segment}`)
  }
}

/**
 * The walk reached a nil value or a scalar while path segments remained.
 */
export class NotTraversableError extends DocPathError {
  readonly kind = "notTraversable"

  constructor(readonly reason: string) {
    super(`Not a traversable type: ${reason}`)
  }
}

/**
 * Array notation ("-" or an index) was used on an object.
 */
export class NotAnArrayError extends DocPathError {
  readonly kind = "notAnArray"

  constructor(readonly segment: string) {
    super(`Not an array: ${segment}`)
  }
}

/**
 * An array was reached but the next segment is neither an index nor "-".
 */
export class MissingArrayTraversalError extends DocPathError {
  readonly kind = "missingArrayTraversal"

  constructor(readonly segment: string) {
    super(`Array traversal indicator missing: ${segment}`)
  }
}

/**
 * A typed getter found a value of another type.
 */
export class IncorrectTypeError extends DocPathError {
  readonly kind = "incorrectType"

  constructor(readonly actualType: string) {
    super(`Incorrect type: ${actualType}`)
  }
}

/**
 * Extending a document would require an array of a given minimum length.
 * Arrays can only be created or extended through "-".
 */
export class IndexNotationError extends DocPathError {
  readonly kind = "indexNotation"

  constructor() {
    super("Cannot append to array using index notation")
  }
}

export class UnsupportedHashTypeError extends DocPathError {
  readonly kind = "unsupportedHashType"

  constructor(
    readonly key: string,
    readonly type: string
  ) {
    super(`cannot create hash for field ${key} of type ${type}`)
  }
}

export class MissingNameError extends DocPathError {
  readonly kind = "missingName"

  constructor() {
    super("object does not have a name set")
  }
}

export class PatchOperationError extends DocPathError {
  readonly kind = "patchOperation"

  constructor(
    readonly op: string,
    msg: string
  ) {
    super(`${op}: ${msg}`)
  }
}

export class LabelSelectorError extends DocPathError {
  readonly kind = "labelSelector"
}

export type DocPathErrorKind =
  | NotFoundError["kind"]
  | NotTraversableError["kind"]
  | NotAnArrayError["kind"]
  | MissingArrayTraversalError["kind"]
  | IncorrectTypeError["kind"]
  | IndexNotationError["kind"]
  | UnsupportedHashTypeError["kind"]
  | MissingNameError["kind"]
  | PatchOperationError["kind"]
  | LabelSelectorError["kind"]

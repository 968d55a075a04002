import { createHash, type Hash } from "node:crypto"
import { UnsupportedHashTypeError } from "./error"
import { isRecord, typeName } from "./utils"

const HASH_ALGORITHM = "sha256"

/**
 * Feeds a value into the hasher, dispatching on its type.
 * `key` is the object key the value (or the array holding it) belongs to.
 */
function hashValue(hasher: Hash, key: string, value: unknown): void {
  switch (typeof value) {
    case "string":
      hasher.update(value)
      return
    case "boolean":
      hasher.update(value ? "true" : "false")
      return
    case "number":
      hasher.update(value.toFixed(6))
      return
  }

  if (value === null) {
    hasher.update("null")
  } else if (Array.isArray(value)) {
    for (const element of value) {
      hashValue(hasher, key, element)
    }
  } else if (isRecord(value) && Object.getPrototypeOf(value) === Object.prototype) {
    hashRecord(hasher, value)
  } else {
    throw new UnsupportedHashTypeError(key, typeName(value))
  }
}

function hashRecord(hasher: Hash, record: Record<string, unknown>): void {
  // insertion order is not part of the content
  const keys = Object.keys(record).sort()
  for (const key of keys) {
    hasher.update(key)
    hashValue(hasher, key, record[key])
  }
}

function digest(document: Record<string, unknown>): Buffer {
  const hasher = createHash(HASH_ALGORITHM)
  hashRecord(hasher, document)
  return hasher.digest().subarray(0, 8)
}

/**
 * Calculates a 64-bit hash of the document that does not depend on the order
 * of object keys. Array order is part of the hash.
 *
 * @throws UnsupportedHashTypeError if the document contains a value that is
 * not JSON (undefined, functions, class instances, ...).
 */
export function hash(document: Record<string, unknown>): bigint {
  return digest(document).readBigUInt64BE(0)
}

/**
 * Same as `hash`, encoded as base64.
 */
export function hashString(document: Record<string, unknown>): string {
  return digest(document).toString("base64")
}

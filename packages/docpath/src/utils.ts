import equal from "fast-deep-equal"
import type { JSONRecord, JSONValue } from "./json"

/**
 * Deep equality check for JSONValues.
 * Used by findAll / findFirst and the "test" patch operation.
 */
export function deepEqual(a: JSONValue, b: JSONValue): boolean {
  return equal(a, b)
}

/**
 * Checks if a value is an object (typeof === "object" && !== null).
 */
export function isObject(value: unknown): value is object {
  return value !== null && typeof value === "object"
}

/**
 * Checks if a value is a record node (an object that is not an array).
 */
export function isRecord(value: unknown): value is JSONRecord {
  return isObject(value) && !Array.isArray(value)
}

/**
 * Returns a short runtime type name used in error messages.
 */
export function typeName(value: unknown): string {
  if (value === null) return "null"
  if (Array.isArray(value)) return "array"
  if (typeof value === "object") {
    const proto: unknown = Object.getPrototypeOf(value)
    if (proto !== null && proto !== Object.prototype) {
      return value.constructor.name
    }
    return "object"
  }
  return typeof value
}

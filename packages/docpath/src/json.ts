/**
 * A JSON primitive.
 * `undefined` is not a document value: the walker uses it to denote "absent".
 */
export type JSONPrimitive = null | boolean | number | string

/**
 * A JSON record (object node).
 */
export type JSONRecord = { [k: string]: JSONValue }

/**
 * A JSON container: either a record or an array.
 */
export type JSONObject = JSONRecord | JSONValue[]

/**
 * A JSON value.
 */
export type JSONValue = JSONPrimitive | JSONObject

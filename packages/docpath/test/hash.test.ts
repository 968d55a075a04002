import { createHash } from "node:crypto"
import { describe, expect, it } from "vitest"
import { hash, hashString, UnsupportedHashTypeError } from "../src/index"

describe("hash", () => {
  it("hashes keys and values in key order", () => {
    const expected = createHash("sha256").update("a").update("1.000000").digest()
    expect(hash({ a: 1 })).toBe(expected.readBigUInt64BE(0))
  })

  it("does not depend on key order", () => {
    const first = { a: 1, b: { c: "x", d: [1, 2] } }
    const second = { b: { d: [1, 2], c: "x" }, a: 1 }
    expect(hash(first)).toBe(hash(second))
  })

  it("depends on array order", () => {
    expect(hash({ a: [1, 2] })).not.toBe(hash({ a: [2, 1] }))
  })

  it("depends on values", () => {
    expect(hash({ a: "x", b: true, c: null })).not.toBe(hash({ a: "x", b: false, c: null }))
  })

  it("fits into 64 bits", () => {
    const value = hash({ kind: "Deployment", metadata: { name: "web" } })
    expect(value >= 0n && value < 2n ** 64n).toBe(true)
  })

  it("rejects values that are not JSON", () => {
    expect(() => hash({ x: undefined })).toThrow(UnsupportedHashTypeError)
    expect(() => hash({ x: undefined })).toThrow("cannot create hash for field x of type undefined")
    expect(() => hash({ when: new Date(0) })).toThrow(
      "cannot create hash for field when of type Date"
    )
    expect(() => hash({ list: [() => 1] })).toThrow(
      "cannot create hash for field list of type function"
    )
  })
})

describe("hashString", () => {
  it("encodes the hash as base64", () => {
    const doc = { metadata: { name: "web", labels: { app: "web" } } }
    const encoded = hashString(doc)
    expect(encoded).toHaveLength(12)
    expect(Buffer.from(encoded, "base64").readBigUInt64BE(0)).toBe(hash(doc))
  })
})

import { describe, expect, it } from "@effect/vitest"
import { Either, FastCheck } from "effect"
import { NonNegativeNumber, PositiveNumber } from "../../../src/domain/values/Numbers.js"

describe("PositiveNumber", () => {
  it("accepts a positive number", () => {
    expect(Either.map(PositiveNumber.create(3, "quantity"), PositiveNumber.value)).toEqual(Either.right(3))
  })

  it("accepts a positive bigint", () => {
    expect(Either.map(PositiveNumber.create(10n, "cents"), PositiveNumber.value)).toEqual(Either.right(10n))
  })

  it("rejects zero", () => {
    expect(PositiveNumber.create(0, "quantity")).toEqual(Either.left([{
      _tag: "RangeError",
      rule: "NotPositive",
      field: "quantity",
      message: "quantity must be a positive number (> 0)"
    }]))
  })

  it("rejects NaN", () => {
    expect(Either.isLeft(PositiveNumber.create(Number.NaN))).toBe(true)
  })
})

describe("NonNegativeNumber", () => {
  it("accepts zero", () => {
    expect(Either.map(NonNegativeNumber.create(0, "balance"), NonNegativeNumber.value)).toEqual(Either.right(0))
  })

  it("accepts a zero bigint", () => {
    expect(Either.isRight(NonNegativeNumber.create(0n))).toBe(true)
  })

  it("rejects a negative number", () => {
    expect(NonNegativeNumber.create(-1, "balance")).toEqual(Either.left([{
      _tag: "RangeError",
      rule: "Negative",
      field: "balance",
      message: "balance must be a non-negative number (>= 0)"
    }]))
  })
})

// =============================================================================
// Properties
// =============================================================================

describe("numeric properties", () => {
  it("PositiveNumber accepts and re-validates every positive integer", () => {
    FastCheck.assert(
      FastCheck.property(FastCheck.integer({ min: 1 }), (n) => {
        const first = PositiveNumber.create(n)

        expect(Either.map(first, PositiveNumber.value)).toEqual(Either.right(n))
        expect(Either.flatMap(first, (value) => PositiveNumber.create(PositiveNumber.value(value)))).toEqual(first)
      })
    )
  })

  it("PositiveNumber accepts and re-validates every positive bigint", () => {
    FastCheck.assert(
      FastCheck.property(FastCheck.bigInt({ min: 1n, max: 2n ** 128n }), (n) => {
        const first = PositiveNumber.create(n)

        expect(Either.flatMap(first, (value) => PositiveNumber.create(PositiveNumber.value(value)))).toEqual(
          Either.right(n)
        )
      })
    )
  })

  it("NonNegativeNumber accepts and re-validates every integer from zero up", () => {
    FastCheck.assert(
      FastCheck.property(FastCheck.integer({ min: 0 }), (n) => {
        const first = NonNegativeNumber.create(n)

        expect(Either.flatMap(first, (value) => NonNegativeNumber.create(NonNegativeNumber.value(value)))).toEqual(
          Either.right(n)
        )
      })
    )
  })

  it("NonNegativeNumber rejects every negative integer", () => {
    FastCheck.assert(
      FastCheck.property(FastCheck.integer({ max: -1 }), (n) => {
        expect(Either.isLeft(NonNegativeNumber.create(n, "balance"))).toBe(true)
      })
    )
  })
})

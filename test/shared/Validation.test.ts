// =============================================================================
// TDD: Validation combinators
// =============================================================================
//
// Two composition styles over the same `create` results:
//   - accumulating (Do/bind, all, zipWith): every step runs, errors concatenate
//   - fail-fast (Either.gen): the first Left stops everything
//
import { describe, expect, it } from "@effect/vitest"
import { Either, FastCheck, pipe } from "effect"
import * as Validation from "../../src/shared/Validation.js"
import type { Validated } from "../../src/shared/Validation.js"
import { formatErrors, rangeError, shapeError } from "../../src/shared/ValidationError.js"

// =============================================================================
// Test Fixtures
// =============================================================================

const nameTooShort = shapeError("BelowMinLength", "name", "name must be at least 1 characters long")
const ageNotPositive = rangeError("NotPositive", "age", "age must be a positive number (> 0)")
const cityTooShort = shapeError("BelowMinLength", "city", "city must be at least 1 characters long")

// =============================================================================
// Constructors
// =============================================================================

describe("constructors", () => {
  it("valid wraps the value in Right", () => {
    expect(Validation.valid(42)).toEqual(Either.right(42))
  })

  it("invalid wraps the error in a one-element Left", () => {
    expect(Validation.invalid(nameTooShort)).toEqual(Either.left([nameTooShort]))
  })

  it("ensure only builds the error when the condition fails", () => {
    let built = 0
    const onFailure = () => {
      built++
      return nameTooShort
    }

    expect(Validation.ensure(true, onFailure)).toEqual(Validation.unit)
    expect(built).toBe(0)

    expect(Validation.ensure(false, onFailure)).toEqual(Either.left([nameTooShort]))
    expect(built).toBe(1)
  })

  it("fromEither lifts a single error into a list", () => {
    expect(Validation.fromEither(Either.left("boom"))).toEqual(Either.left(["boom"]))
    expect(Validation.fromEither(Either.right(1))).toEqual(Either.right(1))
  })
})

// =============================================================================
// all
// =============================================================================

describe("all", () => {
  it("passes when every check passes", () => {
    expect(Validation.all([Validation.unit, Validation.unit])).toEqual(Either.right(undefined))
  })

  it("passes on no checks at all", () => {
    expect(Validation.all([])).toEqual(Either.right(undefined))
  })

  it("collects every failure, in check order", () => {
    const result = Validation.all([
      Validation.invalid(nameTooShort),
      Validation.unit,
      Validation.invalid(cityTooShort)
    ])

    expect(result).toEqual(Either.left([nameTooShort, cityTooShort]))
  })
})

// =============================================================================
// zipWith
// =============================================================================

describe("zipWith", () => {
  it("combines both values when both succeed", () => {
    const result = Validation.zipWith(Validation.valid("Jean"), Validation.valid(30), (name, age) => `${name}:${age}`)

    expect(result).toEqual(Either.right("Jean:30"))
  })

  it("keeps left errors before right errors", () => {
    const result = Validation.zipWith(
      Validation.invalid(nameTooShort),
      Validation.invalid(ageNotPositive),
      () => "unreachable"
    )

    expect(result).toEqual(Either.left([nameTooShort, ageNotPositive]))
  })

  it("never calls the combiner when a side failed", () => {
    let calls = 0
    Validation.zipWith(Validation.valid("Jean"), Validation.invalid(ageNotPositive), () => calls++)
    Validation.zipWith(Validation.invalid(nameTooShort), Validation.valid(30), () => calls++)

    expect(calls).toBe(0)
  })
})

// =============================================================================
// Do / bind
// =============================================================================

describe("Do / bind", () => {
  it("builds a record of every named value", () => {
    const result = pipe(
      Validation.Do,
      Validation.bind("name", Validation.valid("Jean")),
      Validation.bind("age", Validation.valid(30)),
      Validation.bind("city", Validation.valid("Lyon"))
    )

    expect(result).toEqual(Either.right({ name: "Jean", age: 30, city: "Lyon" }))
  })

  it("accumulates errors in step order", () => {
    const result = pipe(
      Validation.Do,
      Validation.bind("name", Validation.invalid(nameTooShort)),
      Validation.bind("age", Validation.invalid(ageNotPositive)),
      Validation.bind("city", Validation.invalid(cityTooShort))
    )

    expect(result).toEqual(Either.left([nameTooShort, ageNotPositive, cityTooShort]))
  })

  it("reports only the failing steps", () => {
    const result = pipe(
      Validation.Do,
      Validation.bind("name", Validation.valid("Jean")),
      Validation.bind("age", Validation.invalid(ageNotPositive)),
      Validation.bind("city", Validation.valid("Lyon")),
      Either.map(({ age, city, name }) => ({ age, city, name }))
    )

    expect(result).toEqual(Either.left([ageNotPositive]))
  })
})

// =============================================================================
// Fail-fast, for contrast
// =============================================================================

describe("fail-fast composition", () => {
  it("Either.gen stops at the first failure", () => {
    let reachedCity = false
    const result = Either.gen(function* () {
      const name = yield* Validation.invalid(nameTooShort)
      const age = yield* Validation.invalid(ageNotPositive)
      reachedCity = true
      return { name, age }
    })

    expect(result).toEqual(Either.left([nameTooShort]))
    expect(reachedCity).toBe(false)
  })
})

// =============================================================================
// formatErrors
// =============================================================================

describe("formatErrors", () => {
  it("renders one bracketed block, one message per line", () => {
    expect(formatErrors([nameTooShort, ageNotPositive])).toBe(
      "[\nname must be at least 1 characters long,\nage must be a positive number (> 0)]\n"
    )
  })

  it("renders a single message without a separator", () => {
    expect(formatErrors([cityTooShort])).toBe("[\ncity must be at least 1 characters long]\n")
  })
})

// =============================================================================
// Accumulation across inputs
// =============================================================================

describe("accumulation properties", () => {
  // null = the check passed, a string = the error it reported
  const outcomes = FastCheck.array(FastCheck.option(FastCheck.string(), { nil: null }), { maxLength: 20 })

  it("all returns every failure, in order, and passes only when none failed", () => {
    FastCheck.assert(
      FastCheck.property(outcomes, (results) => {
        const checks = results.map((error) => (error === null ? Validation.unit : Validation.invalid(error)))
        const failures = results.filter((error) => error !== null)

        expect(Validation.all(checks)).toEqual(failures.length === 0 ? Either.right(undefined) : Either.left(failures))
      })
    )
  })

  it("bind keeps every step's errors, in step order", () => {
    const steps = FastCheck.tuple(
      FastCheck.option(FastCheck.string(), { nil: null }),
      FastCheck.option(FastCheck.string(), { nil: null }),
      FastCheck.option(FastCheck.string(), { nil: null })
    )
    const step = (error: string | null): Validated<number, string> =>
      error === null ? Validation.valid(1) : Validation.invalid(error)

    FastCheck.assert(
      FastCheck.property(steps, ([a, b, c]) => {
        const result = pipe(
          Validation.Do,
          Validation.bind("a", step(a)),
          Validation.bind("b", step(b)),
          Validation.bind("c", step(c))
        )
        const failures = [a, b, c].filter((error) => error !== null)

        expect(result).toEqual(failures.length === 0 ? Either.right({ a: 1, b: 1, c: 1 }) : Either.left(failures))
      })
    )
  })
})

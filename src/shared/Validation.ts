// =============================================================================
// Validation: Error Accumulation
// =============================================================================
//
// `Either` short-circuits: once a step fails, later steps never run.
// That is the right tool when one step needs the result of the previous one
// (fail-fast), and the wrong one for a form with five independent fields,
// where the user wants to hear about ALL five problems in one response.
//
// `Validated<A, E>` is an Either whose error side is a NON-EMPTY list.
// The combinators below always evaluate every step and concatenate errors:
//
//   step order first, then the order inside each step
//
// and build the combined value only when every step succeeded.
//
// TWO WAYS TO COMPOSE:
//   - fail-fast:     Either.gen / Either.flatMap over `create` results
//   - accumulating:  Validation.Do + Validation.bind (or `all` for plain checks)
//
// Inside an accumulating composition, each field still stops at its own
// result: a field's `create` decides what errors it reports, the caller
// decides that every field gets evaluated.
//
// BRANDING:
// Scalar types run their checks here, then brand with `Brand.nominal`.
// `Brand.refined` / `Schema.brand` report a `BrandErrors` / `ParseError` with no
// `rule` or `field`, and can't run one check only when another passed (Luhn
// only over well-shaped digits).
//
// EFFECT SYNTAX:
//   Either<A, E> puts success FIRST (same as Effect<A, E, R>).
//
import { Array, Either, Record } from "effect"
import type { LazyArg } from "effect/Function"
import type { ValidationError } from "./ValidationError.js"

export type Validated<A, E = ValidationError> = Either.Either<A, Array.NonEmptyReadonlyArray<E>>

// =============================================================================
// Constructors
// =============================================================================

export const valid = <A>(value: A): Validated<A, never> => Either.right(value)

export const invalid = <E>(error: E): Validated<never, E> => Either.left(Array.of(error))

// A passed check that carries no value
export const unit: Validated<void, never> = Either.right(undefined)

// One rule: `onFailure` is only evaluated when the rule fails
export const ensure = <E>(condition: boolean, onFailure: LazyArg<E>): Validated<void, E> =>
  condition ? unit : invalid(onFailure())

// Lift a single-error Either (e.g. a decoder result) into a Validated
export const fromEither = <A, E>(self: Either.Either<A, E>): Validated<A, E> =>
  Either.mapLeft(self, (error) => Array.of(error))

// =============================================================================
// Accumulating combinators
// =============================================================================

// Many checks over the same input, none of which produces a value.
// Used inside scalar constructors:
//
//   Validation.all([
//     Validation.ensure(isDigits, () => nonDigit(field)),
//     Validation.ensure(length <= max, () => tooLong(field, max))
//   ])
//
export const all = <E>(checks: ReadonlyArray<Validated<void, E>>): Validated<void, E> => {
  const errors = Array.flatMap(checks, (check) => (Either.isLeft(check) ? check.left : []))
  return Array.isNonEmptyReadonlyArray(errors) ? Either.left(errors) : unit
}

// Two independent steps. `f` runs only when both succeeded.
export const zipWith = <A, E1, B, E2, C>(
  self: Validated<A, E1>,
  that: Validated<B, E2>,
  f: (a: A, b: B) => C
): Validated<C, E1 | E2> => {
  if (Either.isLeft(self)) {
    return Either.left(Either.isLeft(that) ? Array.appendAll(self.left, that.left) : self.left)
  }
  if (Either.isLeft(that)) {
    return Either.left(that.left)
  }
  return Either.right(f(self.right, that.right))
}

// -----------------------------------------------------------------------------
// Do / bind: N independent steps, each one named
// -----------------------------------------------------------------------------
//
// Same shape as Either.Do / Either.bind, but `bind` takes the step's RESULT
// rather than a function of the previous values, so steps can't depend on
// each other:
//
//   pipe(
//     Validation.Do,
//     Validation.bind("number", ChecksumString.create(number, "card number")),
//     Validation.bind("cvv", DigitString.create(cvv, "CVV")),
//     Either.map(({ number, cvv }) => ({ number, cvv }))
//   )
//
export const Do: Validated<{}, never> = Either.Do

export const bind =
  <N extends string, B, E2>(name: N, step: Validated<B, E2>) =>
  <A extends object, E1>(self: Validated<A, E1>): Validated<A & { readonly [K in N]: B }, E1 | E2> =>
    zipWith(self, step, (values, value) => ({ ...values, ...Record.singleton(name, value) }))

import type { Brand } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import { type RangeError, rangeError } from "../../shared/ValidationError.js"

// =============================================================================
// PositiveNumber<T> / NonNegativeNumber<T>
// =============================================================================
//
// Generic over the numeric primitive: works for `number` and `bigint` alike.
//
//   PositiveNumber.create(3, "quantity")    → Validated<PositiveNumber<3>, RangeError>
//   PositiveNumber.create(10n, "cents")     → Validated<PositiveNumber<10n>, RangeError>
//
// The type predicates below are the refinements: when they return true the
// compiler narrows `T` to the branded type, no assertion needed.
//
// NaN fails both checks (every comparison with NaN is false).
//

export type PositiveNumber<T extends number | bigint = number> = T & Brand.Brand<"PositiveNumber">

export type NonNegativeNumber<T extends number | bigint = number> = T & Brand.Brand<"NonNegativeNumber">

const isPositive = <T extends number | bigint>(value: T): value is PositiveNumber<T> => value > 0

const isNonNegative = <T extends number | bigint>(value: T): value is NonNegativeNumber<T> => value >= 0

export const PositiveNumber = {
  create: <T extends number | bigint>(
    value: T,
    field: string = "value"
  ): Validated<PositiveNumber<T>, RangeError> =>
    isPositive(value)
      ? Validation.valid(value)
      : Validation.invalid(rangeError("NotPositive", field, `${field} must be a positive number (> 0)`)),

  value: <T extends number | bigint>(self: PositiveNumber<T>): T => self
}

export const NonNegativeNumber = {
  create: <T extends number | bigint>(
    value: T,
    field: string = "value"
  ): Validated<NonNegativeNumber<T>, RangeError> =>
    isNonNegative(value)
      ? Validation.valid(value)
      : Validation.invalid(rangeError("Negative", field, `${field} must be a non-negative number (>= 0)`)),

  value: <T extends number | bigint>(self: NonNegativeNumber<T>): T => self
}

import { BigDecimal, Brand, Option } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import { type RangeError, type ShapeError, rangeError, shapeError } from "../../shared/ValidationError.js"

// =============================================================================
// PositiveAmount: a currency amount strictly greater than zero
// =============================================================================
//
// Money is never a float. The wrapped value is Effect's `BigDecimal`
// (arbitrary precision: bigint digits + scale), so 0.1 + 0.2 stays 0.3.
//
// INPUT:
// Accepts a BigDecimal, a decimal string ("99.99") or a JS number.
// Numbers go through their string form, so 99.99 becomes exactly 99.99
// rather than its binary approximation.
//
// Two rules, evaluated in order:
//   1. NotADecimal (shape):  input doesn't parse
//   2. NotPositive (range):  only checked when the input parsed
//

export type PositiveAmount = BigDecimal.BigDecimal & Brand.Brand<"PositiveAmount">

export type AmountInput = BigDecimal.BigDecimal | number | string

const brand = Brand.nominal<PositiveAmount>()

const parse = (input: AmountInput): Option.Option<BigDecimal.BigDecimal> => {
  if (BigDecimal.isBigDecimal(input)) {
    return Option.some(input)
  }
  if (typeof input === "number") {
    return Number.isFinite(input) ? BigDecimal.fromString(String(input)) : Option.none()
  }
  const trimmed = input.trim()
  // fromString("") is zero; a blank field is not a number
  return trimmed.length > 0 ? BigDecimal.fromString(trimmed) : Option.none()
}

export const PositiveAmount = {
  create: (
    input: AmountInput,
    field: string = "amount"
  ): Validated<PositiveAmount, ShapeError | RangeError> =>
    Option.match(parse(input), {
      onNone: () => Validation.invalid(shapeError("NotADecimal", field, `${field} must be a decimal number`)),
      onSome: (amount) =>
        BigDecimal.isPositive(amount)
          ? Validation.valid(brand(amount))
          : Validation.invalid(rangeError("NotPositive", field, `${field} must be a positive amount (> 0)`))
    }),

  value: (self: PositiveAmount): BigDecimal.BigDecimal => self,

  // Normalized decimal text: "99.99", "10.5", "100"
  format: (self: PositiveAmount): string => BigDecimal.format(self)
}

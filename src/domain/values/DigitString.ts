import { Brand, Either } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import { type ShapeError, shapeError } from "../../shared/ValidationError.js"

// =============================================================================
// DigitString: digits only, spaces tolerated
// =============================================================================
//
// Card numbers, CVVs, account numbers: people type them with spaces
// ("4532 0151 1283 0366"). We strip the spaces and store the bare digits.
//
// RULES (all evaluated, errors reported in this order):
//   1. NonDigit:          something other than 0-9 after normalization
//   2. NonDigit:          nothing left after normalization
//   3. ExceedsMaxLength:  only when `maxLength` is given
//   4. BelowMinLength:    only when `minLength` is given
//
// Rules 1 and 2 can't both fail: an empty string has no non-digit character.
//

export type DigitString = string & Brand.Brand<"DigitString">

const brand = Brand.nominal<DigitString>()

export interface DigitStringOptions {
  readonly minLength?: number
  readonly maxLength?: number
}

const DIGITS = /^[0-9]*$/

// Also used by ChecksumString and RoutingNumber
export const normalizeDigits = (raw: string): string => raw.trim().replaceAll(" ", "")

const nonDigit = (field: string): ShapeError =>
  shapeError("NonDigit", field, `${field} must contain only digits (spaces allowed)`)

export const digitShapeChecks = (
  normalized: string,
  field: string,
  options: DigitStringOptions
): ReadonlyArray<Validated<void, ShapeError>> => {
  const { maxLength, minLength } = options
  return [
    Validation.ensure(DIGITS.test(normalized), () => nonDigit(field)),
    Validation.ensure(normalized.length > 0, () => nonDigit(field)),
    maxLength === undefined
      ? Validation.unit
      : Validation.ensure(
        normalized.length <= maxLength,
        () => shapeError("ExceedsMaxLength", field, `${field} must be at most ${maxLength} digits`)
      ),
    minLength === undefined
      ? Validation.unit
      : Validation.ensure(
        normalized.length >= minLength,
        () => shapeError("BelowMinLength", field, `${field} must be at least ${minLength} digits`)
      )
  ]
}

export const DigitString = {
  create: (
    raw: string,
    field: string = "value",
    options: DigitStringOptions = {}
  ): Validated<DigitString, ShapeError> => {
    const normalized = normalizeDigits(raw)
    return Either.map(
      Validation.all(digitShapeChecks(normalized, field, options)),
      () => brand(normalized)
    )
  },

  value: (self: DigitString): string => self
}

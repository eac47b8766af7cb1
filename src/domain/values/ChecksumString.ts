import { Brand, Either } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import { type ChecksumError, type ShapeError, checksumError } from "../../shared/ValidationError.js"
import { type DigitStringOptions, digitShapeChecks, normalizeDigits } from "./DigitString.js"

// =============================================================================
// ChecksumString: a digit string that passes MOD10 (Luhn)
// =============================================================================
//
// Same shape rules as DigitString, then the Luhn checksum.
//
// The checksum only runs when the shape rules passed. Over "4532-0151"
// there is no meaningful checksum to compute, so the caller gets the
// NonDigit error alone instead of a NonDigit + Mod10 pair.
//

export type ChecksumString = string & Brand.Brand<"ChecksumString">

const brand = Brand.nominal<ChecksumString>()

// Luhn: from the right, double every second digit (index 1, 3, 5...),
// subtract 9 from doubles above 9, sum everything, valid iff sum % 10 === 0.
export const luhnCheck = (digits: string): boolean => {
  const sum = [...digits].reverse().reduce((acc, char, index) => {
    let digit = Number(char)
    if (index % 2 === 1) {
      digit *= 2
      if (digit > 9) digit -= 9
    }
    return acc + digit
  }, 0)
  return sum % 10 === 0
}

export const ChecksumString = {
  create: (
    raw: string,
    field: string = "value",
    options: DigitStringOptions = {}
  ): Validated<ChecksumString, ShapeError | ChecksumError> => {
    const normalized = normalizeDigits(raw)
    const shape = Validation.all(digitShapeChecks(normalized, field, options))
    const checksum = Either.isRight(shape)
      ? Validation.ensure(
        luhnCheck(normalized),
        () => checksumError("Mod10", field, `${field} failed MOD10 (Luhn) checksum`)
      )
      : Validation.unit
    return Either.map(
      Validation.all<ShapeError | ChecksumError>([shape, checksum]),
      () => brand(normalized)
    )
  },

  value: (self: ChecksumString): string => self
}

import { Brand, Either } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import { type ChecksumError, type ShapeError, checksumError, shapeError } from "../../shared/ValidationError.js"
import { normalizeDigits } from "./DigitString.js"

// =============================================================================
// RoutingNumber: 9-digit ABA bank routing number
// =============================================================================
//
// RULES:
//   1. NonDigit:       only digits (spaces stripped first)
//   2. InvalidLength:  exactly 9 digits
//   3. AbaRouting:     weighted checksum, only when 1 and 2 passed
//

export type RoutingNumber = string & Brand.Brand<"RoutingNumber">

const brand = Brand.nominal<RoutingNumber>()

const ROUTING_LENGTH = 9
const ABA_WEIGHTS = [3, 7, 1, 3, 7, 1, 3, 7] as const
const DIGITS = /^[0-9]*$/

// Weights 3,7,1 repeating over the first 8 digits; the 9th digit must equal
// (10 - sum % 10) % 10.
export const abaChecksum = (digits: string): boolean => {
  if (digits.length !== ROUTING_LENGTH || !DIGITS.test(digits)) return false
  const values = [...digits].map(Number)
  const sum = ABA_WEIGHTS.reduce((acc, weight, index) => acc + weight * values[index], 0)
  return values[8] === (10 - (sum % 10)) % 10
}

export const RoutingNumber = {
  create: (
    raw: string,
    field: string = "routing number"
  ): Validated<RoutingNumber, ShapeError | ChecksumError> => {
    const normalized = normalizeDigits(raw)
    const digitsOnly = DIGITS.test(normalized)
    const correctLength = normalized.length === ROUTING_LENGTH
    return Either.map(
      Validation.all<ShapeError | ChecksumError>([
        Validation.ensure(
          digitsOnly,
          () => shapeError("NonDigit", field, `${field} must contain only digits (spaces allowed)`)
        ),
        Validation.ensure(
          correctLength,
          () => shapeError("InvalidLength", field, `${field} must be exactly ${ROUTING_LENGTH} digits long`)
        ),
        digitsOnly && correctLength
          ? Validation.ensure(
            abaChecksum(normalized),
            () => checksumError("AbaRouting", field, `${field} failed ABA routing checksum`)
          )
          : Validation.unit
      ]),
      () => brand(normalized)
    )
  },

  value: (self: RoutingNumber): string => self
}

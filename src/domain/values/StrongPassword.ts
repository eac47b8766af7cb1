import { Brand, Either } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import {
  type CompositionError,
  type CompositionRule,
  type ShapeError,
  compositionError,
  shapeError
} from "../../shared/ValidationError.js"

// =============================================================================
// StrongPassword
// =============================================================================
//
// A password is taken as typed: no trimming. Leading or trailing spaces count
// as characters (and as symbols).
//
// The empty password is never accepted: a `minLength` below 1 counts as 1.
//
// Character classes use Unicode categories, so "É" is an uppercase letter
// and "٣" is a digit.
//

export type StrongPassword = string & Brand.Brand<"StrongPassword">

const brand = Brand.nominal<StrongPassword>()

export interface StrongPasswordOptions {
  readonly minLength?: number
  readonly requireUpper?: boolean
  readonly requireLower?: boolean
  readonly requireDigit?: boolean
  readonly requireSymbol?: boolean
}

const UPPERCASE = /\p{Lu}/u
const LOWERCASE = /\p{Ll}/u
const DIGIT = /\p{Nd}/u
// Anything that is neither a letter nor a digit
const SYMBOL = /[^\p{L}\p{Nd}]/u

export const StrongPassword = {
  create: (
    raw: string,
    field: string = "password",
    options: StrongPasswordOptions = {}
  ): Validated<StrongPassword, ShapeError | CompositionError> => {
    const {
      minLength: requestedMinLength = 12,
      requireDigit = true,
      requireLower = true,
      requireSymbol = true,
      requireUpper = true
    } = options
    const minLength = Math.max(requestedMinLength, 1)

    const requireClass = (
      required: boolean,
      pattern: RegExp,
      rule: CompositionRule,
      message: string
    ): Validated<void, CompositionError> =>
      required ? Validation.ensure(pattern.test(raw), () => compositionError(rule, field, message)) : Validation.unit

    return Either.map(
      Validation.all<ShapeError | CompositionError>([
        Validation.ensure(
          raw.length >= minLength,
          () => shapeError("BelowMinLength", field, `${field} must be at least ${minLength} characters long`)
        ),
        requireClass(
          requireUpper,
          UPPERCASE,
          "MissingUppercase",
          `${field} must contain at least one uppercase letter`
        ),
        requireClass(
          requireLower,
          LOWERCASE,
          "MissingLowercase",
          `${field} must contain at least one lowercase letter`
        ),
        requireClass(requireDigit, DIGIT, "MissingDigit", `${field} must contain at least one digit`),
        requireClass(requireSymbol, SYMBOL, "MissingSymbol", `${field} must contain at least one symbol`)
      ]),
      () => brand(raw)
    )
  },

  value: (self: StrongPassword): string => self
}

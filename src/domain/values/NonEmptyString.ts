import { Brand, Either } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import { type ShapeError, shapeError } from "../../shared/ValidationError.js"

// =============================================================================
// NonEmptyString
// =============================================================================
//
// EFFECT PERSPECTIVE:
// `Brand.Brand<"NonEmptyString">` tags the type at compile time only.
// At runtime it's still a plain string, so reading it back is free.
//
// The branding constructor (`brand`) is NOT exported. The only way to get a
// NonEmptyString from outside this module is `NonEmptyString.create`.
//
// Whitespace around the text is dropped before the length check, and the
// trimmed text is what gets stored.
//

export type NonEmptyString = string & Brand.Brand<"NonEmptyString">

const brand = Brand.nominal<NonEmptyString>()

export interface NonEmptyStringOptions {
  readonly minLength?: number
}

export const NonEmptyString = {
  create: (
    raw: string,
    field: string = "value",
    options: NonEmptyStringOptions = {}
  ): Validated<NonEmptyString, ShapeError> => {
    const { minLength = 1 } = options
    const trimmed = raw.trim()
    return Either.map(
      Validation.ensure(
        trimmed.length >= minLength,
        () => shapeError("BelowMinLength", field, `${field} must be at least ${minLength} characters long`)
      ),
      () => brand(trimmed)
    )
  },

  value: (self: NonEmptyString): string => self
}

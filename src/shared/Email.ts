// =============================================================================
// EmailAddress: Shared Value Object
// =============================================================================
//
// DDD PERSPECTIVE:
// A Value Object: defined purely by its value, no identity.
// Two EmailAddress("x@y.com") are interchangeable.
//
// VALIDATION:
// After trimming: non-blank and contains "@". "a@b" passes.
//
import { Brand, Either } from "effect"
import * as Validation from "./Validation.js"
import type { Validated } from "./Validation.js"
import { type ShapeError, shapeError } from "./ValidationError.js"

export type EmailAddress = string & Brand.Brand<"EmailAddress">

const brand = Brand.nominal<EmailAddress>()

// Companion object pattern: groups the smart constructor and the projection
export const EmailAddress = {
  create: (raw: string, field: string = "email"): Validated<EmailAddress, ShapeError> => {
    const trimmed = raw.trim()
    return Either.map(
      Validation.ensure(
        trimmed.length > 0 && trimmed.includes("@"),
        () => shapeError("InvalidEmail", field, `${field} must contain @ and not be blank`)
      ),
      () => brand(trimmed)
    )
  },

  value: (self: EmailAddress): string => self
}

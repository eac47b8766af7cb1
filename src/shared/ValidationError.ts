import { Array } from "effect"

// =============================================================================
// Validation Errors
// =============================================================================
//
// ERRORS AS VALUES:
// A failed rule is a plain tagged record, never a thrown exception.
// `_tag` says what KIND of rule failed, `rule` says WHICH one, `field` says
// where. `message` is ready to show to a user.
//
// The five kinds form a closed union. Matching on `_tag` with
// `Match.exhaustive` fails to compile when a kind is added.
//

// -----------------------------------------------------------------------------
// Rule names per kind
// -----------------------------------------------------------------------------

export type ShapeRule =
  | "NonDigit"
  | "BelowMinLength"
  | "ExceedsMaxLength"
  | "InvalidLength"
  | "InvalidEmail"
  | "NotADecimal"
  | "InvalidDate"
  | "InvalidYear"

export type RangeRule =
  | "NotPositive"
  | "Negative"
  | "MonthOutOfRange"

export type ChecksumRule =
  | "Mod10"
  | "AbaRouting"

export type TemporalRule =
  | "PastExpiry"
  | "NotAfterReference"

export type CompositionRule =
  | "MissingUppercase"
  | "MissingLowercase"
  | "MissingDigit"
  | "MissingSymbol"

// -----------------------------------------------------------------------------
// Error kinds
// -----------------------------------------------------------------------------

// Wrong primitive shape: empty, non-digit characters, wrong length, unparsable.
export type ShapeError = {
  readonly _tag: "ShapeError"
  readonly rule: ShapeRule
  readonly field: string
  readonly message: string
}

// Numeric value outside its required range.
export type RangeError = {
  readonly _tag: "RangeError"
  readonly rule: RangeRule
  readonly field: string
  readonly message: string
}

// Well-shaped value whose checksum does not hold.
export type ChecksumError = {
  readonly _tag: "ChecksumError"
  readonly rule: ChecksumRule
  readonly field: string
  readonly message: string
}

// Date or time that does not satisfy a temporal constraint.
export type TemporalError = {
  readonly _tag: "TemporalError"
  readonly rule: TemporalRule
  readonly field: string
  readonly message: string
}

// A type's own composition rule (e.g. password character classes).
export type CompositionError = {
  readonly _tag: "CompositionError"
  readonly rule: CompositionRule
  readonly field: string
  readonly message: string
}

export type ValidationError =
  | ShapeError
  | RangeError
  | ChecksumError
  | TemporalError
  | CompositionError

// Non-empty, in the order the rules were evaluated.
export type ValidationErrors = Array.NonEmptyReadonlyArray<ValidationError>

// -----------------------------------------------------------------------------
// Constructors
// -----------------------------------------------------------------------------

export const shapeError = (rule: ShapeRule, field: string, message: string): ShapeError => ({
  _tag: "ShapeError",
  rule,
  field,
  message
})

export const rangeError = (rule: RangeRule, field: string, message: string): RangeError => ({
  _tag: "RangeError",
  rule,
  field,
  message
})

export const checksumError = (rule: ChecksumRule, field: string, message: string): ChecksumError => ({
  _tag: "ChecksumError",
  rule,
  field,
  message
})

export const temporalError = (rule: TemporalRule, field: string, message: string): TemporalError => ({
  _tag: "TemporalError",
  rule,
  field,
  message
})

export const compositionError = (
  rule: CompositionRule,
  field: string,
  message: string
): CompositionError => ({
  _tag: "CompositionError",
  rule,
  field,
  message
})

// -----------------------------------------------------------------------------
// Rendering
// -----------------------------------------------------------------------------
//
// One bracketed block, one message per line:
//
//   [
//   card number failed MOD10 (Luhn) checksum,
//   CVV must contain only digits (spaces allowed)]
//
export const formatErrors = (errors: ReadonlyArray<ValidationError>): string =>
  `[\n${errors.map((error) => error.message).join(",\n")}]\n`

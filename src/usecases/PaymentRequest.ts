// =============================================================================
// Payment Requests: raw input shapes and use-case errors
// =============================================================================
//
// TWO LEVELS OF CHECKING:
//   1. Schema: is this even the right SHAPE? (amount is a number or string,
//      cardNumber is a string...). Failing here means the caller sent garbage
//      → MalformedRequest.
//   2. Smart constructors: are the VALUES acceptable? (Luhn, expiry...).
//      Failing here means the user typed something wrong → PaymentRejected,
//      with every problem listed.
//
// The schemas keep raw primitives. Turning "4532 0151..." into a
// ChecksumString is the smart constructors' job, not the decoder's.
//
import { Effect, ParseResult, Schema } from "effect"
import { formatErrors, type ValidationErrors } from "../shared/ValidationError.js"

// =============================================================================
// Request Schemas
// =============================================================================

// 99.99 or "99.99"
const Amount = Schema.Union(Schema.Number, Schema.String)

const cardFields = {
  cardNumber: Schema.String,
  expiryMonth: Schema.Number,
  expiryYear: Schema.Number,
  cvv: Schema.String
}

const checkFields = {
  routingNumber: Schema.String,
  accountNumber: Schema.String
}

// Card-only endpoint: no `method` discriminator needed
export const CardPaymentRequest = Schema.Struct({
  amount: Amount,
  ...cardFields
})
export type CardPaymentRequest = typeof CardPaymentRequest.Type

// Any method, discriminated by `method`
export const PaymentRequest = Schema.Union(
  Schema.Struct({ method: Schema.Literal("cash"), amount: Amount }),
  Schema.Struct({ method: Schema.Literal("card"), amount: Amount, ...cardFields }),
  Schema.Struct({ method: Schema.Literal("check"), amount: Amount, ...checkFields })
)
export type PaymentRequest = typeof PaymentRequest.Type

// =============================================================================
// Use-case Errors
// =============================================================================
//
// ERRORS AS VALUES:
// Plain tagged records in the Effect error channel. A host maps them to
// its own transport (e.g. 400 with `errors` listed field by field).
//

export type MalformedRequest = {
  readonly _tag: "MalformedRequest"
  readonly message: string
}

export type PaymentRejected = {
  readonly _tag: "PaymentRejected"
  readonly errors: ValidationErrors
  // All messages in one bracketed block (see formatErrors)
  readonly message: string
}

export type PaymentRequestError = MalformedRequest | PaymentRejected

export const paymentRejected = (errors: ValidationErrors): PaymentRejected => ({
  _tag: "PaymentRejected",
  errors,
  message: formatErrors(errors)
})

// =============================================================================
// Decoding
// =============================================================================

export const decodeRequest = <A, I>(
  schema: Schema.Schema<A, I>,
  input: unknown
): Effect.Effect<A, MalformedRequest> =>
  Schema.decodeUnknown(schema)(input).pipe(
    Effect.mapError((error): MalformedRequest => ({
      _tag: "MalformedRequest",
      message: ParseResult.TreeFormatter.formatErrorSync(error)
    }))
  )

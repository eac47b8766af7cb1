// =============================================================================
// OpenPayment Use Case
// =============================================================================
//
// ORCHESTRATION:
// Raw request in, PendingPayment out. No business rules live here: the
// smart constructors decide what's valid, this file only wires them together
// and reports.
//
// FLOW:
//   1. Decode the raw input (Schema)                → MalformedRequest
//   2. Validate amount AND method together          → PaymentRejected (all errors)
//   3. Build the PendingPayment
//
// "Now" for the card expiry check comes from Effect's Clock (DateTime.now),
// so tests run under TestClock.
//
// DEPENDENCIES (in Effect's R parameter):
//   - PaymentConfig: card number max length
//
import { Array, DateTime, Effect, Either, pipe } from "effect"
import { Cash, Check, CreditCard, PaymentMethod } from "../domain/payment/PaymentMethod.js"
import { PendingPayment } from "../domain/payment/State.js"
import { PositiveAmount } from "../domain/values/PositiveAmount.js"
import * as Validation from "../shared/Validation.js"
import type { Validated } from "../shared/Validation.js"
import { YearMonth } from "../shared/YearMonth.js"
import { PaymentConfig } from "../PaymentConfig.js"
import {
  decodeRequest,
  paymentRejected,
  PaymentRequest,
  type PaymentRequestError
} from "./PaymentRequest.js"

// =============================================================================
// Method validation
// =============================================================================

interface MethodContext {
  readonly now: YearMonth
  readonly cardNumberMaxLength: number
}

const validateMethod = (request: PaymentRequest, context: MethodContext): Validated<PaymentMethod> => {
  switch (request.method) {
    case "cash":
      return Validation.valid(Cash)
    case "card":
      return CreditCard.create(request.cardNumber, request.expiryMonth, request.expiryYear, request.cvv, {
        now: context.now,
        maxNumberLength: context.cardNumberMaxLength
      })
    case "check":
      return Check.create(request.routingNumber, request.accountNumber)
  }
}

// =============================================================================
// Use Case Implementation
// =============================================================================

// Already-decoded request → PendingPayment. Shared with ProcessCardPayment.
export const validatePayment = (
  request: PaymentRequest
): Effect.Effect<PendingPayment, PaymentRequestError, PaymentConfig> =>
  Effect.gen(function* () {
    const config = yield* PaymentConfig
    const now = YearMonth.fromDateTime(yield* DateTime.now)

    // Amount and method are independent: both are always checked
    const validated = pipe(
      Validation.Do,
      Validation.bind("amount", PositiveAmount.create(request.amount, "amount")),
      Validation.bind(
        "method",
        validateMethod(request, { now, cardNumberMaxLength: config.cardNumberMaxLength })
      ),
      Either.map(({ amount, method }) => PendingPayment.make(amount, method))
    )

    if (Either.isLeft(validated)) {
      const errors = validated.left
      yield* Effect.logWarning("Payment rejected").pipe(
        Effect.annotateLogs({
          errorCount: errors.length,
          fields: Array.dedupe(Array.map(errors, (error) => error.field)).join(",")
        })
      )
      return yield* Effect.fail(paymentRejected(errors))
    }

    const pending = validated.right
    yield* Effect.logInfo("Payment opened").pipe(
      Effect.annotateLogs({
        method: PaymentMethod.summary(pending.method).type,
        amount: PositiveAmount.format(pending.amount)
      })
    )
    return pending
  })

export const openPayment = (
  input: unknown
): Effect.Effect<PendingPayment, PaymentRequestError, PaymentConfig> =>
  Effect.gen(function* () {
    yield* Effect.logDebug("Opening payment")
    const request = yield* decodeRequest(PaymentRequest, input)
    return yield* validatePayment(request)
  }).pipe(Effect.withLogSpan("openPayment"))

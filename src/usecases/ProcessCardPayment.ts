// =============================================================================
// ProcessCardPayment Use Case
// =============================================================================
//
// FLOW:
//   1. Decode a CardPaymentRequest                 → MalformedRequest
//   2. Validate amount + card (see OpenPayment)    → PaymentRejected
//   3. PendingPayment ──transitionToPaid──▶ PaidPayment, stamped with Clock time
//
// Step 3 cannot fail: `transitionToPaid` only accepts a PendingPayment, and
// step 2 only produces one.
//
import { DateTime, Effect } from "effect"
import { PaymentMethod } from "../domain/payment/PaymentMethod.js"
import { type PaidPayment, paymentStatus } from "../domain/payment/State.js"
import { transitionToPaid } from "../domain/payment/transitions.js"
import type { PaymentConfig } from "../PaymentConfig.js"
import { validatePayment } from "./OpenPayment.js"
import { CardPaymentRequest, decodeRequest, type PaymentRequestError } from "./PaymentRequest.js"

export const processCardPayment = (
  input: unknown
): Effect.Effect<PaidPayment, PaymentRequestError, PaymentConfig> =>
  Effect.gen(function* () {
    yield* Effect.logDebug("Processing card payment")
    const request = yield* decodeRequest(CardPaymentRequest, input)
    const pending = yield* validatePayment({ method: "card", ...request })

    const paid = transitionToPaid(pending, yield* DateTime.now)

    yield* Effect.logInfo("Payment captured").pipe(
      Effect.annotateLogs({
        status: paymentStatus(paid),
        last4: PaymentMethod.summary(paid.method).last4,
        paidAt: DateTime.formatIso(paid.paidAt)
      })
    )
    return paid
  }).pipe(Effect.withLogSpan("processCardPayment"))

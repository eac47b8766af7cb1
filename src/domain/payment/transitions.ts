import { DateTime } from "effect"
import type { PaidPayment, PendingPayment, RefundedPayment, VoidPayment } from "./State.js"

// =============================================================================
// Transitions
// =============================================================================
//
// Each transition accepts exactly the state(s) it is legal from:
//
//   PendingPayment ──transitionToPaid──▶ PaidPayment ──transitionToRefund──▶ RefundedPayment
//        │
//        └──────────transitionToVoid──▶ VoidPayment
//
// There is no `transition(payment: Payment)`. Passing a VoidPayment to
// `transitionToPaid` is a compile error, not a runtime check, so the bodies
// below have no branches and cannot fail: copy amount and method, add one
// timestamp.
//
// The timestamp defaults to "now". Effect code should pass `yield* DateTime.now`
// so the clock stays a service.
//

export const transitionToPaid = (
  payment: PendingPayment,
  paidAt: DateTime.Utc = DateTime.unsafeNow()
): PaidPayment => ({
  _tag: "PaidPayment",
  amount: payment.amount,
  method: payment.method,
  paidAt
})

// Void cancels a payment that was never captured
export const transitionToVoid = (
  payment: PendingPayment,
  voidedAt: DateTime.Utc = DateTime.unsafeNow()
): VoidPayment => ({
  _tag: "VoidPayment",
  amount: payment.amount,
  method: payment.method,
  voidedAt
})

// Refund gives back money that was captured
export const transitionToRefund = (
  payment: PaidPayment,
  refundedAt: DateTime.Utc = DateTime.unsafeNow()
): RefundedPayment => ({
  _tag: "RefundedPayment",
  amount: payment.amount,
  method: payment.method,
  refundedAt
})

import { type DateTime, Match } from "effect"
import type { PositiveAmount } from "../values/PositiveAmount.js"
import type { PaymentMethod } from "./PaymentMethod.js"

// =============================================================================
// Payment State
// =============================================================================
//
// FP DESIGN PRINCIPLE (Wlaschin): "Make illegal states unrepresentable"
//
// The naive model is ONE record with optional timestamps:
//
//   { amount, method, status, paidAt?, voidedAt?, refundedAt? }
//
// which happily represents "PAID with a voidedAt" or "PENDING with a paidAt".
// Every reader then has to re-check which combination it got.
//
// Here each state is its own type and carries only its own fields:
//
//   PendingPayment   { amount, method }
//   PaidPayment      { amount, method, paidAt }
//   VoidPayment      { amount, method, voidedAt }
//   RefundedPayment  { amount, method, refundedAt }
//
// No type has two lifecycle timestamps, so "paid AND voided" can't be written
// down at all.
//
// All states share `amount` and `method`, which are already validated values:
// a payment can't hold a negative amount or an unchecked card number.
//

export type PendingPayment = {
  readonly _tag: "PendingPayment"
  readonly amount: PositiveAmount
  readonly method: PaymentMethod
}

export type PaidPayment = {
  readonly _tag: "PaidPayment"
  readonly amount: PositiveAmount
  readonly method: PaymentMethod
  readonly paidAt: DateTime.Utc
}

export type VoidPayment = {
  readonly _tag: "VoidPayment"
  readonly amount: PositiveAmount
  readonly method: PaymentMethod
  readonly voidedAt: DateTime.Utc
}

export type RefundedPayment = {
  readonly _tag: "RefundedPayment"
  readonly amount: PositiveAmount
  readonly method: PaymentMethod
  readonly refundedAt: DateTime.Utc
}

export type Payment = PendingPayment | PaidPayment | VoidPayment | RefundedPayment

// Every payment starts here
export const PendingPayment = {
  make: (amount: PositiveAmount, method: PaymentMethod): PendingPayment => ({
    _tag: "PendingPayment",
    amount,
    method
  })
}

// -----------------------------------------------------------------------------
// Status projection
// -----------------------------------------------------------------------------

export type PaymentStatus = "PENDING" | "PAID" | "VOID" | "REFUNDED"

export const paymentStatus = (payment: Payment): PaymentStatus =>
  Match.value(payment).pipe(
    Match.tag("PendingPayment", (): PaymentStatus => "PENDING"),
    Match.tag("PaidPayment", (): PaymentStatus => "PAID"),
    Match.tag("VoidPayment", (): PaymentStatus => "VOID"),
    Match.tag("RefundedPayment", (): PaymentStatus => "REFUNDED"),
    Match.exhaustive
  )

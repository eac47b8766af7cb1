import { Either, Match, pipe } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import type { YearMonth } from "../../shared/YearMonth.js"
import { ChecksumString } from "../values/ChecksumString.js"
import { DigitString } from "../values/DigitString.js"
import { ExpiryDate } from "../values/ExpiryDate.js"
import { RoutingNumber } from "../values/RoutingNumber.js"

// =============================================================================
// Payment Methods
// =============================================================================
//
// FP DESIGN PRINCIPLE (Wlaschin): "Make illegal states unrepresentable"
//
// A CreditCard can only be built from an already-validated ChecksumString,
// ExpiryDate and DigitString. There is no "card with an unchecked number".
//
// The union is closed. `Match.exhaustive` in `summary` stops compiling
// the moment a fourth method is added without a branch for it.
//

export type Cash = {
  readonly _tag: "Cash"
}

export type CreditCard = {
  readonly _tag: "CreditCard"
  readonly number: ChecksumString
  readonly expiry: ExpiryDate
  readonly cvv: DigitString
}

export type Check = {
  readonly _tag: "Check"
  readonly routingNumber: RoutingNumber
  readonly accountNumber: DigitString
}

export type PaymentMethod = Cash | CreditCard | Check

// -----------------------------------------------------------------------------
// Cash
// -----------------------------------------------------------------------------
// Nothing to validate.
//
export const Cash: Cash = { _tag: "Cash" }

// -----------------------------------------------------------------------------
// CreditCard
// -----------------------------------------------------------------------------
//
// All three fields are validated, every time. A card with a bad checksum,
// a month of 13 and a CVV of "12a" reports three errors, in field order.
//

export const DEFAULT_CARD_NUMBER_MAX_LENGTH = 19

export interface CreditCardOptions {
  // Reference month for the expiry check (defaults to the current month)
  readonly now?: YearMonth
  readonly maxNumberLength?: number
}

export const CreditCard = {
  create: (
    number: string,
    expiryMonth: number,
    expiryYear: number,
    cvv: string,
    options: CreditCardOptions = {}
  ): Validated<CreditCard> =>
    pipe(
      Validation.Do,
      Validation.bind(
        "number",
        ChecksumString.create(number, "card number", {
          maxLength: options.maxNumberLength ?? DEFAULT_CARD_NUMBER_MAX_LENGTH
        })
      ),
      Validation.bind("expiry", ExpiryDate.create(expiryMonth, expiryYear, "expiry date", { now: options.now })),
      Validation.bind("cvv", DigitString.create(cvv, "CVV", { minLength: 3, maxLength: 4 })),
      Either.map(({ cvv, expiry, number }): CreditCard => ({ _tag: "CreditCard", number, expiry, cvv }))
    )
}

// -----------------------------------------------------------------------------
// Check
// -----------------------------------------------------------------------------

export const Check = {
  create: (routingNumber: string, accountNumber: string): Validated<Check> =>
    pipe(
      Validation.Do,
      Validation.bind("routingNumber", RoutingNumber.create(routingNumber, "routing number")),
      Validation.bind("accountNumber", DigitString.create(accountNumber, "account number")),
      Either.map(({ accountNumber, routingNumber }): Check => ({ _tag: "Check", routingNumber, accountNumber }))
    )
}

// =============================================================================
// Projections
// =============================================================================
//
// What a response may show about a method. Never the full number.
//

export type PaymentMethodType = "CASH" | "CREDIT_CARD" | "CHECK"

export interface PaymentMethodSummary {
  readonly type: PaymentMethodType
  readonly last4?: string
}

export const PaymentMethod = {
  summary: (method: PaymentMethod): PaymentMethodSummary =>
    Match.value(method).pipe(
      Match.tag("Cash", (): PaymentMethodSummary => ({ type: "CASH" })),
      Match.tag("CreditCard", (card): PaymentMethodSummary => ({
        type: "CREDIT_CARD",
        last4: card.number.slice(-4)
      })),
      Match.tag("Check", (check): PaymentMethodSummary => ({
        type: "CHECK",
        last4: check.accountNumber.slice(-4)
      })),
      Match.exhaustive
    )
}

import { DateTime } from "effect"

// =============================================================================
// YearMonth: calendar month without a day
// =============================================================================
//
// Card expiry dates live at month precision: a card valid "until 08/2024"
// is still good on 2024-08-31. Comparing full dates would get that wrong.
//
// `month` is 1-based (1 = January).
//

export type YearMonth = {
  readonly year: number
  readonly month: number
}

const ordinal = (self: YearMonth): number => self.year * 12 + (self.month - 1)

const fromDateTime = (dateTime: DateTime.DateTime): YearMonth => {
  const date = DateTime.toDateUtc(dateTime)
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1 }
}

export const YearMonth = {
  make: (year: number, month: number): YearMonth => ({ year, month }),

  fromDateTime,

  // Reads the system clock. Inside an Effect, prefer
  // `DateTime.now.pipe(Effect.map(YearMonth.fromDateTime))` so TestClock applies.
  now: (): YearMonth => fromDateTime(DateTime.unsafeNow()),

  isBefore: (self: YearMonth, that: YearMonth): boolean => ordinal(self) < ordinal(that),

  // "2024-08"
  format: (self: YearMonth): string =>
    `${String(self.year).padStart(4, "0")}-${String(self.month).padStart(2, "0")}`
}

import { Brand, Either } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import {
  type RangeError,
  type ShapeError,
  type TemporalError,
  rangeError,
  shapeError,
  temporalError
} from "../../shared/ValidationError.js"
import { YearMonth } from "../../shared/YearMonth.js"

// =============================================================================
// ExpiryDate: card expiry month, not in the past
// =============================================================================
//
// RULES:
//   1. InvalidYear (shape):         year must be a whole number
//   2. MonthOutOfRange (range):     month must be a whole number in 1..12
//   3. PastExpiry (temporal):       year-month must not be before `now`
//
// Rule 3 still runs when the month is out of range: it compares January of
// the given year instead. `(13, 2020)` therefore reports BOTH the bad month
// and the past date. It's skipped only when the year itself is unusable.
//
// `now` defaults to the current system month; pass it explicitly for
// deterministic results.
//

export type ExpiryDate = YearMonth & Brand.Brand<"ExpiryDate">

const brand = Brand.nominal<ExpiryDate>()

export interface ExpiryDateOptions {
  readonly now?: YearMonth
}

const create = (
  month: number,
  year: number,
  field: string = "expiry date",
  options: ExpiryDateOptions = {}
): Validated<ExpiryDate, ShapeError | RangeError | TemporalError> => {
  const { now = YearMonth.now() } = options
  const yearValid = Number.isSafeInteger(year)
  const monthValid = Number.isInteger(month) && month >= 1 && month <= 12
  const comparable = YearMonth.make(year, monthValid ? month : 1)

  return Either.map(
    Validation.all<ShapeError | RangeError | TemporalError>([
      Validation.ensure(
        yearValid,
        () => shapeError("InvalidYear", field, `${field} year must be a whole number (was ${year})`)
      ),
      Validation.ensure(
        monthValid,
        () => rangeError("MonthOutOfRange", field, `${field} month must be between 1 and 12 (was ${month})`)
      ),
      yearValid
        ? Validation.ensure(
          !YearMonth.isBefore(comparable, now),
          () => temporalError("PastExpiry", field, `${field} must not be in the past (now is ${YearMonth.format(now)})`)
        )
        : Validation.unit
    ]),
    () => brand(YearMonth.make(year, month))
  )
}

export const ExpiryDate = {
  create,

  fromYearMonth: (
    yearMonth: YearMonth,
    field: string = "expiry date",
    options: ExpiryDateOptions = {}
  ): Validated<ExpiryDate, ShapeError | RangeError | TemporalError> =>
    create(yearMonth.month, yearMonth.year, field, options),

  value: (self: ExpiryDate): YearMonth => YearMonth.make(self.year, self.month)
}

import { Brand, DateTime, Either, Option } from "effect"
import * as Validation from "../../shared/Validation.js"
import type { Validated } from "../../shared/Validation.js"
import { type ShapeError, type TemporalError, shapeError, temporalError } from "../../shared/ValidationError.js"

// =============================================================================
// FutureDate: a calendar day strictly after a reference day
// =============================================================================
//
// Day precision, in UTC. Both the input and the reference are truncated to
// the start of their day before comparing, so "later today" is NOT in the
// future, "tomorrow 00:00" is.
//
// Input is anything `DateTime.make` accepts (Date, epoch millis, ISO string,
// DateTime). Unparsable input is a ShapeError, never an exception.
//

export type FutureDate = DateTime.Utc & Brand.Brand<"FutureDate">

const brand = Brand.nominal<FutureDate>()

export interface FutureDateOptions {
  readonly after?: DateTime.DateTime
}

const startOfDay = (dateTime: DateTime.DateTime): DateTime.Utc =>
  DateTime.startOf(DateTime.toUtc(dateTime), "day")

export const FutureDate = {
  create: (
    input: DateTime.DateTime.Input,
    field: string = "date",
    options: FutureDateOptions = {}
  ): Validated<FutureDate, ShapeError | TemporalError> => {
    const reference = startOfDay(options.after ?? DateTime.unsafeNow())
    return Option.match(DateTime.make(input), {
      onNone: () => Validation.invalid(shapeError("InvalidDate", field, `${field} must be a valid date`)),
      onSome: (dateTime) => {
        const day = startOfDay(dateTime)
        return Either.map(
          Validation.ensure(
            DateTime.greaterThan(day, reference),
            () =>
              temporalError(
                "NotAfterReference",
                field,
                `${field} must be after ${DateTime.formatIsoDateUtc(reference)}`
              )
          ),
          () => brand(day)
        )
      }
    })
  },

  value: (self: FutureDate): DateTime.Utc => self
}

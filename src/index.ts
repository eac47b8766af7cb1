// Shared
export * from "./shared/ValidationError.js"
export * as Validation from "./shared/Validation.js"
export type { Validated } from "./shared/Validation.js"
export * from "./shared/YearMonth.js"
export * from "./shared/Email.js"

// Value objects
export * from "./domain/values/NonEmptyString.js"
export * from "./domain/values/Numbers.js"
export * from "./domain/values/PositiveAmount.js"
export * from "./domain/values/DigitString.js"
export * from "./domain/values/ChecksumString.js"
export * from "./domain/values/RoutingNumber.js"
export * from "./domain/values/ExpiryDate.js"
export * from "./domain/values/FutureDate.js"
export * from "./domain/values/StrongPassword.js"

// Payments
export * from "./domain/payment/PaymentMethod.js"
export * from "./domain/payment/State.js"
export * from "./domain/payment/transitions.js"

// Use cases
export * from "./usecases/PaymentRequest.js"
export * from "./usecases/OpenPayment.js"
export * from "./usecases/ProcessCardPayment.js"

// Wiring
export * from "./PaymentConfig.js"
export * from "./AppLayer.js"

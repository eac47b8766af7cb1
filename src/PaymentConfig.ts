// =============================================================================
// PaymentConfig: Service for Validation Settings
// =============================================================================
//
// Settings that vary per deployment, read through Effect's `Config` module.
// Use cases never read the environment themselves: they ask for the
// PaymentConfig service, tests hand them a fixed one.
//
// ENVIRONMENT:
//   PAYMENTS_CARD_NUMBER_MAX_LENGTH   integer in 12..19, default 19
//
import { Config, Context, Layer } from "effect"
import { DEFAULT_CARD_NUMBER_MAX_LENGTH } from "./domain/payment/PaymentMethod.js"

// =============================================================================
// PaymentConfig Service Interface
// =============================================================================

export interface PaymentConfigService {
  /**
   * Longest card number accepted, in digits (spaces excluded).
   */
  readonly cardNumberMaxLength: number
}

// =============================================================================
// PaymentConfig Tag
// =============================================================================

export class PaymentConfig extends Context.Tag("PaymentConfig")<
  PaymentConfig,
  PaymentConfigService
>() {}

// =============================================================================
// Production Implementation: environment
// =============================================================================

export const paymentConfig: Config.Config<PaymentConfigService> = Config.all({
  cardNumberMaxLength: Config.integer("PAYMENTS_CARD_NUMBER_MAX_LENGTH").pipe(
    Config.withDefault(DEFAULT_CARD_NUMBER_MAX_LENGTH),
    Config.validate({
      message: "PAYMENTS_CARD_NUMBER_MAX_LENGTH must be between 12 and 19",
      validation: (length: number) => length >= 12 && length <= 19
    })
  )
})

// Fails with a ConfigError when a variable is present but invalid
export const PaymentConfigLive = Layer.effect(PaymentConfig, paymentConfig)

// =============================================================================
// Test Implementation: defaults
// =============================================================================

export const DefaultPaymentConfig: PaymentConfigService = {
  cardNumberMaxLength: DEFAULT_CARD_NUMBER_MAX_LENGTH
}

export const TestPaymentConfigLive = Layer.succeed(PaymentConfig, DefaultPaymentConfig)

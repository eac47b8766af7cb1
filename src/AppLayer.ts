// =============================================================================
// AppLayer: Layer Composition
// =============================================================================
//
// EFFECT PATTERN:
// Everything the use cases need, as one Layer. A host (HTTP server, CLI,
// queue consumer) provides `AppLive` once at its edge:
//
//   processCardPayment(body).pipe(Effect.provide(AppLive), Effect.runPromise)
//
// ENVIRONMENT:
//   LOG_LEVEL   All | Fatal | Error | Warning | Info | Debug | Trace | None (default Info)
//   + everything PaymentConfig reads
//
import { Config, Effect, Layer, Logger, LogLevel } from "effect"
import { PaymentConfigLive } from "./PaymentConfig.js"

// =============================================================================
// Logging
// =============================================================================
//
// logfmt lines on stdout, one per event:
//
//   timestamp=... level=INFO fiber=#1 message="Payment opened" method=CREDIT_CARD amount=99.99
//
export const LoggerLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const level = yield* Config.logLevel("LOG_LEVEL").pipe(Config.withDefault(LogLevel.Info))
    return Layer.merge(Logger.logFmt, Logger.minimumLogLevel(level))
  })
)

// =============================================================================
// Application
// =============================================================================

export const AppLive = Layer.merge(PaymentConfigLive, LoggerLive)

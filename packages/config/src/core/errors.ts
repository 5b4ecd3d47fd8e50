import { BaseError, type ErrorContext } from "@sigil/errors"
import { blockingErrors, type ValidationError } from "./validate"

export type ConfigurationErrorCode =
  | "invalid_configuration"
  | "unreadable_source"
  | "configuration_invalid"

export class ConfigurationError<
  C extends ConfigurationErrorCode = ConfigurationErrorCode,
> extends BaseError<C> {
  constructor(
    message: string,
    options: { code: C; context?: ErrorContext; cause?: unknown },
  ) {
    super(message, { ...options, isOperational: true })
  }
}

/**
 * Every validation failure of one configuration, raised together.
 */
export class ConfigurationValidationError extends ConfigurationError<"configuration_invalid"> {
  readonly errors: readonly ValidationError[]

  constructor(errors: readonly ValidationError[]) {
    super(
      `Configuration is invalid:\n${errors.map((e) => `  - ${e.field}: ${e.message}`).join("\n")}`,
      {
        code: "configuration_invalid",
        context: { fields: errors.map((e) => e.field), codes: errors.map((e) => e.code) },
      },
    )
    this.errors = Object.freeze([...errors])
  }
}

/**
 * Throws a {@link ConfigurationValidationError} carrying the error-severity
 * violations, if there are any. Warnings and infos pass.
 */
export function assertValid(violations: readonly ValidationError[]): void {
  const errors = blockingErrors(violations)

  if (errors.length > 0) {
    throw new ConfigurationValidationError(errors)
  }
}

import { BaseError } from "@modeldeck/errors"

export type CliErrorCode = "invalid_argument" | "invalid_settings"

export class CliError extends BaseError<CliErrorCode> {
  static invalidParam(pair: string): CliError {
    return new CliError(`Invalid parameter '${pair}'. Expected key=value.`, {
      code: "invalid_argument",
      context: { pair },
    })
  }

  static invalidSettings(detail: string, cause?: unknown): CliError {
    return new CliError(`Invalid environment settings:\n${detail}`, {
      code: "invalid_settings",
      cause,
    })
  }
}

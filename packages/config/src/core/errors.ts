import { BaseError } from "@modeldeck/errors"

export type ConfigErrorCode =
  | "parse_error"
  | "io_error"
  | "already_exists"
  | "not_found"
  | "unsupported_operation"
  | "unknown_source"

export type ProfileOperation = "load" | "save" | "add" | "edit" | "delete" | "set_default"

export class ConfigError extends BaseError<ConfigErrorCode> {
  static parse(path: string, detail: string, cause?: unknown): ConfigError {
    return new ConfigError(`Invalid configuration file ${path}:\n${detail}`, {
      code: "parse_error",
      context: { path },
      cause,
    })
  }

  static io(operation: "load" | "save", path: string, cause: unknown): ConfigError {
    const verb = operation === "load" ? "read" : "write"

    return new ConfigError(`Could not ${verb} configuration file ${path}`, {
      code: "io_error",
      context: { path, operation },
      cause,
    })
  }

  static alreadyExists(profile: string): ConfigError {
    return new ConfigError(`Profile '${profile}' already exists.`, {
      code: "already_exists",
      context: { profile },
    })
  }

  static notFound(profile: string): ConfigError {
    return new ConfigError(`Profile '${profile}' not found.`, {
      code: "not_found",
      context: { profile },
    })
  }

  static unsupported(operation: ProfileOperation, source: string): ConfigError {
    return new ConfigError("This config source is read-only.", {
      code: "unsupported_operation",
      context: { operation, source },
    })
  }

  static unknownSource(kind: string): ConfigError {
    return new ConfigError(`Unknown config source: ${kind}`, {
      code: "unknown_source",
      context: { source: kind },
    })
  }
}

export function isConfigError(err: unknown, code?: ConfigErrorCode): err is ConfigError {
  return err instanceof ConfigError && (code === undefined || err.code === code)
}

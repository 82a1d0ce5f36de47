import type { ProfileParams } from "@modeldeck/config"
import { parseDocument } from "yaml"
import { CliError } from "../errors"

/**
 * Turns repeated `--param key=value` flags into a params mapping. Values are
 * read as YAML scalars, so `0.2` is a number and `true` a boolean; anything
 * that does not parse stays a string.
 */
export function parseParamPairs(pairs: readonly string[]): ProfileParams {
  const params: ProfileParams = {}

  for (const pair of pairs) {
    const separator = pair.indexOf("=")
    const key = separator > 0 ? pair.slice(0, separator).trim() : ""

    if (!key) throw CliError.invalidParam(pair)

    params[key] = parseScalar(pair.slice(separator + 1))
  }

  return params
}

function parseScalar(raw: string): unknown {
  if (raw.trim() === "") return ""

  const doc = parseDocument(raw)
  if (doc.errors.length > 0) return raw

  const value: unknown = doc.toJS()
  return value ?? raw
}

import type { DeveloperInfo } from "./model/types"
import { type FieldPath, type FieldValue, isSecretField } from "./model/field-paths"

export const MASK = "********"

export function maskSecret(value: string): string {
  return value === "" ? "" : MASK
}

/**
 * Renders a field value for people to read. Secret fields are masked.
 */
export function formatFieldValue(path: FieldPath, value: FieldValue): string {
  if (typeof value === "string") {
    return isSecretField(path) ? maskSecret(value) : value
  }

  if (typeof value === "boolean") return String(value)

  const entries: readonly (string | DeveloperInfo)[] = value

  return entries
    .map((entry) => {
      if (typeof entry === "string") return entry
      return entry.email ? `${entry.name} <${entry.email}>` : entry.name || entry.id
    })
    .join(", ")
}

import type { DeveloperInfo } from "./types"

export function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === ""
}

/** Sorted, de-duplicated copy with blank entries dropped. */
export function normalizeSet(values: readonly string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v !== ""))].sort()
}

/**
 * Builds a developer entry, filling missing fields with `""`.
 */
export function developer(input: Partial<DeveloperInfo>): DeveloperInfo {
  return {
    id: input.id ?? "",
    name: input.name ?? "",
    email: input.email ?? "",
    organization: input.organization ?? "",
    organizationUrl: input.organizationUrl ?? "",
  }
}

export function isEmptyDeveloper(dev: Partial<DeveloperInfo>): boolean {
  return (
    isBlank(dev.id) &&
    isBlank(dev.name) &&
    isBlank(dev.email) &&
    isBlank(dev.organization) &&
    isBlank(dev.organizationUrl)
  )
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value)

    for (const child of Object.values(value)) {
      deepFreeze(child)
    }
  }

  return value
}

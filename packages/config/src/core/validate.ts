import { z } from "zod"
import type { PublisherConfig } from "./model/types"
import { isBlank } from "./model/values"

export type ValidationErrorCode =
  | "missing_username"
  | "missing_password"
  | "missing_project_name"
  | "missing_description"
  | "missing_license"
  | "missing_scm_url"
  | "missing_developers"
  | "invalid_url"
  | "invalid_email"
  | "short_username"
  | "weak_password"

/**
 * - "error": blocks publishing
 * - "warning": publishing may fail or surprise; allowed
 * - "info": suggestion only
 */
export type ValidationSeverity = "error" | "warning" | "info"

export type ValidationError = Readonly<{
  /** Field path, with an index for list entries (`projectInfo.developers[0].email`). */
  field: string
  message: string
  code: ValidationErrorCode
  severity: ValidationSeverity
}>

export type ValidateOptions = {
  /**
   * Require repository credentials, e.g. before an upload.
   * @default config.validation.requireCredentials
   */
  requireCredentials?: boolean | undefined

  /**
   * Also require the metadata a public repository expects.
   * @default config.validation.strictMode
   */
  strict?: boolean | undefined
}

const httpUrl = z.url({ protocol: /^https?$/ })
const email = z.email()

function checkUrl(errors: ValidationError[], field: string, label: string, value: string) {
  if (isBlank(value)) return

  if (!httpUrl.safeParse(value).success) {
    errors.push({
      field,
      code: "invalid_url",
      severity: "error",
      message: `${label} must be an http(s) URL, got "${value}"`,
    })
  }
}

function checkRequired(
  errors: ValidationError[],
  field: string,
  code: ValidationErrorCode,
  message: string,
  value: string,
) {
  if (isBlank(value)) {
    errors.push({ field, code, message, severity: "error" })
  }
}

const MIN_USERNAME_LENGTH = 3
const MIN_PASSWORD_LENGTH = 8

/** Warnings only. The values never appear in a message. */
function checkCredentialStrength(
  errors: ValidationError[],
  { username, password }: PublisherConfig["credentials"],
) {
  if (!isBlank(username) && username.trim().length < MIN_USERNAME_LENGTH) {
    errors.push({
      field: "credentials.username",
      code: "short_username",
      severity: "warning",
      message: "Username is very short and may be invalid",
    })
  }

  if (!isBlank(password) && (password === "password" || password.length < MIN_PASSWORD_LENGTH)) {
    errors.push({
      field: "credentials.password",
      code: "weak_password",
      severity: "warning",
      message: "Password appears to be weak",
    })
  }
}

/** Violations that block publishing. */
export function blockingErrors(errors: readonly ValidationError[]): ValidationError[] {
  return errors.filter((e) => e.severity === "error")
}

/**
 * Checks a resolved configuration. Never throws; callers decide what to do
 * with each severity (`assertValid` fails on errors only). Credential
 * strength warnings apply whenever a credential is set.
 */
export function validateConfig(
  config: PublisherConfig,
  options: ValidateOptions = {},
): ValidationError[] {
  const errors: ValidationError[] = []
  const { credentials, projectInfo } = config

  const requireCredentials =
    options.requireCredentials ?? config.validation.requireCredentials
  const strict = options.strict ?? config.validation.strictMode

  if (requireCredentials) {
    checkRequired(
      errors,
      "credentials.username",
      "missing_username",
      "Repository username is required",
      credentials.username,
    )
    checkRequired(
      errors,
      "credentials.password",
      "missing_password",
      "Repository password is required",
      credentials.password,
    )
  }

  checkCredentialStrength(errors, credentials)

  checkRequired(
    errors,
    "projectInfo.name",
    "missing_project_name",
    "Project name is required",
    projectInfo.name,
  )

  checkUrl(errors, "projectInfo.url", "Project URL", projectInfo.url)
  checkUrl(errors, "projectInfo.scm.url", "SCM URL", projectInfo.scm.url)
  checkUrl(errors, "projectInfo.license.url", "License URL", projectInfo.license.url)

  if (!strict) return errors

  checkRequired(
    errors,
    "projectInfo.description",
    "missing_description",
    "Project description is required",
    projectInfo.description,
  )
  checkRequired(
    errors,
    "projectInfo.license.name",
    "missing_license",
    "License name is required",
    projectInfo.license.name,
  )
  checkRequired(
    errors,
    "projectInfo.scm.url",
    "missing_scm_url",
    "SCM URL is required",
    projectInfo.scm.url,
  )

  if (projectInfo.developers.length === 0) {
    errors.push({
      field: "projectInfo.developers",
      code: "missing_developers",
      severity: "error",
      message: "At least one developer is required",
    })
  }

  projectInfo.developers.forEach((dev, index) => {
    if (!isBlank(dev.email) && !email.safeParse(dev.email).success) {
      errors.push({
        field: `projectInfo.developers[${index}].email`,
        code: "invalid_email",
        severity: "error",
        message: `Developer email is not valid: "${dev.email}"`,
      })
    }
  })

  return errors
}

import os from "node:os"
import path from "node:path"
import type { PartialConfig } from "../../core/model/types"
import { isBlank } from "../../core/model/values"
import type { SmartDefaultProvider } from "../../ports/defaults-provider"
import type { ProjectContext } from "../../ports/detector"

export const APACHE_LICENSE = {
  name: "Apache License 2.0",
  url: "https://www.apache.org/licenses/LICENSE-2.0.txt",
  distribution: "repo",
} as const

export type GenericProjectProviderOptions = {
  /** @default os.homedir() */
  homeDir?: string
}

/**
 * Conservative fallbacks for any project: a name derived from the project,
 * the Apache 2.0 licence, the default GnuPG keyring and safe publishing
 * switches. Never supplies credentials.
 */
export class GenericProjectDefaultProvider implements SmartDefaultProvider {
  readonly name = "GenericProjectDefaults"
  readonly priority = 10
  private readonly homeDir: string

  constructor(options: GenericProjectProviderOptions = {}) {
    this.homeDir = options.homeDir ?? os.homedir()
  }

  canProvideDefaults(_project: ProjectContext): boolean {
    return true
  }

  provideDefaults(project: ProjectContext, _existing: PartialConfig): PartialConfig {
    const name = inferProjectName(project)

    return {
      projectInfo: {
        ...(name !== "" && { name }),
        license: { ...APACHE_LICENSE },
      },
      signing: {
        secretKeyRingFile: path.join(this.homeDir, ".gnupg", "secring.gpg"),
      },
      publishing: {
        autoPublish: false,
        aggregation: true,
        dryRun: false,
      },
    }
  }
}

/**
 * `root-sub` for a sub-project, otherwise the project name, then the root
 * project name, then the directory name.
 */
export function inferProjectName(project: ProjectContext): string {
  const name = project.name.trim()
  const rootName = project.rootName?.trim() ?? ""

  if (!isBlank(rootName) && !isBlank(name) && rootName !== name) {
    return `${rootName}-${name}`
  }

  if (!isBlank(name)) return name
  if (!isBlank(rootName)) return rootName

  return path.basename(project.directory)
}

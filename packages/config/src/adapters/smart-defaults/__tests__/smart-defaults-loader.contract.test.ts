import { describeSourceLoaderContract } from "../../../ports/__tests__/loader.contract"
import { GenericProjectDefaultProvider } from "../generic-project-provider"
import { SmartDefaultsLoader } from "../smart-defaults-loader"

describeSourceLoaderContract({
  name: "SmartDefaultsLoader",
  source: "SMART_DEFAULTS",
  make: async (cwd) => {
    const loader = new SmartDefaultsLoader([
      new GenericProjectDefaultProvider({ homeDir: "/home/dev" }),
    ])
    return () => loader.load({ project: { name: "widgets", directory: cwd }, current: {} })
  },
  makeEmpty: async (cwd) => {
    const loader = new SmartDefaultsLoader([])
    return () => loader.load({ project: { name: "widgets", directory: cwd }, current: {} })
  },
  expectedValues: () => ({
    "projectInfo.name": "widgets",
    "projectInfo.license.name": "Apache License 2.0",
    "projectInfo.license.url": "https://www.apache.org/licenses/LICENSE-2.0.txt",
    "projectInfo.license.distribution": "repo",
    "signing.secretKeyRingFile": "/home/dev/.gnupg/secring.gpg",
    "publishing.autoPublish": false,
    "publishing.aggregation": true,
    "publishing.dryRun": false,
  }),
})

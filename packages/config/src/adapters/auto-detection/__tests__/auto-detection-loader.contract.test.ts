import { describeSourceLoaderContract } from "../../../ports/__tests__/loader.contract"
import type { AutoDetector } from "../../../ports/detector"
import { AutoDetectionLoader } from "../auto-detection-loader"

const gitDetector: AutoDetector = {
  name: "git",
  category: "gitInfo",
  detect: () => ({
    config: { projectInfo: { scm: { url: "https://example.com/widgets.git" } } },
  }),
}

describeSourceLoaderContract({
  name: "AutoDetectionLoader",
  source: "AUTO_DETECTED",
  make: async (cwd) => {
    const loader = new AutoDetectionLoader([gitDetector])
    return () => loader.load({ project: { name: "widgets", directory: cwd } })
  },
  makeEmpty: async (cwd) => {
    const loader = new AutoDetectionLoader([])
    return () => loader.load({ project: { name: "widgets", directory: cwd } })
  },
  expectedValues: () => ({
    "projectInfo.scm.url": "https://example.com/widgets.git",
  }),
})

import fs from "node:fs/promises"
import path from "node:path"
import { describeResourceLocatorContract } from "../../../ports/__tests__/resource-locator.contract"
import { DirectoryResourceLocator } from "../directory-resource-locator"

describeResourceLocatorContract({
  name: "DirectoryResourceLocator",
  make: async (cwd, logicalName, documents) => {
    const roots = documents.map((_, i) => `root-${i}`)

    for (const [i, text] of documents.entries()) {
      await fs.mkdir(path.join(cwd, `root-${i}`))
      await fs.writeFile(path.join(cwd, `root-${i}`, logicalName), text)
    }

    return { locator: new DirectoryResourceLocator({ roots, cwd }) }
  },
})

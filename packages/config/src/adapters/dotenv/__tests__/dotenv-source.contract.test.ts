import fs from "node:fs/promises"
import path from "node:path"
import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { PRESENT_WITHOUT_VALUE } from "../../../ports/source"
import { DotenvSource } from "../dotenv-source"

describeConfigSourceContract({
  name: "DotenvSource",
  make: async (items, cwd) => {
    await fs.writeFile(
      path.join(cwd, ".env"),
      "host=localhost\nport=8080\ntag=a\ndebug=1\nverbose=yes\nother=1\n",
    )

    return new DotenvSource(items, { file: ".env", cwd })
  },
  expected: {
    host: ["localhost"],
    port: ["8080"],
    tag: ["a"],
    debug: [PRESENT_WITHOUT_VALUE],
    verbose: [PRESENT_WITHOUT_VALUE],
  },
})

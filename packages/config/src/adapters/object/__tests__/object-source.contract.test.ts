import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { PRESENT_WITHOUT_VALUE } from "../../../ports/source"
import { ObjectSource } from "../object-source"

describeConfigSourceContract({
  name: "ObjectSource",
  make: async (items) =>
    new ObjectSource(items, {
      values: { host: "localhost", port: "8080", tag: "a", debug: true, verbose: 1, other: "x" },
    }),
  expected: {
    host: ["localhost"],
    port: ["8080"],
    tag: ["a"],
    debug: [PRESENT_WITHOUT_VALUE],
    verbose: [PRESENT_WITHOUT_VALUE],
  },
})

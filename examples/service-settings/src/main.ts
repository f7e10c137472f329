import { serializeError } from "@stratum/errors"
import { run } from "./run"

try {
  process.exitCode = await run(process.argv)
} catch (err) {
  process.stderr.write(`${JSON.stringify(serializeError(err, { includeStack: true }))}\n`)
  process.exitCode = 1
}

import { logLevelNames } from "@stratum/logger"
import { z } from "zod"

/** Shape of the resolved values, checked once after resolution. */
export const settingsSchema = z.object({
  service_name: z.string(),
  host: z.string(),
  port: z.number(),
  log_level: z.enum(logLevelNames),
  log_pretty: z.boolean(),
  include: z.array(z.string()),
  verbose: z.number(),
})

export type Settings = z.infer<typeof settingsSchema>

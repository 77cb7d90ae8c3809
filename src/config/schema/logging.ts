import { z } from "zod";

const LOG_LEVEL_NAMES = ["fatal", "error", "warn", "info", "debug", "trace"] as const;

/** Level names are matched case-insensitively: `"Debug"` and `"debug"` are the same. */
export const LoggingConfigSchema = z
  .object({
    level: z.string().trim().toLowerCase().pipe(z.enum(LOG_LEVEL_NAMES)).optional(),
  })
  .strict();

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

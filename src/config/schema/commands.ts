import { z } from "zod";

export const CommandsConfigSchema = z
  .object({
    /** Path to the command module; relative paths resolve against the config file. */
    source: z.string().min(1).optional(),
    hotReload: z.boolean().optional(),
  })
  .strict();

export type CommandsConfig = z.infer<typeof CommandsConfigSchema>;

import { z } from "zod";
import { CommandsConfigSchema } from "./commands";
import { LoggingConfigSchema } from "./logging";
import { SchedulerConfigSchema } from "./scheduler";
import { ServerConfigSchema } from "./server";
import { SessionConfigSchema } from "./session";

export const BridgeConfigSchema = z
  .object({
    $schema: z.string().optional(),
    server: ServerConfigSchema.optional(),
    scheduler: SchedulerConfigSchema.optional(),
    commands: CommandsConfigSchema.optional(),
    session: SessionConfigSchema.optional(),
    logging: LoggingConfigSchema.optional(),
  })
  .strict();

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;

import { z } from "zod";

export const SchedulerConfigSchema = z
  .object({
    tickIntervalMs: z.number().int().positive().optional(),
    maxTasksPerTick: z.number().int().positive().optional(),
    taskTimeoutMs: z.number().int().positive().optional(),
  })
  .strict();

export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;

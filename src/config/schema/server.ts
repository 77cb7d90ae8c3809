import { z } from "zod";

export const ServerConfigSchema = z
  .object({
    host: z.string().min(1).optional(),
    port: z.number().int().min(0).max(65_535).optional(),
    maxFrameBytes: z.number().int().positive().optional(),
  })
  .strict();

export type ServerConfig = z.infer<typeof ServerConfigSchema>;

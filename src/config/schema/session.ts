import { z } from "zod";

const SeedTrackSchema = z
  .object({
    kind: z.enum(["midi", "audio"]),
    name: z.string().min(1).optional(),
  })
  .strict();

export const SessionConfigSchema = z
  .object({
    tempo: z.number().min(20).max(999).optional(),
    scenes: z.number().int().min(1).max(256).optional(),
    returnTracks: z.number().int().min(0).max(12).optional(),
    tracks: z.array(SeedTrackSchema).optional(),
  })
  .strict();

export type SessionConfig = z.infer<typeof SessionConfigSchema>;

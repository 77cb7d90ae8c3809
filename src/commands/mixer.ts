import { z } from "zod";
import { defineCommand, ok } from "../bridge/registry/define";
import { getTrack, trackIndex } from "./shared";

export const mixerCommands = {
  set_track_volume: defineCommand({
    description: "Track volume, 0.0-1.0 (0.85 is unity)",
    params: z.object({ track_index: trackIndex, volume: z.number() }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      found.value.mixer.setVolume(params.volume);
      return ok({ track_index: params.track_index, volume: found.value.mixer.volume });
    },
  }),

  set_track_panning: defineCommand({
    description: "Track panning, -1.0 (left) to 1.0 (right)",
    params: z.object({ track_index: trackIndex, panning: z.number() }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      found.value.mixer.setPanning(params.panning);
      return ok({ track_index: params.track_index, panning: found.value.mixer.panning });
    },
  }),

  set_track_send: defineCommand({
    params: z.object({
      track_index: trackIndex,
      send_index: z.number().int(),
      value: z.number(),
    }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      found.value.mixer.setSend(params.send_index, params.value);
      return ok({
        track_index: params.track_index,
        send_index: params.send_index,
        value: found.value.mixer.sends[params.send_index],
      });
    },
  }),

  set_master_volume: defineCommand({
    params: z.object({ volume: z.number() }),
    run(session, params) {
      session.masterTrack.mixer.setVolume(params.volume);
      return ok({ volume: session.masterTrack.mixer.volume });
    },
  }),
};

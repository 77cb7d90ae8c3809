import { z } from "zod";
import { defineCommand, ok } from "../bridge/registry/define";
import type { LiveSession } from "../host/session";
import type { Track } from "../host/track";
import { deviceSummary, getReturnTrack, getTrack, insertIndex, trackIndex } from "./shared";

function clipSlotsInfo(track: Track) {
  return track.clipSlots.map((slot, index) => ({
    index,
    has_clip: slot.hasClip,
    clip: slot.clip
      ? {
          name: slot.clip.name,
          length: slot.clip.length,
          is_playing: slot.clip.isPlaying,
          is_recording: false,
        }
      : null,
  }));
}

function createTrack(session: LiveSession, kind: "midi" | "audio", index: number) {
  const created = session.createTrack(kind, index);
  return ok({ index: created.index, name: created.track.name });
}

export const trackCommands = {
  get_track_info: defineCommand({
    description: "Name, mixer state, clip slots and devices of one track",
    params: z.object({ track_index: trackIndex }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      const track = found.value;
      return ok({
        index: params.track_index,
        name: track.name,
        is_audio_track: track.hasAudioInput,
        is_midi_track: track.hasMidiInput,
        mute: track.mute,
        solo: track.solo,
        arm: track.arm,
        volume: track.mixer.volume,
        panning: track.mixer.panning,
        sends: [...track.mixer.sends],
        clip_slots: clipSlotsInfo(track),
        devices: track.devices.map(deviceSummary),
      });
    },
  }),

  get_return_track_info: defineCommand({
    description: "Mixer state and devices of one return track",
    params: z.object({ track_index: trackIndex }),
    run(session, params) {
      const found = getReturnTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      const track = found.value;
      return ok({
        index: params.track_index,
        name: track.name,
        mute: track.mute,
        solo: track.solo,
        volume: track.mixer.volume,
        panning: track.mixer.panning,
        devices: track.devices.map(deviceSummary),
      });
    },
  }),

  create_midi_track: defineCommand({
    description: "Insert a MIDI track at index (-1 appends)",
    params: z.object({ index: insertIndex }),
    run: (session, params) => createTrack(session, "midi", params.index),
  }),

  create_audio_track: defineCommand({
    description: "Insert an audio track at index (-1 appends)",
    params: z.object({ index: insertIndex }),
    run: (session, params) => createTrack(session, "audio", params.index),
  }),

  delete_track: defineCommand({
    params: z.object({ track_index: z.number().int() }),
    run(session, params, ctx) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      const removed = session.deleteTrack(params.track_index);
      ctx.log.info({ track: removed.name }, "Deleted track");
      return ok({
        deleted: true,
        track_index: params.track_index,
        name: removed.name,
        track_count: session.tracks.length,
      });
    },
  }),

  set_track_name: defineCommand({
    params: z.object({ track_index: trackIndex, name: z.string().default("") }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      found.value.setName(params.name);
      return ok({ name: found.value.name });
    },
  }),

  set_track_mute: defineCommand({
    params: z.object({ track_index: trackIndex, mute: z.boolean() }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      found.value.setMute(params.mute);
      return ok({ track_index: params.track_index, mute: found.value.mute });
    },
  }),

  set_track_solo: defineCommand({
    params: z.object({ track_index: trackIndex, solo: z.boolean() }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      found.value.setSolo(params.solo);
      return ok({ track_index: params.track_index, solo: found.value.solo });
    },
  }),

  set_track_arm: defineCommand({
    params: z.object({ track_index: trackIndex, arm: z.boolean() }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      found.value.setArm(params.arm);
      return ok({ track_index: params.track_index, arm: found.value.arm });
    },
  }),
};

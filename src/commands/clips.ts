import { z } from "zod";
import { defineCommand, fail, ok } from "../bridge/registry/define";
import { clipIndex, getClip, getClipSlot, trackIndex } from "./shared";

const NoteSchema = z.object({
  pitch: z.number().int().min(0).max(127).default(60),
  start_time: z.number().min(0).default(0),
  duration: z.number().positive().default(0.25),
  velocity: z.number().int().min(0).max(127).default(100),
  mute: z.boolean().default(false),
});

const slotParams = z.object({ track_index: trackIndex, clip_index: clipIndex });

export const clipCommands = {
  create_clip: defineCommand({
    description: "Create an empty MIDI clip in a session slot",
    params: slotParams.extend({ length: z.number().positive().default(4) }),
    run(session, params) {
      const found = getClipSlot(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      if (found.value.slot.hasClip) {
        return fail("Clip slot already has a clip");
      }
      const clip = found.value.slot.createClip(params.length);
      return ok({ name: clip.name, length: clip.length });
    },
  }),

  add_notes_to_clip: defineCommand({
    params: slotParams.extend({ notes: z.array(NoteSchema).default([]) }),
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      found.value.clip.addNotes(
        params.notes.map((note) => ({
          pitch: note.pitch,
          startTime: note.start_time,
          duration: note.duration,
          velocity: note.velocity,
          mute: note.mute,
        })),
      );
      return ok({ note_count: params.notes.length });
    },
  }),

  get_clip_notes: defineCommand({
    params: slotParams,
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      const { clip } = found.value;
      return ok({
        track_index: params.track_index,
        clip_index: params.clip_index,
        clip_name: clip.name,
        length: clip.length,
        notes: clip.notes.map((note) => ({
          pitch: note.pitch,
          start_time: note.startTime,
          duration: note.duration,
          velocity: note.velocity,
          mute: note.mute,
        })),
      });
    },
  }),

  set_clip_name: defineCommand({
    params: slotParams.extend({ name: z.string().default("") }),
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      found.value.clip.setName(params.name);
      return ok({ name: found.value.clip.name });
    },
  }),

  duplicate_clip: defineCommand({
    description: "Copy a clip into the next empty slot below it",
    params: slotParams,
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      const target = found.value.track.duplicateClipSlot(params.clip_index);
      return ok({
        track_index: params.track_index,
        source_clip_index: params.clip_index,
        target_clip_index: target,
        name: found.value.clip.name,
      });
    },
  }),

  duplicate_clip_to_arrangement: defineCommand({
    description: "Place a copy of a session clip on the arrangement timeline at time (beats)",
    params: slotParams.extend({ time: z.number().min(0).default(0) }),
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      const { track, clip } = found.value;
      const placed = track.duplicateClipToArrangement(clip, params.time);
      return ok({
        track_index: params.track_index,
        clip_index: params.clip_index,
        name: placed.name,
        start_time: placed.startTime,
        arrangement_clip_count: track.arrangementClips.length,
      });
    },
  }),

  delete_clip: defineCommand({
    params: slotParams,
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      found.value.slot.deleteClip();
      return ok({ deleted: true, track_index: params.track_index, clip_index: params.clip_index });
    },
  }),

  set_clip_loop: defineCommand({
    params: slotParams.extend({ loop_start: z.number(), loop_end: z.number() }),
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      const { clip } = found.value;
      clip.setLoop(params.loop_start, params.loop_end);
      return ok({ loop_start: clip.loopStart, loop_end: clip.loopEnd, looping: clip.looping });
    },
  }),

  fire_clip: defineCommand({
    params: slotParams,
    run(session, params) {
      const found = getClip(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      found.value.slot.fire();
      return ok({ fired: true });
    },
  }),

  stop_clip: defineCommand({
    params: slotParams,
    run(session, params) {
      const found = getClipSlot(session, params.track_index, params.clip_index);
      if (!found.ok) {
        return found;
      }
      found.value.slot.stop();
      return ok({ stopped: true });
    },
  }),
};

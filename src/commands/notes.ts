import { z } from "zod";
import { defineCommand, ok } from "../bridge/registry/define";
import type { Clip } from "../host/clip";
import type { Track } from "../host/track";
import { getTrack, toBarBeat, trackIndex } from "./shared";

type PlacedNote = {
  time: number;
  pitch: number;
  duration: number;
  velocity: number;
  clip: string;
};

function placedNotes(clips: readonly Clip[], offset: (clip: Clip) => number): PlacedNote[] {
  return clips
    .filter((clip) => clip.isMidiClip)
    .flatMap((clip) =>
      clip.notes.map((note) => ({
        time: offset(clip) + note.startTime,
        pitch: note.pitch,
        duration: note.duration,
        velocity: note.velocity,
        clip: clip.name,
      })),
    );
}

/** Arrangement notes at absolute time; when there are none, session clip notes at clip time. */
function collectNotes(track: Track): { source: "arrangement" | "session"; notes: PlacedNote[] } {
  const arrangement = placedNotes(track.arrangementClips, (clip) => clip.startTime);
  if (arrangement.length > 0) {
    return { source: "arrangement", notes: arrangement };
  }
  const sessionClips = track.clipSlots.flatMap((slot) => (slot.clip ? [slot.clip] : []));
  return { source: "session", notes: placedNotes(sessionClips, () => 0) };
}

export const noteCommands = {
  get_track_notes: defineCommand({
    description: "Notes of a track in time order, annotated with bar and beat",
    params: z.object({
      track_index: trackIndex,
      max_notes: z.number().int().positive().default(50),
    }),
    run(session, params) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      const beatsPerBar = session.signatureNumerator;
      const { source, notes } = collectNotes(found.value);
      const sorted = [...notes].sort((a, b) => a.time - b.time);
      return ok({
        track_index: params.track_index,
        track_name: found.value.name,
        beats_per_bar: beatsPerBar,
        source,
        notes: sorted.slice(0, params.max_notes).map((note) => {
          const { bar, beat } = toBarBeat(note.time, beatsPerBar);
          return {
            bar,
            beat: Math.round(beat * 1000) / 1000,
            time: note.time,
            pitch: note.pitch,
            duration: note.duration,
            velocity: note.velocity,
            clip: note.clip,
          };
        }),
      });
    },
  }),

  search_track_notes: defineCommand({
    description: "Bar and beat of the earliest note on a track",
    params: z.object({ track_index: trackIndex }),
    run(session, params, ctx) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      const track = found.value;
      const { notes } = collectNotes(track);
      const earliest = notes.reduce<PlacedNote | null>(
        (best, note) => (best === null || note.time < best.time ? note : best),
        null,
      );
      if (!earliest) {
        return ok({
          found: false,
          track_index: params.track_index,
          track_name: track.name,
          message: "No notes found in track",
        });
      }
      const { bar, beat } = toBarBeat(earliest.time, session.signatureNumerator);
      ctx.log.debug({ track: params.track_index, bar }, "Found first note");
      return ok({
        found: true,
        track_index: params.track_index,
        track_name: track.name,
        bar_number: bar,
        beat_in_bar: beat,
        note_time: earliest.time,
        note_details: {
          clip_name: earliest.clip,
          note_pitch: earliest.pitch,
          note_velocity: earliest.velocity,
          start_time: earliest.time,
        },
      });
    },
  }),
};

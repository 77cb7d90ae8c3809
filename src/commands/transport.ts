import { z } from "zod";
import { defineCommand, ok } from "../bridge/registry/define";
import type { LiveSession } from "../host/session";
import { noParams, toBarBeat } from "./shared";

/** Seeks with transport stopped and restarts it if it was running. */
function seek(session: LiveSession, time: number): boolean {
  const wasPlaying = session.isPlaying;
  if (wasPlaying) {
    session.stopPlaying();
  }
  session.setCurrentSongTime(time);
  if (wasPlaying) {
    session.startPlaying();
  }
  return wasPlaying;
}

const toggle = z.object({ enabled: z.boolean() });

export const transportCommands = {
  set_tempo: defineCommand({
    description: "Session tempo in BPM (20-999)",
    params: z.object({ tempo: z.number().default(120) }),
    run(session, params) {
      session.setTempo(params.tempo);
      return ok({ tempo: session.tempo });
    },
  }),

  start_playback: defineCommand({
    params: noParams,
    run(session) {
      session.startPlaying();
      return ok({ playing: session.isPlaying });
    },
  }),

  stop_playback: defineCommand({
    params: noParams,
    run(session) {
      session.stopPlaying();
      return ok({ playing: session.isPlaying });
    },
  }),

  set_song_time: defineCommand({
    description: "Move the arrangement playhead to a beat position",
    params: z.object({ time: z.number().min(0).default(0) }),
    run(session, params) {
      const wasPlaying = seek(session, params.time);
      return ok({ song_time_set: params.time, was_playing: wasPlaying });
    },
  }),

  get_playback_position: defineCommand({
    params: noParams,
    run(session) {
      const time = session.currentSongTime;
      const { bar, beat } = toBarBeat(time, session.signatureNumerator);
      return ok({ current_song_time: time, is_playing: session.isPlaying, bar, beat });
    },
  }),

  set_playback_position: defineCommand({
    params: z.object({ position: z.number().min(0) }),
    run(session, params) {
      const wasPlaying = seek(session, params.position);
      return ok({ position: session.currentSongTime, was_playing: wasPlaying });
    },
  }),

  set_record_mode: defineCommand({
    params: toggle,
    run(session, params) {
      session.setRecordMode(params.enabled);
      return ok({ record_mode: session.recordMode });
    },
  }),

  set_overdub: defineCommand({
    params: toggle,
    run(session, params) {
      session.setOverdub(params.enabled);
      return ok({ overdub: session.overdub });
    },
  }),

  set_metronome: defineCommand({
    params: toggle,
    run(session, params) {
      session.setMetronome(params.enabled);
      return ok({ metronome: session.metronome });
    },
  }),
};

import { defineCommand, ok } from "../bridge/registry/define";
import { noParams } from "./shared";

export const sessionCommands = {
  get_session_info: defineCommand({
    description: "Tempo, time signature, track counts and master mixer state",
    params: noParams,
    run(session) {
      return ok({
        tempo: session.tempo,
        signature_numerator: session.signatureNumerator,
        signature_denominator: session.signatureDenominator,
        track_count: session.tracks.length,
        return_track_count: session.returnTracks.length,
        scene_count: session.scenes.length,
        is_playing: session.isPlaying,
        current_song_time: session.currentSongTime,
        master_track: {
          name: session.masterTrack.name,
          volume: session.masterTrack.mixer.volume,
          panning: session.masterTrack.mixer.panning,
        },
      });
    },
  }),

  hot_reload_test: defineCommand({
    description: "Answers from the currently loaded command module",
    params: noParams,
    run(session) {
      return ok({
        hot_reload: "working",
        tempo: session.tempo,
        track_count: session.tracks.length,
        message: "Command module was reloaded from disk without restarting the host",
      });
    },
  }),
};

/**
 * Command table served by the bridge.
 *
 * This module and its siblings are re-evaluated from disk whenever any of them
 * changes, so they import only zod, the side-effect-free helpers in
 * `bridge/registry/define`, and types.
 */
import { defineCommandModule } from "../bridge/registry/define";
import { browserCommands } from "./browser";
import { clipCommands } from "./clips";
import { deviceCommands } from "./devices";
import { mixerCommands } from "./mixer";
import { noteCommands } from "./notes";
import { sceneCommands } from "./scenes";
import { sessionCommands } from "./session";
import { trackCommands } from "./tracks";
import { transportCommands } from "./transport";

export const MUTATING_COMMANDS = [
  "create_midi_track",
  "create_audio_track",
  "delete_track",
  "set_track_name",
  "set_track_volume",
  "set_track_panning",
  "set_track_mute",
  "set_track_solo",
  "set_track_arm",
  "set_track_send",
  "set_master_volume",
  "create_clip",
  "add_notes_to_clip",
  "set_clip_name",
  "duplicate_clip",
  "duplicate_clip_to_arrangement",
  "delete_clip",
  "set_clip_loop",
  "fire_clip",
  "stop_clip",
  "create_scene",
  "fire_scene",
  "delete_scene",
  "set_tempo",
  "start_playback",
  "stop_playback",
  "set_song_time",
  "set_playback_position",
  "set_record_mode",
  "set_overdub",
  "set_metronome",
  "load_browser_item",
  "set_device_parameter",
  "set_device_enabled",
  "delete_device",
];

export default defineCommandModule({
  mutating: MUTATING_COMMANDS,
  commands: {
    ...sessionCommands,
    ...transportCommands,
    ...trackCommands,
    ...mixerCommands,
    ...clipCommands,
    ...noteCommands,
    ...sceneCommands,
    ...deviceCommands,
    ...browserCommands,
  },
});

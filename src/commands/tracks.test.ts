import { describe, expect, it } from "vitest";
import { createCommandHarness } from "../../tests/harness/command-harness";

const emptySlots = Array.from({ length: 8 }, (_, index) => ({
  index,
  has_clip: false,
  clip: null,
}));

describe("track commands", () => {
  it("describes a track", async () => {
    const harness = createCommandHarness();
    await expect(harness.result("get_track_info")).resolves.toEqual({
      index: 0,
      name: "1-MIDI",
      is_audio_track: false,
      is_midi_track: true,
      mute: false,
      solo: false,
      arm: false,
      volume: 0.85,
      panning: 0,
      sends: [0, 0],
      clip_slots: emptySlots,
      devices: [],
    });
  });

  it("reports track indexes out of range", async () => {
    const harness = createCommandHarness();
    await expect(harness.error("get_track_info", { track_index: 99 })).resolves.toBe(
      "Track index 99 out of range (session has 4 tracks)",
    );
    await expect(harness.error("get_return_track_info", { track_index: 5 })).resolves.toBe(
      "Return track index 5 out of range (session has 2 return tracks)",
    );
  });

  it("describes a return track", async () => {
    const harness = createCommandHarness();
    await expect(harness.result("get_return_track_info", { track_index: 1 })).resolves.toEqual({
      index: 1,
      name: "B-Return",
      mute: false,
      solo: false,
      volume: 0.85,
      panning: 0,
      devices: [],
    });
  });

  it("inserts and appends tracks", async () => {
    const harness = createCommandHarness();
    await expect(harness.result("create_midi_track", { index: 1 })).resolves.toEqual({
      index: 1,
      name: "2-MIDI",
    });
    await expect(harness.result("create_audio_track")).resolves.toEqual({
      index: 5,
      name: "6-Audio",
    });
    expect(harness.session.tracks.map((track) => track.kind)).toEqual([
      "midi",
      "midi",
      "midi",
      "audio",
      "audio",
      "audio",
    ]);
  });

  it("rejects insert positions past the end", async () => {
    const harness = createCommandHarness();
    await expect(harness.error("create_midi_track", { index: 10 })).resolves.toBe(
      "Track index 10 out of range",
    );
    await expect(harness.error("create_midi_track", { index: -2 })).resolves.toBe(
      "Invalid parameters for create_midi_track: index: Number must be greater than or equal to -1",
    );
  });

  it("deletes a track", async () => {
    const harness = createCommandHarness();
    await expect(harness.result("delete_track", { track_index: 0 })).resolves.toEqual({
      deleted: true,
      track_index: 0,
      name: "1-MIDI",
      track_count: 3,
    });
    await expect(harness.error("delete_track")).resolves.toBe(
      "Invalid parameters for delete_track: track_index: Required",
    );
  });

  it("renames, mutes, solos and arms tracks", async () => {
    const harness = createCommandHarness();
    await expect(
      harness.result("set_track_name", { track_index: 2, name: "Drums" }),
    ).resolves.toEqual({ name: "Drums" });
    await expect(harness.result("set_track_mute", { track_index: 1, mute: true })).resolves.toEqual(
      { track_index: 1, mute: true },
    );
    await expect(harness.result("set_track_solo", { track_index: 1, solo: true })).resolves.toEqual(
      { track_index: 1, solo: true },
    );
    await expect(harness.result("set_track_arm", { track_index: 2, arm: true })).resolves.toEqual({
      track_index: 2,
      arm: true,
    });
    await expect(harness.result("get_track_info", { track_index: 2 })).resolves.toMatchObject({
      name: "Drums",
      arm: true,
    });
  });

  it("requires the flag for toggles", async () => {
    const harness = createCommandHarness();
    await expect(harness.error("set_track_mute", { track_index: 1 })).resolves.toBe(
      "Invalid parameters for set_track_mute: mute: Required",
    );
  });
});

describe("mixer commands", () => {
  it("sets volume, panning and sends", async () => {
    const harness = createCommandHarness();
    await expect(
      harness.result("set_track_volume", { track_index: 0, volume: 0.5 }),
    ).resolves.toEqual({ track_index: 0, volume: 0.5 });
    await expect(
      harness.result("set_track_panning", { track_index: 1, panning: -0.5 }),
    ).resolves.toEqual({ track_index: 1, panning: -0.5 });
    await expect(
      harness.result("set_track_send", { track_index: 0, send_index: 1, value: 0.3 }),
    ).resolves.toEqual({ track_index: 0, send_index: 1, value: 0.3 });
    await expect(harness.result("set_master_volume", { volume: 0.7 })).resolves.toEqual({
      volume: 0.7,
    });
    await expect(harness.result("get_track_info")).resolves.toMatchObject({
      volume: 0.5,
      sends: [0, 0.3],
    });
  });

  it("rejects values outside the mixer ranges", async () => {
    const harness = createCommandHarness();
    await expect(harness.error("set_track_volume", { track_index: 0, volume: 1.5 })).resolves.toBe(
      "Volume 1.5 is outside 0.0-1.0",
    );
    await expect(
      harness.error("set_track_send", { track_index: 0, send_index: 2, value: 0.5 }),
    ).resolves.toBe("Send index 2 out of range");
  });
});

import { describe, expect, it } from "vitest";
import { createCommandHarness } from "../../tests/harness/command-harness";

const slot = { track_index: 0, clip_index: 0 };

describe("clip commands", () => {
  it("creates a clip once per slot", async () => {
    const harness = createCommandHarness();
    await expect(harness.result("create_clip", { ...slot, length: 8 })).resolves.toEqual({
      name: "MIDI Clip",
      length: 8,
    });
    await expect(harness.error("create_clip", slot)).resolves.toBe("Clip slot already has a clip");
    await expect(harness.error("create_clip", { track_index: 0, clip_index: 20 })).resolves.toBe(
      "Clip index 20 out of range (track has 8 clip slots)",
    );
  });

  it("adds notes with defaults and reads them back in order", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", { ...slot, length: 8 });
    await expect(
      harness.result("add_notes_to_clip", {
        ...slot,
        notes: [{ pitch: 64, start_time: 1 }, { pitch: 60 }],
      }),
    ).resolves.toEqual({ note_count: 2 });

    await expect(harness.result("get_clip_notes", slot)).resolves.toEqual({
      track_index: 0,
      clip_index: 0,
      clip_name: "MIDI Clip",
      length: 8,
      notes: [
        { pitch: 60, start_time: 0, duration: 0.25, velocity: 100, mute: false },
        { pitch: 64, start_time: 1, duration: 0.25, velocity: 100, mute: false },
      ],
    });
  });

  it("validates notes before touching the clip", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", slot);
    await expect(
      harness.error("add_notes_to_clip", { ...slot, notes: [{ pitch: 128 }] }),
    ).resolves.toBe(
      "Invalid parameters for add_notes_to_clip: notes.0.pitch: Number must be less than or equal to 127",
    );
    await expect(harness.result("get_clip_notes", slot)).resolves.toMatchObject({ notes: [] });
  });

  it("reports empty slots", async () => {
    const harness = createCommandHarness();
    await expect(harness.error("get_clip_notes", { track_index: 0, clip_index: 1 })).resolves.toBe(
      "No clip in slot 1 of track 0",
    );
  });

  it("renames and duplicates a clip into the next free slot", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", slot);
    await expect(harness.result("set_clip_name", { ...slot, name: "Bassline" })).resolves.toEqual({
      name: "Bassline",
    });
    await expect(harness.result("duplicate_clip", slot)).resolves.toEqual({
      track_index: 0,
      source_clip_index: 0,
      target_clip_index: 1,
      name: "Bassline",
    });
    await expect(
      harness.result("get_clip_notes", { track_index: 0, clip_index: 1 }),
    ).resolves.toMatchObject({ clip_name: "Bassline" });
  });

  it("places a copy on the arrangement", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", slot);
    await expect(
      harness.result("duplicate_clip_to_arrangement", { ...slot, time: 16 }),
    ).resolves.toEqual({
      track_index: 0,
      clip_index: 0,
      name: "MIDI Clip",
      start_time: 16,
      arrangement_clip_count: 1,
    });
  });

  it("sets the loop range", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", slot);
    await expect(
      harness.result("set_clip_loop", { ...slot, loop_start: 1, loop_end: 3 }),
    ).resolves.toEqual({ loop_start: 1, loop_end: 3, looping: true });
    await expect(
      harness.error("set_clip_loop", { ...slot, loop_start: 1, loop_end: 0.5 }),
    ).resolves.toBe("Invalid loop range 1-0.5: end must be greater than start");
  });

  it("fires, stops and deletes a clip", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", slot);
    await expect(harness.result("fire_clip", slot)).resolves.toEqual({ fired: true });
    expect(harness.session.tracks[0]?.clipSlots[0]?.clip?.isPlaying).toBe(true);

    await expect(harness.result("stop_clip", slot)).resolves.toEqual({ stopped: true });
    expect(harness.session.tracks[0]?.clipSlots[0]?.clip?.isPlaying).toBe(false);

    await expect(harness.result("delete_clip", slot)).resolves.toEqual({
      deleted: true,
      track_index: 0,
      clip_index: 0,
    });
    await expect(harness.error("fire_clip", slot)).resolves.toBe("No clip in slot 0 of track 0");
    await expect(harness.result("stop_clip", slot)).resolves.toEqual({ stopped: true });
  });
});

describe("note commands", () => {
  async function seedNotes() {
    const harness = createCommandHarness();
    await harness.result("create_clip", slot);
    await harness.result("add_notes_to_clip", {
      ...slot,
      notes: [
        { pitch: 60, start_time: 0 },
        { pitch: 62, start_time: 4.5 },
      ],
    });
    await harness.result("create_clip", { track_index: 0, clip_index: 1 });
    await harness.result("set_clip_name", { track_index: 0, clip_index: 1, name: "Low" });
    await harness.result("add_notes_to_clip", {
      track_index: 0,
      clip_index: 1,
      notes: [{ pitch: 48, start_time: 2 }],
    });
    return harness;
  }

  it("lists session clip notes in time order with bar and beat", async () => {
    const harness = await seedNotes();
    await expect(
      harness.result("get_track_notes", { track_index: 0, max_notes: 2 }),
    ).resolves.toEqual({
      track_index: 0,
      track_name: "1-MIDI",
      beats_per_bar: 4,
      source: "session",
      notes: [
        { bar: 1, beat: 1, time: 0, pitch: 60, duration: 0.25, velocity: 100, clip: "MIDI Clip" },
        { bar: 1, beat: 3, time: 2, pitch: 48, duration: 0.25, velocity: 100, clip: "Low" },
      ],
    });
  });

  it("prefers arrangement notes at their absolute time", async () => {
    const harness = await seedNotes();
    await harness.result("duplicate_clip_to_arrangement", { ...slot, time: 8 });

    const listed = await harness.result("get_track_notes", { track_index: 0 });
    expect(listed).toMatchObject({
      source: "arrangement",
      notes: [
        { bar: 3, beat: 1, time: 8, pitch: 60 },
        { bar: 4, beat: 1.5, time: 12.5, pitch: 62 },
      ],
    });

    await expect(harness.result("search_track_notes", { track_index: 0 })).resolves.toEqual({
      found: true,
      track_index: 0,
      track_name: "1-MIDI",
      bar_number: 3,
      beat_in_bar: 1,
      note_time: 8,
      note_details: {
        clip_name: "MIDI Clip",
        note_pitch: 60,
        note_velocity: 100,
        start_time: 8,
      },
    });
  });

  it("reports a track without notes", async () => {
    const harness = createCommandHarness();
    await expect(harness.result("search_track_notes", { track_index: 2 })).resolves.toEqual({
      found: false,
      track_index: 2,
      track_name: "3-Audio",
      message: "No notes found in track",
    });
  });
});

import { describe, expect, it } from "vitest";
import { createCommandHarness } from "../../tests/harness/command-harness";

describe("scene commands", () => {
  it("lists the clips in a scene row", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", { track_index: 1, clip_index: 0 });
    await expect(harness.result("get_scene_info", { scene_index: 0 })).resolves.toEqual({
      index: 0,
      name: "1",
      clip_count: 1,
      clips: [{ track_index: 1, track_name: "2-MIDI", clip_name: "MIDI Clip", is_playing: false }],
    });
  });

  it("fires a scene and starts playback", async () => {
    const harness = createCommandHarness();
    await harness.result("create_clip", { track_index: 1, clip_index: 0 });
    await expect(harness.result("fire_scene", { scene_index: 0 })).resolves.toEqual({
      fired: true,
      scene_index: 0,
      clips_fired: 1,
    });
    await expect(harness.result("get_session_info")).resolves.toMatchObject({ is_playing: true });
  });

  it("creates and deletes scenes", async () => {
    const harness = createCommandHarness();
    await expect(harness.result("create_scene")).resolves.toEqual({
      index: 8,
      name: "",
      scene_count: 9,
    });
    await expect(harness.result("delete_scene", { scene_index: 8 })).resolves.toEqual({
      deleted: true,
      scene_index: 8,
      scene_count: 8,
    });
  });

  it("validates the scene index", async () => {
    const harness = createCommandHarness();
    await expect(harness.error("get_scene_info", { scene_index: 12 })).resolves.toBe(
      "Scene index 12 out of range (session has 8 scenes)",
    );
    await expect(harness.error("fire_scene")).resolves.toBe(
      "Invalid parameters for fire_scene: scene_index: Required",
    );
  });
});

import { z } from "zod";
import { defineCommand, ok } from "../bridge/registry/define";
import { getScene, insertIndex } from "./shared";

const sceneIndex = z.number().int();

export const sceneCommands = {
  get_scene_info: defineCommand({
    params: z.object({ scene_index: sceneIndex }),
    run(session, params) {
      const found = getScene(session, params.scene_index);
      if (!found.ok) {
        return found;
      }
      const clips = session.tracks.flatMap((track, index) => {
        const clip = track.clipSlots[params.scene_index]?.clip;
        if (!clip) {
          return [];
        }
        return [
          {
            track_index: index,
            track_name: track.name,
            clip_name: clip.name,
            is_playing: clip.isPlaying,
          },
        ];
      });
      return ok({
        index: params.scene_index,
        name: found.value.name,
        clip_count: clips.length,
        clips,
      });
    },
  }),

  create_scene: defineCommand({
    description: "Insert a scene at index (-1 appends)",
    params: z.object({ index: insertIndex }),
    run(session, params) {
      const created = session.createScene(params.index);
      return ok({
        index: created.index,
        name: created.scene.name,
        scene_count: session.scenes.length,
      });
    },
  }),

  fire_scene: defineCommand({
    params: z.object({ scene_index: sceneIndex }),
    run(session, params) {
      const found = getScene(session, params.scene_index);
      if (!found.ok) {
        return found;
      }
      const fired = session.fireScene(params.scene_index);
      return ok({ fired: true, scene_index: params.scene_index, clips_fired: fired });
    },
  }),

  delete_scene: defineCommand({
    params: z.object({ scene_index: sceneIndex }),
    run(session, params) {
      const found = getScene(session, params.scene_index);
      if (!found.ok) {
        return found;
      }
      session.deleteScene(params.scene_index);
      return ok({
        deleted: true,
        scene_index: params.scene_index,
        scene_count: session.scenes.length,
      });
    },
  }),
};

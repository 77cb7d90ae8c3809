import { z } from "zod";
import { defineCommand, fail, ok } from "../bridge/registry/define";
import type { Browser, BrowserItem } from "../host/browser";
import { browserItemInfo, getTrack, trackIndex } from "./shared";

type PathWalk =
  | { ok: true; item: BrowserItem }
  | { ok: false; reason: "unknown_root" | "missing_part"; name: string };

/** Resolves "category/child/grandchild", matching names case-insensitively. */
function walkPath(browser: Browser, path: string): PathWalk {
  const [rootName = "", ...rest] = path.split("/");
  const root = browser.root(rootName);
  if (!root) {
    return { ok: false, reason: "unknown_root", name: rootName };
  }
  let current = root;
  for (const part of rest) {
    if (!part) {
      continue;
    }
    const wanted = part.toLowerCase();
    const next = current.children.find((child) => child.name.toLowerCase() === wanted);
    if (!next) {
      return { ok: false, reason: "missing_part", name: part };
    }
    current = next;
  }
  return { ok: true, item: current };
}

const categoryType = z.string().default("all");

function matchesCategory(wanted: string, id: string): boolean {
  return wanted === "all" || wanted === id;
}

function itemsAtPath(browser: Browser, path: string) {
  const walk = walkPath(browser, path);
  if (!walk.ok) {
    return walk.reason === "unknown_root"
      ? {
          path,
          error: `Unknown category: ${walk.name}`,
          available_categories: browser.categoryIds,
          items: [],
        }
      : { path, error: `Path part not found: ${walk.name}`, items: [] };
  }
  return {
    path,
    name: walk.item.name,
    uri: walk.item.uri,
    items: walk.item.children.map(browserItemInfo),
  };
}

export const browserCommands = {
  get_browser_item: defineCommand({
    description: "Look up a browser item by URI, falling back to a slash-separated path",
    params: z.object({
      uri: z.string().nullable().default(null),
      path: z.string().nullable().default(null),
    }),
    run(session, params) {
      const base = { uri: params.uri, path: params.path };
      if (params.uri) {
        const item = session.browser.findByUri(params.uri);
        if (item) {
          return ok({ ...base, found: true, item: browserItemInfo(item) });
        }
      }
      if (params.path) {
        const walk = walkPath(session.browser, params.path);
        if (!walk.ok) {
          const error =
            walk.reason === "unknown_root"
              ? `Unknown browser category: ${walk.name}`
              : `Path part not found: ${walk.name}`;
          return ok({ ...base, found: false, error });
        }
        return ok({ ...base, found: true, item: browserItemInfo(walk.item) });
      }
      return ok({ ...base, found: false });
    },
  }),

  get_browser_categories: defineCommand({
    params: z.object({ category_type: categoryType }),
    run(session, params) {
      const categories = session.browser.categories
        .filter((category) => matchesCategory(params.category_type, category.id))
        .map((category) => ({ name: category.id, uri: category.item.uri }));
      return ok({ categories });
    },
  }),

  get_browser_tree: defineCommand({
    description: "Top-level browser categories",
    params: z.object({ category_type: categoryType }),
    run(session, params) {
      const categories = session.browser.categories
        .filter((category) => matchesCategory(params.category_type, category.id))
        .map((category) => ({ ...browserItemInfo(category.item), children: [] }));
      return ok({
        type: params.category_type,
        categories,
        available_categories: session.browser.categoryIds,
      });
    },
  }),

  get_browser_items_at_path: defineCommand({
    params: z.object({ path: z.string().default("") }),
    run: (session, params) => ok(itemsAtPath(session.browser, params.path)),
  }),

  get_browser_items: defineCommand({
    params: z.object({ path: z.string().default(""), item_type: categoryType }),
    run: (session, params) => ok(itemsAtPath(session.browser, params.path)),
  }),

  load_browser_item: defineCommand({
    description: "Load an instrument, effect or kit onto a track by browser URI",
    params: z.object({ track_index: trackIndex, item_uri: z.string().default("") }),
    run(session, params, ctx) {
      const found = getTrack(session, params.track_index);
      if (!found.ok) {
        return found;
      }
      const item = session.browser.findByUri(params.item_uri);
      if (!item) {
        return fail(`Browser item with URI '${params.item_uri}' not found`);
      }
      if (!item.device) {
        return fail(`Browser item "${item.name}" is not loadable`);
      }
      const refusal = found.value.deviceRefusal(item.device);
      if (refusal) {
        return fail(refusal);
      }
      session.selectTrack(found.value);
      const device = session.loadItem(item);
      ctx.log.info({ track: found.value.name, item: item.name }, "Loaded browser item");
      return ok({
        loaded: true,
        item_name: item.name,
        track_name: found.value.name,
        uri: params.item_uri,
        device_name: device.name,
      });
    },
  }),
};

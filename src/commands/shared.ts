import { z } from "zod";
import { fail, ok } from "../bridge/registry/define";
import type { CommandOutcome } from "../bridge/registry/types";
import type { BrowserItem } from "../host/browser";
import type { Clip, ClipSlot } from "../host/clip";
import type { Device, DeviceParameter } from "../host/device";
import type { LiveSession, Scene } from "../host/session";
import type { Track } from "../host/track";

export const trackIndex = z.number().int().default(0);
export const clipIndex = z.number().int().default(0);
export const insertIndex = z.number().int().min(-1).default(-1);
export const noParams = z.object({});

export type Lookup<T> = CommandOutcome<T>;

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function outOfRange(label: string, index: number, owner: string, count: number, noun: string) {
  return fail(`${label} index ${index} out of range (${owner} has ${plural(count, noun)})`);
}

export function getTrack(session: LiveSession, index: number): Lookup<Track> {
  const track = session.tracks[index];
  return track ? ok(track) : outOfRange("Track", index, "session", session.tracks.length, "track");
}

export function getReturnTrack(session: LiveSession, index: number): Lookup<Track> {
  const track = session.returnTracks[index];
  return track
    ? ok(track)
    : outOfRange("Return track", index, "session", session.returnTracks.length, "return track");
}

export function getScene(session: LiveSession, index: number): Lookup<Scene> {
  const scene = session.scenes[index];
  return scene ? ok(scene) : outOfRange("Scene", index, "session", session.scenes.length, "scene");
}

export function getClipSlot(
  session: LiveSession,
  trackIdx: number,
  slotIdx: number,
): Lookup<{ track: Track; slot: ClipSlot }> {
  const track = getTrack(session, trackIdx);
  if (!track.ok) {
    return track;
  }
  const slot = track.value.clipSlots[slotIdx];
  if (!slot) {
    return outOfRange("Clip", slotIdx, "track", track.value.clipSlots.length, "clip slot");
  }
  return ok({ track: track.value, slot });
}

/** Like {@link getClipSlot}, but the slot must hold a clip. */
export function getClip(
  session: LiveSession,
  trackIdx: number,
  slotIdx: number,
): Lookup<{ track: Track; slot: ClipSlot; clip: Clip }> {
  const found = getClipSlot(session, trackIdx, slotIdx);
  if (!found.ok) {
    return found;
  }
  const clip = found.value.slot.clip;
  if (!clip) {
    return fail(`No clip in slot ${slotIdx} of track ${trackIdx}`);
  }
  return ok({ ...found.value, clip });
}

export function getDevice(
  session: LiveSession,
  trackIdx: number,
  deviceIdx: number,
): Lookup<{ track: Track; device: Device }> {
  const track = getTrack(session, trackIdx);
  if (!track.ok) {
    return track;
  }
  const device = track.value.devices[deviceIdx];
  if (!device) {
    return outOfRange("Device", deviceIdx, "track", track.value.devices.length, "device");
  }
  return ok({ track: track.value, device });
}

export function getParameter(device: Device, index: number): Lookup<DeviceParameter> {
  const param = device.parameters[index];
  return param
    ? ok(param)
    : outOfRange("Parameter", index, "device", device.parameters.length, "parameter");
}

export function deviceType(device: Device): string {
  if (device.canHaveDrumPads) {
    return "drum_machine";
  }
  if (device.canHaveChains) {
    return "rack";
  }
  return device.type;
}

export function deviceSummary(device: Device, index: number) {
  return {
    index,
    name: device.name,
    class_name: device.className,
    type: deviceType(device),
  };
}

export function browserItemInfo(item: BrowserItem) {
  return {
    name: item.name,
    is_folder: item.isFolder,
    is_device: item.isDevice,
    is_loadable: item.isLoadable,
    uri: item.uri,
  };
}

/** 1-based bar and beat of a beat-time position. */
export function toBarBeat(time: number, beatsPerBar: number): { bar: number; beat: number } {
  return {
    bar: Math.floor(time / beatsPerBar) + 1,
    beat: (time % beatsPerBar) + 1,
  };
}

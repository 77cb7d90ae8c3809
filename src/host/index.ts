export { LiveSession, Scene, MIN_TEMPO, MAX_TEMPO } from "./session";
export { Track, MixerDevice, DEFAULT_TRACK_VOLUME, type TrackKind } from "./track";
export { Clip, ClipSlot, type MidiNote } from "./clip";
export { Device, DeviceParameter, type DeviceTemplate, type DeviceType } from "./device";
export { Browser, BrowserItem, loadBrowserCatalog, type BrowserCategory } from "./browser";
export { HostError } from "./errors";

import type { HostThreadGuard } from "../bridge/scheduler/host-guard";
import { Clip, ClipSlot } from "./clip";
import { Device, type DeviceTemplate } from "./device";
import { HostError } from "./errors";

export type TrackKind = "midi" | "audio" | "return" | "master";

export const DEFAULT_TRACK_VOLUME = 0.85;

export class MixerDevice {
  private _volume = DEFAULT_TRACK_VOLUME;
  private _panning = 0;
  private _sends: number[];

  constructor(
    private readonly guard: HostThreadGuard,
    sendCount: number,
  ) {
    this._sends = Array.from({ length: sendCount }, () => 0);
  }

  get volume(): number {
    return this._volume;
  }

  get panning(): number {
    return this._panning;
  }

  get sends(): readonly number[] {
    return this._sends;
  }

  setVolume(volume: number): void {
    this.guard.assertOnHost("MixerDevice.setVolume");
    if (volume < 0 || volume > 1) {
      throw new HostError(`Volume ${volume} is outside 0.0-1.0`);
    }
    this._volume = volume;
  }

  setPanning(panning: number): void {
    this.guard.assertOnHost("MixerDevice.setPanning");
    if (panning < -1 || panning > 1) {
      throw new HostError(`Panning ${panning} is outside -1.0-1.0`);
    }
    this._panning = panning;
  }

  setSend(index: number, value: number): void {
    this.guard.assertOnHost("MixerDevice.setSend");
    if (index < 0 || index >= this._sends.length) {
      throw new HostError(`Send index ${index} out of range`);
    }
    if (value < 0 || value > 1) {
      throw new HostError(`Send level ${value} is outside 0.0-1.0`);
    }
    this._sends = this._sends.map((current, i) => (i === index ? value : current));
  }
}

export class Track {
  private _name: string;
  private _mute = false;
  private _solo = false;
  private _arm = false;
  private _clipSlots: ClipSlot[];
  private _devices: Device[] = [];
  private _arrangementClips: Clip[] = [];
  readonly kind: TrackKind;
  readonly mixer: MixerDevice;

  constructor(
    private readonly guard: HostThreadGuard,
    init: { kind: TrackKind; name: string; slotCount: number; sendCount: number },
  ) {
    this.kind = init.kind;
    this._name = init.name;
    this.mixer = new MixerDevice(guard, init.sendCount);
    this._clipSlots = Array.from({ length: init.slotCount }, () => this.createSlot());
  }

  get name(): string {
    return this._name;
  }

  get mute(): boolean {
    return this._mute;
  }

  get solo(): boolean {
    return this._solo;
  }

  get arm(): boolean {
    return this._arm;
  }

  get hasMidiInput(): boolean {
    return this.kind === "midi";
  }

  get hasAudioInput(): boolean {
    return this.kind === "audio";
  }

  get canBeArmed(): boolean {
    return this.kind === "midi" || this.kind === "audio";
  }

  get clipSlots(): readonly ClipSlot[] {
    return this._clipSlots;
  }

  get devices(): readonly Device[] {
    return this._devices;
  }

  get arrangementClips(): readonly Clip[] {
    return this._arrangementClips;
  }

  setName(name: string): void {
    this.guard.assertOnHost("Track.setName");
    this._name = name;
  }

  setMute(mute: boolean): void {
    this.guard.assertOnHost("Track.setMute");
    this._mute = mute;
  }

  setSolo(solo: boolean): void {
    this.guard.assertOnHost("Track.setSolo");
    this._solo = solo;
  }

  setArm(arm: boolean): void {
    this.guard.assertOnHost("Track.setArm");
    if (!this.canBeArmed) {
      throw new HostError(`Track "${this._name}" cannot be armed`);
    }
    this._arm = arm;
  }

  /** Why `template` cannot go on this track, or null when it can. */
  deviceRefusal(template: DeviceTemplate): string | null {
    const isInstrument = template.type === "instrument" || template.type === "drum_machine";
    if (isInstrument && this.kind !== "midi") {
      return `Cannot load instrument "${template.name}" on a non-MIDI track`;
    }
    return null;
  }

  loadDevice(template: DeviceTemplate): Device {
    this.guard.assertOnHost("Track.loadDevice");
    const refusal = this.deviceRefusal(template);
    if (refusal) {
      throw new HostError(refusal);
    }
    const device = new Device(this.guard, template);
    this._devices = [...this._devices, device];
    return device;
  }

  deleteDevice(index: number): Device {
    this.guard.assertOnHost("Track.deleteDevice");
    const device = this._devices[index];
    if (!device) {
      throw new HostError(`Device index ${index} out of range`);
    }
    this._devices = this._devices.filter((_, i) => i !== index);
    return device;
  }

  /**
   * Duplicates the clip in the given slot into the next empty slot below it.
   * Returns the index of the slot that received the copy.
   */
  duplicateClipSlot(index: number): number {
    this.guard.assertOnHost("Track.duplicateClipSlot");
    const clip = this._clipSlots[index]?.clip;
    if (!clip) {
      throw new HostError("No clip in slot");
    }
    const target = this._clipSlots.findIndex((slot, i) => i > index && !slot.hasClip);
    if (target < 0) {
      throw new HostError(`No empty clip slot below slot ${index}`);
    }
    this._clipSlots[target]?.place(clip.copy());
    return target;
  }

  duplicateClipToArrangement(clip: Clip, time: number): Clip {
    this.guard.assertOnHost("Track.duplicateClipToArrangement");
    if (time < 0) {
      throw new HostError(`Arrangement position must not be negative, got ${time}`);
    }
    const placed = clip.copy(time);
    this._arrangementClips = [...this._arrangementClips, placed].sort(
      (a, b) => a.startTime - b.startTime,
    );
    return placed;
  }

  stopAllClips(): void {
    this.guard.assertOnHost("Track.stopAllClips");
    for (const slot of this._clipSlots) {
      slot.stop();
    }
  }

  insertClipSlot(index: number): void {
    this.guard.assertOnHost("Track.insertClipSlot");
    this._clipSlots = [
      ...this._clipSlots.slice(0, index),
      this.createSlot(),
      ...this._clipSlots.slice(index),
    ];
  }

  removeClipSlot(index: number): void {
    this.guard.assertOnHost("Track.removeClipSlot");
    this._clipSlots = this._clipSlots.filter((_, i) => i !== index);
  }

  private createSlot(): ClipSlot {
    return new ClipSlot(this.guard, () => this.stopAllClips());
  }
}

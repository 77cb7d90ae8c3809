import type { HostThreadGuard } from "../bridge/scheduler/host-guard";
import type { SessionSeed } from "../config/settings";
import { Browser, BrowserItem, loadBrowserCatalog } from "./browser";
import type { Device } from "./device";
import { HostError } from "./errors";
import { Track, type TrackKind } from "./track";

export const MIN_TEMPO = 20;
export const MAX_TEMPO = 999;

export class Scene {
  private _name: string;

  constructor(
    private readonly guard: HostThreadGuard,
    name: string,
  ) {
    this._name = name;
  }

  get name(): string {
    return this._name;
  }

  setName(name: string): void {
    this.guard.assertOnHost("Scene.setName");
    this._name = name;
  }
}

const RETURN_TRACK_LETTERS = "ABCDEFGHIJKL";

/**
 * In-process model of the live set.
 *
 * Collections are replaced wholesale on every structural change rather than edited in
 * place, so a reader holding a collection never observes it half-updated.
 */
export class LiveSession {
  private _tempo: number;
  private _playing = false;
  private _songTime = 0;
  private _recordMode = false;
  private _overdub = false;
  private _metronome = false;
  private _tracks: Track[];
  private _scenes: Scene[];
  private _selectedTrack: Track | null = null;
  readonly signatureNumerator = 4;
  readonly signatureDenominator = 4;
  readonly returnTracks: readonly Track[];
  readonly masterTrack: Track;
  readonly browser: Browser;

  constructor(
    private readonly guard: HostThreadGuard,
    seed: SessionSeed,
    browser: Browser = loadBrowserCatalog(),
  ) {
    this._tempo = seed.tempo;
    this.browser = browser;
    this._scenes = Array.from(
      { length: seed.scenes },
      (_, index) => new Scene(guard, String(index + 1)),
    );
    this.returnTracks = Array.from(
      { length: seed.returnTracks },
      (_, index) =>
        new Track(guard, {
          kind: "return",
          name: `${RETURN_TRACK_LETTERS[index] ?? String(index + 1)}-Return`,
          slotCount: 0,
          sendCount: seed.returnTracks,
        }),
    );
    this.masterTrack = new Track(guard, {
      kind: "master",
      name: "Master",
      slotCount: 0,
      sendCount: 0,
    });
    this._tracks = seed.tracks.map((track, index) =>
      this.buildTrack(track.kind, track.name ?? defaultTrackName(track.kind, index)),
    );
  }

  get tempo(): number {
    return this._tempo;
  }

  get isPlaying(): boolean {
    return this._playing;
  }

  get currentSongTime(): number {
    return this._songTime;
  }

  get recordMode(): boolean {
    return this._recordMode;
  }

  get overdub(): boolean {
    return this._overdub;
  }

  get metronome(): boolean {
    return this._metronome;
  }

  get tracks(): readonly Track[] {
    return this._tracks;
  }

  get scenes(): readonly Scene[] {
    return this._scenes;
  }

  get selectedTrack(): Track | null {
    return this._selectedTrack;
  }

  setTempo(tempo: number): void {
    this.guard.assertOnHost("Song.setTempo");
    if (!(tempo >= MIN_TEMPO && tempo <= MAX_TEMPO)) {
      throw new HostError(`Tempo ${tempo} is outside ${MIN_TEMPO}-${MAX_TEMPO} BPM`);
    }
    this._tempo = tempo;
  }

  startPlaying(): void {
    this.guard.assertOnHost("Song.startPlaying");
    this._playing = true;
  }

  stopPlaying(): void {
    this.guard.assertOnHost("Song.stopPlaying");
    this._playing = false;
  }

  setCurrentSongTime(time: number): void {
    this.guard.assertOnHost("Song.setCurrentSongTime");
    if (time < 0) {
      throw new HostError(`Song time must not be negative, got ${time}`);
    }
    this._songTime = time;
  }

  setRecordMode(enabled: boolean): void {
    this.guard.assertOnHost("Song.setRecordMode");
    this._recordMode = enabled;
  }

  setOverdub(enabled: boolean): void {
    this.guard.assertOnHost("Song.setOverdub");
    this._overdub = enabled;
  }

  setMetronome(enabled: boolean): void {
    this.guard.assertOnHost("Song.setMetronome");
    this._metronome = enabled;
  }

  /** Inserts a track at `index`, or appends it when `index` is -1. */
  createTrack(kind: "midi" | "audio", index: number): { index: number; track: Track } {
    this.guard.assertOnHost(kind === "midi" ? "Song.createMidiTrack" : "Song.createAudioTrack");
    const position = index === -1 ? this._tracks.length : index;
    if (position < 0 || position > this._tracks.length) {
      throw new HostError(`Track index ${index} out of range`);
    }
    const track = this.buildTrack(kind, defaultTrackName(kind, position));
    this._tracks = [...this._tracks.slice(0, position), track, ...this._tracks.slice(position)];
    return { index: position, track };
  }

  deleteTrack(index: number): Track {
    this.guard.assertOnHost("Song.deleteTrack");
    const track = this._tracks[index];
    if (!track) {
      throw new HostError(`Track index ${index} out of range`);
    }
    if (this._tracks.length === 1) {
      throw new HostError("Cannot delete the last track");
    }
    this._tracks = this._tracks.filter((_, i) => i !== index);
    if (this._selectedTrack === track) {
      this._selectedTrack = null;
    }
    return track;
  }

  createScene(index: number): { index: number; scene: Scene } {
    this.guard.assertOnHost("Song.createScene");
    const position = index === -1 ? this._scenes.length : index;
    if (position < 0 || position > this._scenes.length) {
      throw new HostError(`Scene index ${index} out of range`);
    }
    const scene = new Scene(this.guard, "");
    for (const track of this._tracks) {
      track.insertClipSlot(position);
    }
    this._scenes = [...this._scenes.slice(0, position), scene, ...this._scenes.slice(position)];
    return { index: position, scene };
  }

  deleteScene(index: number): Scene {
    this.guard.assertOnHost("Song.deleteScene");
    const scene = this._scenes[index];
    if (!scene) {
      throw new HostError(`Scene index ${index} out of range`);
    }
    if (this._scenes.length === 1) {
      throw new HostError("Cannot delete the last scene");
    }
    for (const track of this._tracks) {
      track.removeClipSlot(index);
    }
    this._scenes = this._scenes.filter((_, i) => i !== index);
    return scene;
  }

  /** Launches every clip in the scene's row; tracks with an empty slot stop. */
  fireScene(index: number): number {
    this.guard.assertOnHost("Song.fireScene");
    if (!this._scenes[index]) {
      throw new HostError(`Scene index ${index} out of range`);
    }
    let fired = 0;
    for (const track of this._tracks) {
      const slot = track.clipSlots[index];
      if (slot?.hasClip) {
        slot.fire();
        fired += 1;
      } else {
        track.stopAllClips();
      }
    }
    this._playing = true;
    return fired;
  }

  selectTrack(track: Track): void {
    this.guard.assertOnHost("Song.selectTrack");
    this._selectedTrack = track;
  }

  /** Loads a browser item onto the selected track. */
  loadItem(item: BrowserItem): Device {
    this.guard.assertOnHost("Browser.loadItem");
    const track = this._selectedTrack;
    if (!track) {
      throw new HostError("No track selected");
    }
    if (!item.device) {
      throw new HostError(`Browser item "${item.name}" is not loadable`);
    }
    return track.loadDevice(item.device);
  }

  private buildTrack(kind: TrackKind, name: string): Track {
    return new Track(this.guard, {
      kind,
      name,
      slotCount: this._scenes.length,
      sendCount: this.returnTracks.length,
    });
  }
}

function defaultTrackName(kind: TrackKind, position: number): string {
  return `${position + 1}-${kind === "midi" ? "MIDI" : "Audio"}`;
}

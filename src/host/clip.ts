import type { HostThreadGuard } from "../bridge/scheduler/host-guard";
import { HostError } from "./errors";

export type MidiNote = {
  pitch: number;
  startTime: number;
  duration: number;
  velocity: number;
  mute: boolean;
};

export type ClipInit = {
  name: string;
  length: number;
  /** Arrangement position in beats; session clips sit at 0. */
  startTime?: number;
  notes?: readonly MidiNote[];
};

function compareNotes(a: MidiNote, b: MidiNote): number {
  return a.startTime - b.startTime || a.pitch - b.pitch;
}

export class Clip {
  private _name: string;
  private _notes: MidiNote[];
  private _looping = true;
  private _loopStart = 0;
  private _loopEnd: number;
  private _playing = false;
  readonly length: number;
  readonly startTime: number;
  readonly isMidiClip = true;

  constructor(
    private readonly guard: HostThreadGuard,
    init: ClipInit,
  ) {
    this._name = init.name;
    this.length = init.length;
    this.startTime = init.startTime ?? 0;
    this._loopEnd = init.length;
    this._notes = [...(init.notes ?? [])].sort(compareNotes);
  }

  get name(): string {
    return this._name;
  }

  get looping(): boolean {
    return this._looping;
  }

  get loopStart(): number {
    return this._loopStart;
  }

  get loopEnd(): number {
    return this._loopEnd;
  }

  get isPlaying(): boolean {
    return this._playing;
  }

  get notes(): readonly MidiNote[] {
    return this._notes;
  }

  setName(name: string): void {
    this.guard.assertOnHost("Clip.setName");
    this._name = name;
  }

  /** Adds notes to the clip; existing notes are kept. */
  addNotes(notes: readonly MidiNote[]): void {
    this.guard.assertOnHost("Clip.addNotes");
    for (const note of notes) {
      if (note.pitch < 0 || note.pitch > 127) {
        throw new HostError(`Note pitch ${note.pitch} is outside 0-127`);
      }
      if (note.duration <= 0) {
        throw new HostError(`Note duration must be positive, got ${note.duration}`);
      }
    }
    this._notes = [...this._notes, ...notes].sort(compareNotes);
  }

  setLoop(start: number, end: number): void {
    this.guard.assertOnHost("Clip.setLoop");
    if (start < 0 || end <= start) {
      throw new HostError(`Invalid loop range ${start}-${end}: end must be greater than start`);
    }
    this._looping = true;
    this._loopStart = start;
    this._loopEnd = end;
  }

  setPlaying(playing: boolean): void {
    this.guard.assertOnHost("Clip.setPlaying");
    this._playing = playing;
  }

  copy(startTime = this.startTime): Clip {
    const copy = new Clip(this.guard, {
      name: this._name,
      length: this.length,
      startTime,
      notes: this._notes,
    });
    copy._looping = this._looping;
    copy._loopStart = this._loopStart;
    copy._loopEnd = this._loopEnd;
    return copy;
  }
}

export class ClipSlot {
  private _clip: Clip | null = null;

  constructor(
    private readonly guard: HostThreadGuard,
    private readonly onFire: (slot: ClipSlot) => void,
  ) {}

  get clip(): Clip | null {
    return this._clip;
  }

  get hasClip(): boolean {
    return this._clip !== null;
  }

  createClip(length: number, name = "MIDI Clip"): Clip {
    this.guard.assertOnHost("ClipSlot.createClip");
    if (this._clip) {
      throw new HostError("Clip slot already has a clip");
    }
    if (!(length > 0)) {
      throw new HostError(`Clip length must be positive, got ${length}`);
    }
    this._clip = new Clip(this.guard, { name, length });
    return this._clip;
  }

  place(clip: Clip): void {
    this.guard.assertOnHost("ClipSlot.place");
    if (this._clip) {
      throw new HostError("Clip slot already has a clip");
    }
    this._clip = clip;
  }

  deleteClip(): void {
    this.guard.assertOnHost("ClipSlot.deleteClip");
    if (!this._clip) {
      throw new HostError("No clip in slot");
    }
    this._clip = null;
  }

  fire(): void {
    this.guard.assertOnHost("ClipSlot.fire");
    if (!this._clip) {
      throw new HostError("No clip in slot");
    }
    this.onFire(this);
    this._clip.setPlaying(true);
  }

  stop(): void {
    this.guard.assertOnHost("ClipSlot.stop");
    this._clip?.setPlaying(false);
  }
}

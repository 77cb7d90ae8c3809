import type { HostThreadGuard } from "../bridge/scheduler/host-guard";
import { HostError } from "./errors";

export const DEVICE_TYPES = [
  "instrument",
  "audio_effect",
  "midi_effect",
  "drum_machine",
  "rack",
] as const;
export type DeviceType = (typeof DEVICE_TYPES)[number];

export type ParameterTemplate = {
  name: string;
  min: number;
  max: number;
  value: number;
  quantized?: boolean;
};

export type DeviceTemplate = {
  name: string;
  className: string;
  type: DeviceType;
  parameters: readonly ParameterTemplate[];
};

export class DeviceParameter {
  private _value: number;
  readonly name: string;
  readonly min: number;
  readonly max: number;
  readonly isQuantized: boolean;

  constructor(
    private readonly guard: HostThreadGuard,
    template: ParameterTemplate,
  ) {
    this.name = template.name;
    this.min = template.min;
    this.max = template.max;
    this.isQuantized = template.quantized ?? false;
    this._value = template.value;
  }

  get value(): number {
    return this._value;
  }

  setValue(value: number): void {
    this.guard.assertOnHost("DeviceParameter.setValue");
    if (value < this.min || value > this.max) {
      throw new HostError(
        `Value ${value} for parameter "${this.name}" is outside ${this.min}-${this.max}`,
      );
    }
    this._value = this.isQuantized ? Math.round(value) : value;
  }
}

const DEVICE_ON = "Device On";

export class Device {
  readonly name: string;
  readonly className: string;
  readonly type: DeviceType;
  readonly parameters: readonly DeviceParameter[];

  constructor(guard: HostThreadGuard, template: DeviceTemplate) {
    this.name = template.name;
    this.className = template.className;
    this.type = template.type;
    const hasOnSwitch = template.parameters.some((param) => param.name === DEVICE_ON);
    const parameters = hasOnSwitch
      ? template.parameters
      : [{ name: DEVICE_ON, min: 0, max: 1, value: 1, quantized: true }, ...template.parameters];
    this.parameters = parameters.map((param) => new DeviceParameter(guard, param));
  }

  get canHaveDrumPads(): boolean {
    return this.type === "drum_machine";
  }

  get canHaveChains(): boolean {
    return this.type === "drum_machine" || this.type === "rack";
  }

  get isActive(): boolean {
    return this.onSwitch().value >= 0.5;
  }

  setEnabled(enabled: boolean): void {
    this.onSwitch().setValue(enabled ? 1 : 0);
  }

  private onSwitch(): DeviceParameter {
    const param = this.parameters.find((candidate) => candidate.name === DEVICE_ON);
    if (!param) {
      throw new HostError(`Device "${this.name}" has no on/off switch`);
    }
    return param;
  }
}

import { z } from "zod";
import { defineCommand, ok } from "../bridge/registry/define";
import { deviceType, getDevice, getParameter, trackIndex } from "./shared";

const deviceParams = z.object({ track_index: trackIndex, device_index: z.number().int() });

export const deviceCommands = {
  get_device_info: defineCommand({
    params: deviceParams,
    run(session, params) {
      const found = getDevice(session, params.track_index, params.device_index);
      if (!found.ok) {
        return found;
      }
      const { device } = found.value;
      return ok({
        track_index: params.track_index,
        device_index: params.device_index,
        name: device.name,
        class_name: device.className,
        type: deviceType(device),
        is_active: device.isActive,
        parameter_count: device.parameters.length,
      });
    },
  }),

  get_device_parameters: defineCommand({
    params: deviceParams,
    run(session, params) {
      const found = getDevice(session, params.track_index, params.device_index);
      if (!found.ok) {
        return found;
      }
      const { device } = found.value;
      return ok({
        track_index: params.track_index,
        device_index: params.device_index,
        device_name: device.name,
        parameters: device.parameters.map((param, index) => ({
          index,
          name: param.name,
          value: param.value,
          min: param.min,
          max: param.max,
          is_quantized: param.isQuantized,
        })),
      });
    },
  }),

  set_device_parameter: defineCommand({
    params: deviceParams.extend({ param_index: z.number().int(), value: z.number() }),
    run(session, params) {
      const found = getDevice(session, params.track_index, params.device_index);
      if (!found.ok) {
        return found;
      }
      const param = getParameter(found.value.device, params.param_index);
      if (!param.ok) {
        return param;
      }
      param.value.setValue(params.value);
      return ok({
        device_name: found.value.device.name,
        parameter_name: param.value.name,
        value: param.value.value,
      });
    },
  }),

  set_device_enabled: defineCommand({
    params: deviceParams.extend({ enabled: z.boolean() }),
    run(session, params) {
      const found = getDevice(session, params.track_index, params.device_index);
      if (!found.ok) {
        return found;
      }
      const { device } = found.value;
      device.setEnabled(params.enabled);
      return ok({ device_name: device.name, enabled: device.isActive });
    },
  }),

  delete_device: defineCommand({
    params: deviceParams,
    run(session, params) {
      const found = getDevice(session, params.track_index, params.device_index);
      if (!found.ok) {
        return found;
      }
      const removed = found.value.track.deleteDevice(params.device_index);
      return ok({
        deleted: true,
        device_name: removed.name,
        device_count: found.value.track.devices.length,
      });
    },
  }),
};

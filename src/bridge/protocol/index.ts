export {
  FrameDecoder,
  parseCommand,
  encodeCommand,
  encodeResponse,
  decodeResponse,
  type DecodedFrame,
  type FrameDecoderOptions,
} from "./frame-codec";
export {
  BridgeResponseSchema,
  successResponse,
  toErrorResponse,
  type BridgeErrorKind,
  type BridgeFailure,
  type BridgeResponse,
  type Command,
  type CommandParams,
  type ErrorResponse,
  type SuccessResponse,
} from "./types";

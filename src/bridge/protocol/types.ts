import { z } from "zod";

export type CommandParams = Record<string, unknown>;

export type Command = {
  type: string;
  params: CommandParams;
};

export type SuccessResponse = {
  status: "success";
  result: unknown;
  /** Informational note from the handler. */
  message?: string;
};

export type ErrorResponse = {
  status: "error";
  message: string;
};

export type BridgeResponse = SuccessResponse | ErrorResponse;

export const BridgeResponseSchema = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("success"),
    result: z.unknown(),
    message: z.string().optional(),
  }),
  z.object({
    status: z.literal("error"),
    message: z.string(),
  }),
]);

export type BridgeErrorKind =
  | "malformed_request"
  | "unknown_command"
  | "invalid_params"
  | "domain_error"
  | "scheduling_timeout";

export type BridgeFailure = {
  kind: BridgeErrorKind;
  message: string;
};

export function successResponse(result: unknown, message?: string): SuccessResponse {
  return message === undefined
    ? { status: "success", result }
    : { status: "success", result, message };
}

export function toErrorResponse(failure: BridgeFailure): ErrorResponse {
  return { status: "error", message: failure.message };
}

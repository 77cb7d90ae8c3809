import JSON5 from "json5";
import pc from "picocolors";
import { BridgeClient } from "../../bridge/client";
import type { CommandParams } from "../../bridge/protocol";

export type SendOptions = {
  host?: string;
  port?: number;
  timeout?: number;
  json?: boolean;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

/** Params are written loosely on the command line: `{track_index: 0, name: 'Bass'}`. */
export function parseParamsArgument(raw?: string): CommandParams {
  if (raw === undefined || !raw.trim()) {
    return {};
  }
  let parsed: unknown;
  try {
    parsed = JSON5.parse(raw);
  } catch (error) {
    throw new Error(
      `Params must be JSON5: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  if (!isRecord(parsed)) {
    throw new Error("Params must be a JSON object");
  }
  return parsed;
}

export async function sendCommand(
  type: string,
  rawParams: string | undefined,
  options: SendOptions,
): Promise<void> {
  let params: CommandParams;
  try {
    params = parseParamsArgument(rawParams);
  } catch (error) {
    console.error(pc.red(error instanceof Error ? error.message : String(error)));
    process.exit(1);
  }

  const client = new BridgeClient({
    host: options.host,
    port: options.port,
    timeoutMs: options.timeout,
  });
  try {
    const response = await client.send(type, params);
    if (options.json) {
      console.log(JSON.stringify(response, null, 2));
    } else if (response.status === "success") {
      console.log(pc.green("success"));
      console.log(JSON.stringify(response.result, null, 2));
      if (response.message) {
        console.log(pc.gray(response.message));
      }
    } else {
      console.error(`${pc.red("error")} ${response.message}`);
    }
    if (response.status === "error") {
      process.exitCode = 1;
    }
  } catch (error) {
    console.error(pc.red(error instanceof Error ? error.message : String(error)));
    process.exitCode = 1;
  } finally {
    client.close();
  }
}

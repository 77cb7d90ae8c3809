export { BridgeHost, type BridgeHostOptions, type BridgeStatus } from "./host";
export { BridgeClient, type BridgeClientOptions } from "./client";
export { BridgeServer, ConnectionWorker, type BridgeServerOptions } from "./server";
export {
  CommandDispatcher,
  formatParamIssues,
  type DispatcherOptions,
  type DispatchMeta,
} from "./dispatcher";
export {
  isRecoverableSocketError,
  registerProcessErrorHandlers,
} from "./process-error-handlers";
export * from "./protocol";
export * from "./registry";
export * from "./scheduler";

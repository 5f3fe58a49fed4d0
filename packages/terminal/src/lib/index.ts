/**
 * Terminal Library - Public API
 *
 * Runtime layer (runtime/main.ts) wires these together.
 */

export { HttpBackendTransport, WsBackendTransport, deliverBackendMessage } from "./backend-transport.js";
export { ConfigError, ConfigManager, terminalConfigSchema } from "./config-manager.js";
export { RelayError, SimulatedRelay } from "./machine-relay.js";
export {
  DEFAULT_ABSOLUTE_TIMEOUT_MS,
  MachineUsageStateMachine,
  WrongStateError,
} from "./machine-usage.js";
export { RequestBroker } from "./request-broker.js";
export {
  DEFAULT_REQUEST_TIMEOUT_MS,
  SessionCreationStateMachine,
  isTerminalState,
} from "./session-creation.js";
export { SessionRegistry } from "./session-registry.js";
export { SimulatedTag } from "./simulated-tag.js";
export {
  AUTHORIZATION_KEY_SLOT,
  TagAuthenticationRelay,
  describeTagFailure,
} from "./tag-auth-relay.js";
export { TerminalService } from "./terminal-service.js";
export { TokenSession } from "./token-session.js";
export { FileUsageHistoryStore } from "./usage-history-store.js";
export { BrokerUsageUploader } from "./usage-uploader.js";

export type { BackendTransportConfig } from "./backend-transport.js";
export type { TerminalConfigOverrides, TerminalPersistedConfig } from "./config-manager.js";
export type { MachineRelay } from "./machine-relay.js";
export type { MachineDescriptor, MachineUsageOptions, MachineUsageState } from "./machine-usage.js";
export type {
  BackendTransport,
  PendingRequestHandle,
  RequestHandlers,
  ResponseReceiver,
} from "./request-broker.js";
export type {
  SessionCreationOptions,
  SessionCreationState,
  StateChangeListener,
} from "./session-creation.js";
export type { SimulatedTagOptions } from "./simulated-tag.js";
export type { NfcTransceiver, TagFailure, TagResult } from "./tag-auth-relay.js";
export type { TerminalServiceOptions, TerminalSnapshot } from "./terminal-service.js";
export type { UsageHistoryStore } from "./usage-history-store.js";
export type { UsageUploader } from "./usage-uploader.js";

export { ConnectionRegistry } from "./registry"
export type { ConnectionHandle, ConnectionRegistryOptions, Session } from "./registry"
export { Publisher } from "./publisher"
export type { DeliveryOutcome } from "./publisher"
export { ProtocolSession } from "./session"
export type { ProtocolSessionDeps, SessionState, Transport } from "./session"
export { decodeCommand, decodeEventFrame } from "./protocol"

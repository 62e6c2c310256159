// src/index.ts

export { EipClient } from './client.js';
export { EipSession, type EipSessionOptions } from './session.js';
export { SegmentedTransfer, writeHeaderFor } from './transfer/segmented-transfer.js';
export {
  TypeResolver,
  DEFAULT_MAX_CHAIN_LENGTH,
  DEFAULT_MAX_NESTING_DEPTH,
  type DiscoveryResult,
} from './resolver/type-resolver.js';
export { VariableRegistry, isSystemVariable } from './registry/variable-registry.js';
export { ControllerEmulator } from './controller-emulator/controller-emulator.js';
export { NodeTcpTransport } from './transport/node-transports/node-tcp-transport.js';
export { EmulatorTransport } from './transport/emulator-transport.js';
export { createTransport } from './transport/factory.js';
export { Diagnostics } from './utils/diagnostics.js';
export { defaultLogger } from './logger.js';
export { default as Logger } from './logger.js';

export * from './errors.js';
export * from './constants/constants.js';
export * from './cip/cip-message.js';
export * from './cip/path-builder.js';
export * from './cip/data-types.js';
export * from './framers/encapsulation.js';
export * from './framers/common-packet-format.js';
export type * from './types/eip-types.js';

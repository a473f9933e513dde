// Asset Registry - Core Package

// Core types, constants and events
export * from './types.js';

// Error kinds
export * from './errors.js';

// Storage boundary and typed state
export * from './storage.js';
export * from './registry-state.js';

// Enumeration index
export * from './enumeration.js';

// Operations (intents) for dispatch and replay
export type {
  MintOperation,
  ApproveOperation,
  SetOperatorApprovalOperation,
  TransferOperation,
  BurnOperation,
  RegistryOperation,
  OperationResult,
} from './operations.js';

// Registry
export type { SerializedRegistry } from './registry.js';
export { AssetRegistry } from './registry.js';

// Consistency audit
export * from './audit.js';

/**
 * Fleetform - multi-provider Kubernetes cluster provisioning with Terraform
 * Main entry point for the package
 */

export * from './core';
export * from './errors';

// Providers
export * from './providers/azure';
export * from './providers/triton';
export {
  NODE_ROLES,
  NodeRoleSchema,
  hostLabels,
  RegistryInputV1Schema,
  ManagerCommonInputV1Schema,
  type NodeRole,
  type RegistryInputV1,
  type ManagerCommonInputV1
} from './providers/common';

export { redactSecrets } from './tools/redact';
export { getLogger, setLogVerbosity, type AppLogger } from './log/utils';

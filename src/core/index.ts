/**
 * Fleetform Core Module
 * State engine: documents, backends, provisioning coordinator and fleet workflows
 */

// Workflows
export { FleetManager } from './manager';
export type { FleetManagerArgs, CreateNodesArgs } from './manager';
export { ProvisionCoordinator } from './coordinator';
export type {
  CoordinatorPhase,
  ProvisionAction,
  ProvisionPlan,
  ProvisionResult,
  PhaseListener,
  ProvisionCoordinatorArgs
} from './coordinator';

// Configuration
export { ConfigLoader, DEFAULT_CORE_CONFIG, CoreConfigSchema } from './config';
export type { CoreConfig, CoreConfigInput, StateBackendConfig } from './config';

// State documents
export * from './state';

// Backends and provisioners
export * from './backend';
export * from './provisioner';

// Branded types
export type { ModuleName, TargetName, Hostname, Brand } from './types/branded';
export { CoreBrandedTypeCreators } from './types/branded';

// Validation
export { CoreValidators, CORE_VALIDATION_PATTERNS } from './validation/patterns';
export { parseInput } from './validation/input';

// Common types
export { isJsonObject, isJsonArray } from './types';
export type { ModuleRecord, JsonValue, JsonObject, JsonArray } from './types';

// Constants
export {
  SUPPORTED_PROVIDERS,
  FLEETFORM_PROVIDER_AZURE,
  FLEETFORM_PROVIDER_TRITON,
  MANAGER_MODULE_NAME,
  CLUSTER_MODULE_PREFIX,
  NODE_MODULE_PREFIX,
  type FleetformProvider
} from './const';

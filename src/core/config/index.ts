/**
 * Core configuration module for Fleetform
 * 
 * @description Configuration of the Terraform binary, module sources, state backend
 * and state locking, loaded once and passed explicitly to every component.
 */

export {
    CoreConfigSchema,
    StateBackendConfigSchema,
    LocalStateBackendConfigSchema,
    S3StateBackendConfigSchema,
} from './interface'
export type {
    CoreConfig,
    CoreConfigInput,
    StateBackendConfig,
    LocalStateBackendConfig,
    S3StateBackendConfig,
} from './interface'
export { ConfigLoader, DEFAULT_CORE_CONFIG } from './default'

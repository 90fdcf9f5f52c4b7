/**
 * Core state management module for Fleetform
 * 
 * @description Cluster manager documents: decoding, in-memory mutation, deterministic
 * serialization, module keys and node name assignment.
 */

export { StateDocument } from './document'
export type { TerraformBackendBlock } from './document'
export {
    StateDocumentParser,
    StateDocumentSchema,
    ModuleRecordSchema,
    JsonValueSchema,
    canonicalJson,
    canonicalRecord,
} from './parser'
export type { ParsedDocument } from './parser'
export { assignNodeNames } from './namer'
export {
    clusterModuleName,
    nodeModuleName,
    moduleReference,
    clusterLinkReference,
    moduleSource,
    MANAGER_API_URL_REFERENCE,
    BaseModuleSchema,
    ManagerModuleSchema,
    ClusterModuleSchema,
    NodeModuleSchema,
} from './modules'
export type { ManagerModule, ClusterModule, NodeModule } from './modules'

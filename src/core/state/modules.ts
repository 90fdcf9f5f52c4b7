import { z } from "zod"
import {
    CLUSTER_MODULE_PREFIX,
    MANAGER_MODULE_NAME,
    NODE_CLUSTER_LINK_FIELD,
    NODE_MODULE_PREFIX,
    FleetformProvider,
} from "../const"
import { JsonValueSchema } from "./parser"

// Module keys

export function clusterModuleName(provider: FleetformProvider, clusterName: string): string {
    return `${CLUSTER_MODULE_PREFIX}${provider}_${clusterName}`
}

export function nodeModuleName(provider: FleetformProvider, hostname: string): string {
    return `${NODE_MODULE_PREFIX}${provider}_${hostname}`
}

// Terraform interpolation references to other modules' outputs.
// They are left for Terraform to resolve at apply time.

export function moduleReference(moduleName: string, output: string): string {
    return `\${module.${moduleName}.${output}}`
}

export function clusterLinkReference(clusterModuleName: string): string {
    return moduleReference(clusterModuleName, NODE_CLUSTER_LINK_FIELD)
}

export const MANAGER_API_URL_REFERENCE = `http://\${element(module.${MANAGER_MODULE_NAME}.masters, 0)}:8080`

export function moduleSource(moduleSourceUrl: string, modulePath: string): string {
    return `${moduleSourceUrl}//${modulePath}`
}

// Typed module variants. Every schema lets unknown fields through
// so records written by other versions round-trip untouched.

export const BaseModuleSchema = z.object({
    source: z.string().min(1).describe("Terraform module source"),
}).catchall(JsonValueSchema.optional())

export const ManagerModuleSchema = BaseModuleSchema.extend({
    name: z.string().min(1).describe("Cluster manager name"),
})

export const ClusterModuleSchema = BaseModuleSchema.extend({
    name: z.string().min(1).describe("Cluster name"),
    rancher_api_url: z.string().min(1),
})

export const NodeModuleSchema = BaseModuleSchema.extend({
    hostname: z.string().min(1),
    [NODE_CLUSTER_LINK_FIELD]: z.string().min(1).describe("Reference to the owning cluster"),
    rancher_api_url: z.string().min(1),
})

export type ManagerModule = z.infer<typeof ManagerModuleSchema>
export type ClusterModule = z.infer<typeof ClusterModuleSchema>
export type NodeModule = z.infer<typeof NodeModuleSchema>

import { z } from "zod"

export const RegistryInputV1Schema = z.object({
    url: z.string().min(1),
    username: z.string().optional(),
    password: z.string().optional(),
})

export type RegistryInputV1 = z.infer<typeof RegistryInputV1Schema>

/**
 * Terraform variables of a private registry, e.g. prefix 'rancher_registry'
 * gives rancher_registry, rancher_registry_username and rancher_registry_password.
 * Credentials are only passed along with a registry URL.
 */
export function registryVariables(prefix: string, registry: RegistryInputV1 | undefined): { [variable: string]: string | undefined } {
    if (registry === undefined) {
        return {}
    }
    return {
        [prefix]: registry.url,
        [`${prefix}_username`]: registry.username,
        [`${prefix}_password`]: registry.password,
    }
}

/**
 * Settings shared by every cluster manager module, whatever the provider
 */
export const ManagerCommonInputV1Schema = z.object({
    name: z.string().min(1).describe("Cluster manager name"),
    ha: z.boolean().default(false).describe("Run the cluster manager in high availability mode"),
    adminPassword: z.string().min(1).describe("Cluster manager admin password"),
    serverImage: z.string().optional().describe("Cluster manager server image, defaults to the module's"),
    agentImage: z.string().optional().describe("Cluster manager agent image, defaults to the module's"),
    registry: RegistryInputV1Schema.optional().describe("Private registry serving cluster manager images"),
})

export type ManagerCommonInputV1 = z.infer<typeof ManagerCommonInputV1Schema>

export function managerCommonVariables(input: ManagerCommonInputV1) {
    return {
        name: input.name,
        ha: input.ha,
        rancher_admin_password: input.adminPassword,
        rancher_server_image: input.serverImage,
        rancher_agent_image: input.agentImage,
        ...registryVariables("rancher_registry", input.registry),
    }
}

export const NODE_ROLES = ["compute", "etcd", "orchestration"] as const

export type NodeRole = typeof NODE_ROLES[number]

export const NodeRoleSchema = z.enum(NODE_ROLES)

/**
 * Host labels telling the cluster manager which role a node plays
 */
export function hostLabels(role: NodeRole): { [label: string]: string } {
    return { [role]: "true" }
}

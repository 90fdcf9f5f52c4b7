import { z } from "zod"
import { ManagerCommonInputV1Schema, managerCommonVariables } from "../common"
import { ManagerModule, ManagerModuleSchema, moduleSource } from "../../core/state/modules"
import { parseInput } from "../../core/validation/input"
import { CoreConfig } from "../../core/config/interface"

export const AZURE_MANAGER_MODULE_PATH = "terraform/modules/azure-rancher"

export const AZURE_ENVIRONMENTS = ["public", "government", "german", "china"] as const

export const AzureManagerInputV1Schema = ManagerCommonInputV1Schema.extend({
    subscriptionId: z.string().min(1).describe("Azure subscription ID"),
    clientId: z.string().min(1).describe("Azure service principal client ID"),
    clientSecret: z.string().min(1).describe("Azure service principal client secret"),
    tenantId: z.string().min(1).describe("Azure tenant ID"),
    environment: z.enum(AZURE_ENVIRONMENTS).default("public").describe("Azure cloud environment"),
    location: z.string().min(1).describe("Azure location, e.g. 'West US 2'"),
    resourceGroupName: z.string().min(1).optional().describe("Resource group, defaults to the manager name"),
    size: z.string().min(1).describe("VM size, e.g. 'Standard_D2_v3'"),
    image: z.object({
        publisher: z.string().min(1),
        offer: z.string().min(1),
        sku: z.string().min(1),
        version: z.string().min(1).default("latest"),
    }).optional().describe("VM image, defaults to the module's"),
    sshUser: z.string().min(1).default("ubuntu"),
    publicKeyPath: z.string().min(1),
    privateKeyPath: z.string().min(1),
})

export type AzureManagerInputV1 = z.infer<typeof AzureManagerInputV1Schema>

/**
 * Cluster manager module running on Azure
 */
export class AzureManagerModuleBuilder {

    constructor(private readonly coreConfig: CoreConfig) {}

    /**
     * @throws InvalidInputError if input is incomplete or invalid
     */
    build(rawInput: unknown): ManagerModule {
        const input = parseInput(AzureManagerInputV1Schema, rawInput, "Azure cluster manager")

        return ManagerModuleSchema.parse({
            source: moduleSource(this.coreConfig.terraform.moduleSourceUrl, AZURE_MANAGER_MODULE_PATH),
            ...managerCommonVariables(input),
            azure_subscription_id: input.subscriptionId,
            azure_client_id: input.clientId,
            azure_client_secret: input.clientSecret,
            azure_tenant_id: input.tenantId,
            azure_environment: input.environment,
            azure_location: input.location,
            azure_resource_group_name: input.resourceGroupName ?? input.name,
            azure_size: input.size,
            azure_image_publisher: input.image?.publisher,
            azure_image_offer: input.image?.offer,
            azure_image_sku: input.image?.sku,
            azure_image_version: input.image?.version,
            azure_ssh_user: input.sshUser,
            azure_public_key_path: input.publicKeyPath,
            azure_private_key_path: input.privateKeyPath,
        })
    }
}

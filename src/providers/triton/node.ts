import { z } from "zod"
import { TritonCredentialsV1Schema, tritonCredentialVariables } from "./credentials"
import { hostLabels, NodeRoleSchema, RegistryInputV1Schema, registryVariables } from "../common"
import {
    clusterLinkReference,
    MANAGER_API_URL_REFERENCE,
    moduleSource,
    NodeModule,
    NodeModuleSchema,
} from "../../core/state/modules"
import { parseInput } from "../../core/validation/input"
import { CoreValidators } from "../../core/validation/patterns"
import { CoreConfig } from "../../core/config/interface"

export const TRITON_NODE_MODULE_PATH = "terraform/modules/triton-rancher-k8s-host"

export const TritonNodeInputV1Schema = z.object({
    hostname: z.string().min(1)
        .refine(h => CoreValidators.isValidHostname(h), "must be a valid hostname label")
        .describe("Base hostname, suffixed with '-<n>' when taken or when creating several nodes"),
    count: z.number().int().min(1).default(1),
    role: NodeRoleSchema.describe("Role of the node in its cluster"),
    credentials: TritonCredentialsV1Schema,
    networkNames: z.array(z.string().min(1)).min(1).describe("Triton networks to attach"),
    imageName: z.string().min(1),
    imageVersion: z.string().min(1),
    sshUser: z.string().min(1).default("root"),
    machinePackage: z.string().min(1).describe("Triton machine package, e.g. 'k4-highcpu-kvm-1.75G'"),
    rancherRegistry: RegistryInputV1Schema.optional(),
    k8sRegistry: RegistryInputV1Schema.optional(),
})

export type TritonNodeInputV1 = z.infer<typeof TritonNodeInputV1Schema>

/**
 * Node modules joining a Triton host to an existing cluster.
 *
 * Input is validated once with parse(), then build() is called for every hostname
 * assigned to the new nodes.
 */
export class TritonNodeModuleBuilder {

    constructor(private readonly coreConfig: CoreConfig) {}

    /**
     * @throws InvalidInputError if input is incomplete or invalid
     */
    parse(rawInput: unknown): TritonNodeInputV1 {
        return parseInput(TritonNodeInputV1Schema, rawInput, "Triton node")
    }

    build(input: TritonNodeInputV1, clusterKey: string, hostname: string): NodeModule {
        return NodeModuleSchema.parse({
            source: moduleSource(this.coreConfig.terraform.moduleSourceUrl, TRITON_NODE_MODULE_PATH),
            hostname: hostname,
            rancher_api_url: MANAGER_API_URL_REFERENCE,
            rancher_environment_id: clusterLinkReference(clusterKey),
            rancher_host_labels: hostLabels(input.role),
            ...tritonCredentialVariables(input.credentials),
            triton_network_names: input.networkNames,
            triton_image_name: input.imageName,
            triton_image_version: input.imageVersion,
            triton_ssh_user: input.sshUser,
            triton_machine_package: input.machinePackage,
            ...registryVariables("rancher_registry", input.rancherRegistry),
            ...registryVariables("k8s_registry", input.k8sRegistry),
        })
    }
}

import { z } from "zod"
import { TritonCredentialsV1Schema, tritonCredentialVariables } from "./credentials"
import { RegistryInputV1Schema, registryVariables } from "../common"
import {
    ClusterModule,
    ClusterModuleSchema,
    clusterModuleName,
    MANAGER_API_URL_REFERENCE,
    moduleSource,
} from "../../core/state/modules"
import { parseInput } from "../../core/validation/input"
import { CORE_VALIDATION_PATTERNS } from "../../core/validation/patterns"
import { CoreConfig } from "../../core/config/interface"
import { FLEETFORM_PROVIDER_TRITON } from "../../core/const"

export const TRITON_CLUSTER_MODULE_PATH = "terraform/modules/triton-rancher-k8s"

export const PLANE_ISOLATION_MODES = ["none", "required"] as const

export const TritonClusterInputV1Schema = z.object({
    name: z.string().min(1).regex(CORE_VALIDATION_PATTERNS.TARGET_NAME, "letters, digits, '_' and '-' only").describe("Cluster name"),
    credentials: TritonCredentialsV1Schema,
    planeIsolation: z.enum(PLANE_ISOLATION_MODES).default("none")
        .describe("'required' keeps etcd and orchestration on dedicated nodes"),
    k8sRegistry: RegistryInputV1Schema.optional().describe("Private registry serving Kubernetes images"),
})

export type TritonClusterInputV1 = z.infer<typeof TritonClusterInputV1Schema>

export interface TritonClusterModule {
    key: string
    record: ClusterModule
}

export class TritonClusterModuleBuilder {

    constructor(private readonly coreConfig: CoreConfig) {}

    /**
     * @throws InvalidInputError if input is incomplete or invalid
     */
    build(rawInput: unknown): TritonClusterModule {
        const input = parseInput(TritonClusterInputV1Schema, rawInput, "Triton cluster")

        const record = ClusterModuleSchema.parse({
            source: moduleSource(this.coreConfig.terraform.moduleSourceUrl, TRITON_CLUSTER_MODULE_PATH),
            name: input.name,
            rancher_api_url: MANAGER_API_URL_REFERENCE,
            k8s_plane_isolation: input.planeIsolation,
            ...tritonCredentialVariables(input.credentials),
            ...registryVariables("k8s_registry", input.k8sRegistry),
        })

        return {
            key: clusterModuleName(FLEETFORM_PROVIDER_TRITON, input.name),
            record: record,
        }
    }
}

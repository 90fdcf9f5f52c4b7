import * as path from 'path'
import * as os from 'os'

export const FLEETFORM_VERSION = "0.1.0"

/** Top-level section of the document holding module name to module record */
export const DOCUMENT_MODULE_SECTION = "module"

/** Top-level section holding Terraform settings, e.g. the backend block */
export const DOCUMENT_TERRAFORM_SECTION = "terraform"

/** File name of the document, both in scratch working directories and in state backends */
export const DOCUMENT_FILE_NAME = "main.tf.json"

export const TERRAFORM_STATE_FILE_NAME = "terraform.tfstate"

export const MANAGER_MODULE_NAME = "cluster-manager"
export const CLUSTER_MODULE_PREFIX = "cluster_"
export const NODE_MODULE_PREFIX = "node_"

/** Node module field linking a node to its cluster */
export const NODE_CLUSTER_LINK_FIELD = "rancher_environment_id"
export const NODE_HOSTNAME_FIELD = "hostname"

export const FLEETFORM_PROVIDER_AZURE = "azure"
export const FLEETFORM_PROVIDER_TRITON = "triton"

export const SUPPORTED_PROVIDERS = [
    FLEETFORM_PROVIDER_AZURE,
    FLEETFORM_PROVIDER_TRITON,
] as const

export type FleetformProvider = typeof SUPPORTED_PROVIDERS[number]

export const DEFAULT_TERRAFORM_BINARY = "terraform"
export const DEFAULT_MODULE_SOURCE_URL = "github.com/fleetform/fleetform-modules"

export function defaultDataDir(): string {
    return path.join(os.homedir(), ".fleetform")
}

import { getLogger } from "../log/utils"
import { redactSecrets } from "../tools/redact"
import { StateBackend } from "./backend/backend"
import { InfrastructureProvisioner } from "./provisioner/provisioner"
import { PhaseListener, ProvisionCoordinator } from "./coordinator"
import { StateDocument } from "./state/document"
import { assignNodeNames } from "./state/namer"
import { nodeModuleName } from "./state/modules"
import { CoreBrandedTypeCreators } from "./types/branded"
import { AlreadyExistsError, InvalidInputError, NamingCollisionError, NotFoundError } from "./errors/state"
import { CLUSTER_MODULE_PREFIX, FleetformProvider, MANAGER_MODULE_NAME, NODE_MODULE_PREFIX } from "./const"
import type { JsonValue, ModuleRecord } from "./types"

export interface FleetManagerArgs {
    backend: StateBackend
    provisioner: InfrastructureProvisioner
}

export interface CreateNodesArgs {

    /**
     * Module key of the cluster the nodes join, e.g. 'cluster_triton_dev'
     */
    clusterKey: string

    provider: FleetformProvider

    /**
     * Requested hostname, suffixed with '-<n>' when taken or when creating several nodes
     */
    baseName: string

    count: number

    /**
     * Build the module record of a node once its hostname is assigned.
     * clusterKey comes without any 'module.' prefix.
     */
    build: (hostname: string, clusterKey: string) => ModuleRecord
}

/**
 * Cluster manager, cluster and node lifecycle. Every change runs through
 * a ProvisionCoordinator so the backend is only written after Terraform succeeded.
 */
export class FleetManager {

    private readonly logger = getLogger(FleetManager.name)
    private readonly backend: StateBackend
    private readonly coordinator: ProvisionCoordinator

    constructor(args: FleetManagerArgs) {
        this.backend = args.backend
        this.coordinator = new ProvisionCoordinator(args)
    }

    onPhase(listener: PhaseListener): void {
        this.coordinator.onPhase(listener)
    }

    /**
     * Provision a new cluster manager. Terraform's own state is stored by the same backend.
     * @throws AlreadyExistsError if the target already has a cluster manager
     */
    async createManager(target: string, record: ModuleRecord): Promise<StateDocument> {
        const targetName = CoreBrandedTypeCreators.createTargetName(target)
        this.logger.debug(`Creating cluster manager ${targetName}`, redactSecrets(record))

        const result = await this.coordinator.run({
            target: targetName,
            operation: "create manager",
            action: "apply",
            requireExisting: false,
            mutate: doc => {
                if (doc.has(MANAGER_MODULE_NAME)) {
                    throw new AlreadyExistsError(`cluster manager '${targetName}'`, { target: targetName })
                }
                doc.setTerraformBackend(this.backend.terraformBackend(targetName))
                doc.setManager(record)
            },
        })

        this.logger.info(`Cluster manager ${targetName} created`)
        return result.document
    }

    /**
     * @throws NotFoundError if the cluster manager does not exist
     * @throws AlreadyExistsError if the cluster module already exists
     */
    async createCluster(target: string, clusterKey: string, record: ModuleRecord): Promise<StateDocument> {
        const key = this.moduleKey(clusterKey, CLUSTER_MODULE_PREFIX, "cluster")
        this.logger.debug(`Creating cluster ${key} on ${target}`, redactSecrets(record))

        const result = await this.coordinator.run({
            target: target,
            operation: `create cluster ${key}`,
            action: "apply",
            requireExisting: true,
            mutate: doc => {
                this.requireManager(doc, target)
                if (doc.has(key)) {
                    throw new AlreadyExistsError(`cluster '${key}'`, { target })
                }
                doc.add(key, record)
            },
        })

        this.logger.info(`Cluster ${key} created on ${target}`)
        return result.document
    }

    /**
     * Add `count` nodes to a cluster, named after `baseName` so that no hostname
     * collides with another node of the document.
     * @returns assigned hostnames
     * @throws NotFoundError if the cluster does not exist
     * @throws NamingCollisionError if a generated module key is already taken
     */
    async createNodes(target: string, args: CreateNodesArgs): Promise<string[]> {
        if (!Number.isFinite(args.count) || args.count < 1) {
            throw new InvalidInputError(`node count must be a finite number of at least 1, got ${args.count}`, { count: args.count })
        }
        CoreBrandedTypeCreators.createHostname(args.baseName)
        const clusterKey = this.moduleKey(args.clusterKey, CLUSTER_MODULE_PREFIX, "cluster")

        const result = await this.coordinator.run({
            target: target,
            operation: `create nodes ${args.baseName} in ${clusterKey}`,
            action: "apply",
            requireExisting: true,
            mutate: doc => {
                this.requireManager(doc, target)
                if (!doc.has(clusterKey)) {
                    throw new NotFoundError(`cluster '${clusterKey}'`, { target })
                }

                // hostnames are unique across clusters as they end up in module keys
                const hostnames = assignNodeNames(doc.nodeHostnames(), args.baseName, args.count)
                const records = hostnames.map(hostname => {
                    const key = nodeModuleName(args.provider, hostname)
                    if (doc.has(key)) {
                        throw new NamingCollisionError(key, { target, hostname })
                    }
                    return { key, record: args.build(hostname, clusterKey) }
                })

                for (const { key, record } of records) {
                    this.logger.debug(`Adding node ${key}`, redactSecrets(record))
                    doc.add(key, record)
                }
                return hostnames
            },
        })

        this.logger.info(`Nodes ${result.value.join(", ")} added to ${clusterKey} on ${target}`)
        return result.value
    }

    /**
     * @throws NotFoundError if the node does not exist
     */
    async destroyNode(target: string, nodeKey: string): Promise<StateDocument> {
        const key = this.moduleKey(nodeKey, NODE_MODULE_PREFIX, "node")

        const result = await this.coordinator.run({
            target: target,
            operation: `destroy node ${key}`,
            action: "destroy",
            requireExisting: true,
            destroyTargets: doc => {
                if (!doc.has(key)) {
                    throw new NotFoundError(`node '${key}'`, { target })
                }
                return [key]
            },
            mutate: doc => {
                doc.remove(key)
            },
        })

        this.logger.info(`Node ${key} destroyed on ${target}`)
        return result.document
    }

    /**
     * Destroy a cluster and every node linked to it.
     * @throws NotFoundError if the cluster does not exist
     */
    async destroyCluster(target: string, clusterKey: string): Promise<StateDocument> {
        const key = this.moduleKey(clusterKey, CLUSTER_MODULE_PREFIX, "cluster")

        const result = await this.coordinator.run({
            target: target,
            operation: `destroy cluster ${key}`,
            action: "destroy",
            requireExisting: true,
            destroyTargets: doc => {
                if (!doc.has(key)) {
                    throw new NotFoundError(`cluster '${key}'`, { target })
                }
                return [...doc.nodes(key), key]
            },
            mutate: doc => {
                for (const node of doc.nodes(key)) {
                    doc.remove(node)
                }
                doc.remove(key)
            },
        })

        this.logger.info(`Cluster ${key} destroyed on ${target}`)
        return result.document
    }

    /**
     * Destroy everything the cluster manager's document describes, then delete the document.
     * @throws NotFoundError if the cluster manager does not exist
     */
    async destroyManager(target: string): Promise<void> {
        await this.coordinator.run({
            target: target,
            operation: "destroy manager",
            action: "destroy",
            requireExisting: true,
            commit: "delete",
            destroyTargets: () => [],
            mutate: doc => {
                for (const name of doc.moduleNames()) {
                    doc.remove(name)
                }
            },
        })

        this.logger.info(`Cluster manager ${target} destroyed`)
    }

    async listManagers(): Promise<string[]> {
        return this.backend.list()
    }

    async listClusters(target: string): Promise<string[]> {
        const doc = await this.load(target)
        return doc.clusters()
    }

    /**
     * @throws NotFoundError if the cluster does not exist
     */
    async listNodes(target: string, clusterKey: string): Promise<string[]> {
        const key = this.moduleKey(clusterKey, CLUSTER_MODULE_PREFIX, "cluster")
        const doc = await this.load(target)
        if (!doc.has(key)) {
            throw new NotFoundError(`cluster '${key}'`, { target })
        }
        return doc.nodes(key)
    }

    /**
     * Value at a dotted path of the target's document, e.g. 'module.cluster_triton_dev.name'.
     * @returns undefined if the path does not resolve
     */
    async getOutput(target: string, path: string): Promise<JsonValue | undefined> {
        const doc = await this.load(target)
        return doc.get(path)
    }

    private async load(target: string): Promise<StateDocument> {
        return StateDocument.load(await this.backend.load(target))
    }

    private requireManager(doc: StateDocument, target: string): void {
        if (!doc.has(MANAGER_MODULE_NAME)) {
            throw new NotFoundError(`cluster manager '${target}'`, { target })
        }
    }

    /**
     * Module key stripped of any 'module.' prefix
     * @throws InvalidInputError if the key is not of the expected kind
     */
    private moduleKey(value: string, prefix: string, kind: string): string {
        const key = CoreBrandedTypeCreators.createModuleName(value)
        if (!key.startsWith(prefix)) {
            throw new InvalidInputError(`'${value}' is not a ${kind} module, expected a name starting with '${prefix}'`, { module: value })
        }
        return key
    }
}

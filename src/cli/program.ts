import * as fs from "fs"
import { Command, Option } from "@commander-js/extra-typings"
import { FleetManager } from "../core/manager"
import { ConfigLoader } from "../core/config/default"
import { CoreConfig } from "../core/config/interface"
import { createStateBackend } from "../core/backend/factory"
import { TerraformProvisioner } from "../core/provisioner/terraform"
import { InvalidInputError } from "../core/errors/state"
import { extractErrorDetails, isFleetformError, toError } from "../core/errors/taxonomy"
import { FLEETFORM_PROVIDER_AZURE, FLEETFORM_PROVIDER_TRITON, FLEETFORM_VERSION } from "../core/const"
import { AzureManagerModuleBuilder } from "../providers/azure/manager"
import { TritonClusterModuleBuilder } from "../providers/triton/cluster"
import { TritonNodeModuleBuilder } from "../providers/triton/node"
import { getLogger, setLogVerbosity } from "../log/utils"
import type { JsonValue } from "../core/types"

const LOG_LEVEL_DEBUG = 2

const CLI_OPTION_MANAGER = new Option('--manager <name>', 'Cluster manager name').makeOptionMandatory()
const CLI_OPTION_INPUT = new Option('--input <file>', 'JSON file holding the fully-resolved module input').makeOptionMandatory()

export interface BuildProgramArgs {
    coreConfig: CoreConfig
    fleet: FleetManager

    /**
     * Command output, one line per call. Defaults to stdout.
     */
    print?: (line: string) => void
}

/**
 * Read a module input file. Inputs are never prompted for.
 * @throws InvalidInputError if the file can't be read or isn't JSON
 */
export async function readInputFile(file: string): Promise<unknown> {
    let content: string
    try {
        content = await fs.promises.readFile(file, "utf-8")
    } catch (e) {
        throw new InvalidInputError(`cannot read input file ${file}: ${toError(e).message}`, { file })
    }
    try {
        return JSON.parse(content)
    } catch (e) {
        throw new InvalidInputError(`input file ${file} is not valid JSON: ${toError(e).message}`, { file })
    }
}

export function formatValue(value: JsonValue | undefined): string {
    if (value === undefined) {
        return ""
    }
    return typeof value === "string" ? value : JSON.stringify(value, null, 2)
}

export function buildProgram(args: BuildProgramArgs) {
    const fleet = args.fleet
    const print = args.print ?? ((line: string) => console.log(line))

    const program = new Command()
        .name('fleetform')
        .description('Provision multi-provider Kubernetes clusters with Terraform')
        .version(FLEETFORM_VERSION)
        .option('-v, --verbose', 'Verbose output')
        .hook('preAction', (thisCommand) => {
            if (thisCommand.opts().verbose) {
                setLogVerbosity(LOG_LEVEL_DEBUG)
            }
        })

    const create = new Command('create').description('Create a cluster manager, cluster or nodes')

    create.addCommand(new Command('manager')
        .description('Create a cluster manager')
        .addOption(new Option('--provider <provider>', 'Cloud provider').choices([FLEETFORM_PROVIDER_AZURE] as const).default(FLEETFORM_PROVIDER_AZURE))
        .addOption(CLI_OPTION_INPUT)
        .action(async (opts) => {
            const record = new AzureManagerModuleBuilder(args.coreConfig).build(await readInputFile(opts.input))
            await fleet.createManager(record.name, record)
            print(record.name)
        }))

    create.addCommand(new Command('cluster')
        .description('Create a cluster managed by an existing cluster manager')
        .addOption(CLI_OPTION_MANAGER)
        .addOption(new Option('--provider <provider>', 'Cloud provider').choices([FLEETFORM_PROVIDER_TRITON] as const).default(FLEETFORM_PROVIDER_TRITON))
        .addOption(CLI_OPTION_INPUT)
        .action(async (opts) => {
            const cluster = new TritonClusterModuleBuilder(args.coreConfig).build(await readInputFile(opts.input))
            await fleet.createCluster(opts.manager, cluster.key, cluster.record)
            print(cluster.key)
        }))

    create.addCommand(new Command('node')
        .description('Add nodes to an existing cluster')
        .addOption(CLI_OPTION_MANAGER)
        .requiredOption('--cluster <cluster>', 'Cluster module key, e.g. cluster_triton_dev')
        .addOption(new Option('--provider <provider>', 'Cloud provider').choices([FLEETFORM_PROVIDER_TRITON] as const).default<typeof FLEETFORM_PROVIDER_TRITON>(FLEETFORM_PROVIDER_TRITON))
        .addOption(CLI_OPTION_INPUT)
        .action(async (opts) => {
            const builder = new TritonNodeModuleBuilder(args.coreConfig)
            const input = builder.parse(await readInputFile(opts.input))
            const hostnames = await fleet.createNodes(opts.manager, {
                clusterKey: opts.cluster,
                provider: opts.provider,
                baseName: input.hostname,
                count: input.count,
                build: (hostname, clusterKey) => builder.build(input, clusterKey, hostname),
            })
            hostnames.forEach(h => print(h))
        }))

    const destroy = new Command('destroy').description('Destroy a cluster manager, cluster or node')

    destroy.addCommand(new Command('manager')
        .description('Destroy a cluster manager and everything it manages')
        .addOption(CLI_OPTION_MANAGER)
        .action(async (opts) => {
            await fleet.destroyManager(opts.manager)
        }))

    destroy.addCommand(new Command('cluster')
        .description('Destroy a cluster and its nodes')
        .addOption(CLI_OPTION_MANAGER)
        .requiredOption('--cluster <cluster>', 'Cluster module key')
        .action(async (opts) => {
            await fleet.destroyCluster(opts.manager, opts.cluster)
        }))

    destroy.addCommand(new Command('node')
        .description('Destroy a single node')
        .addOption(CLI_OPTION_MANAGER)
        .requiredOption('--node <node>', 'Node module key, e.g. node_triton_web-1')
        .action(async (opts) => {
            await fleet.destroyNode(opts.manager, opts.node)
        }))

    const get = new Command('get').description('Read stored state')

    get.addCommand(new Command('managers')
        .description('List cluster managers')
        .action(async () => {
            const managers = await fleet.listManagers()
            managers.forEach(m => print(m))
        }))

    get.addCommand(new Command('clusters')
        .description('List clusters of a cluster manager')
        .addOption(CLI_OPTION_MANAGER)
        .action(async (opts) => {
            const clusters = await fleet.listClusters(opts.manager)
            clusters.forEach(c => print(c))
        }))

    get.addCommand(new Command('nodes')
        .description('List nodes of a cluster')
        .addOption(CLI_OPTION_MANAGER)
        .requiredOption('--cluster <cluster>', 'Cluster module key')
        .action(async (opts) => {
            const nodes = await fleet.listNodes(opts.manager, opts.cluster)
            nodes.forEach(n => print(n))
        }))

    get.addCommand(new Command('value')
        .description('Print a value of the cluster manager document, e.g. module.cluster_triton_dev.name')
        .addOption(CLI_OPTION_MANAGER)
        .requiredOption('--path <path>', 'Dotted path from the document root')
        .action(async (opts) => {
            print(formatValue(await fleet.getOutput(opts.manager, opts.path)))
        }))

    program.addCommand(create)
    program.addCommand(destroy)
    program.addCommand(get)

    return program
}

/**
 * Error code, message and suggestions. Context is only shown with --verbose.
 */
export function logFullError(error: unknown): void {
    const logger = getLogger("cli")
    const details = extractErrorDetails(error)
    logger.error(details.code ? `[${details.code}] ${details.message}` : details.message)
    if (isFleetformError(error) && error.requiresReconciliation) {
        logger.warn("Infrastructure and stored state may disagree, reconcile them before any other operation")
    }
    for (const cause of details.possibleCauses ?? []) {
        logger.info(`Possible cause: ${cause}`)
    }
    for (const suggestion of details.suggestions ?? []) {
        logger.info(`Suggestion: ${suggestion}`)
    }
    logger.debug("Error context", details.context)
}

/**
 * @returns process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
    try {
        const coreConfig = new ConfigLoader().load(process.env)
        const fleet = new FleetManager({
            backend: createStateBackend(coreConfig),
            provisioner: new TerraformProvisioner({ binary: coreConfig.terraform.binary }),
        })
        await buildProgram({ coreConfig, fleet }).parseAsync(argv)
        return 0
    } catch (e) {
        logFullError(e)
        return 1
    }
}

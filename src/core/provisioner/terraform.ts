import * as fs from "fs"
import * as os from "os"
import * as path from "path"
import { spawn } from "child_process"
import { getLogger } from "../../log/utils"
import { ApplyFailure } from "../errors/state"
import { toError } from "../errors/taxonomy"
import { DOCUMENT_FILE_NAME, DOCUMENT_MODULE_SECTION } from "../const"
import type { InfrastructureProvisioner } from "./provisioner"

export interface TerraformProvisionerArgs {

    /**
     * Terraform binary name or path
     */
    binary: string

    /**
     * Parent of the scratch working directories. Defaults to the OS temp directory.
     */
    scratchRoot?: string

    /**
     * Terraform output destination. Defaults to inheriting this process' stdio.
     */
    stdio?: "inherit" | "ignore"
}

/**
 * Runs Terraform against a scratch working directory holding only the document
 * as main.tf.json: 'init' then 'apply' or 'destroy'. The directory is removed afterwards.
 */
export class TerraformProvisioner implements InfrastructureProvisioner {

    private readonly logger = getLogger(TerraformProvisioner.name)

    constructor(private readonly args: TerraformProvisionerArgs) {}

    async apply(document: Uint8Array): Promise<void> {
        await this.withScratchDir(document, async (workDir) => {
            await this.run(workDir, "apply", ["init", "-force-copy"])
            await this.run(workDir, "apply", ["apply", "-auto-approve"])
        })
    }

    async destroy(document: Uint8Array, targets: string[]): Promise<void> {
        const targetArgs = targets.map(t => `-target=${DOCUMENT_MODULE_SECTION}.${t}`)
        await this.withScratchDir(document, async (workDir) => {
            await this.run(workDir, "destroy", ["init", "-force-copy"])
            await this.run(workDir, "destroy", ["destroy", "-auto-approve", ...targetArgs])
        })
    }

    private async withScratchDir(document: Uint8Array, fn: (workDir: string) => Promise<void>): Promise<void> {
        const root = this.args.scratchRoot ?? os.tmpdir()
        const workDir = await fs.promises.mkdtemp(path.join(root, "fleetform-"))
        try {
            await fs.promises.writeFile(path.join(workDir, DOCUMENT_FILE_NAME), document, { mode: 0o600 })
            await fn(workDir)
        } finally {
            await fs.promises.rm(workDir, { recursive: true, force: true })
        }
    }

    private run(workDir: string, action: string, commandArgs: string[]): Promise<void> {
        const command = [this.args.binary, ...commandArgs].join(" ")
        this.logger.info(`Running '${command}'`)
        this.logger.debug(`Working directory: ${workDir}`)

        return new Promise((resolve, reject) => {
            const child = spawn(this.args.binary, commandArgs, {
                cwd: workDir,
                stdio: this.args.stdio ?? "inherit",
                env: { ...process.env, TF_IN_AUTOMATION: "1" },
            })

            child.on("error", (e) => {
                reject(new ApplyFailure({ action, command }, toError(e)))
            })

            child.on("close", (exitCode, signal) => {
                if (exitCode === 0) {
                    resolve()
                    return
                }
                this.logger.error(`'${command}' failed with ${exitCode !== null ? `exit code ${exitCode}` : `signal ${signal}`}`)
                reject(new ApplyFailure({ action, command, exitCode, signal }))
            })
        })
    }
}

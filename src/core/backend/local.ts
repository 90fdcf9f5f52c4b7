import * as fs from "fs"
import * as path from "path"
import { AbstractStateBackend, LockConfig, LockHolder, StateLock } from "./backend"
import { BackendIOError, NotFoundError } from "../errors/state"
import { toError } from "../errors/taxonomy"
import { DOCUMENT_FILE_NAME, TERRAFORM_STATE_FILE_NAME } from "../const"
import type { TargetName } from "../types/branded"
import type { TerraformBackendBlock } from "../state/document"
import type { LocalStateBackendConfig } from "../config/interface"

const MANAGERS_DIR = "managers"
const LOCK_FILE_NAME = ".lock"

function errorCode(e: unknown): string | undefined {
    return e instanceof Error && "code" in e && typeof e.code === "string" ? e.code : undefined
}

/**
 * Documents stored on local disk:
 *   <dataDir>/managers/<target>/main.tf.json
 *   <dataDir>/managers/<target>/.lock
 *
 * Documents are written to a temporary file then renamed, a crash never leaves a half-written document.
 * The lock file is created exclusively, so it also excludes other processes on the same machine.
 */
export class LocalStateBackend extends AbstractStateBackend {

    private readonly managersDir: string

    constructor(config: LocalStateBackendConfig, lockConfig: LockConfig) {
        super(lockConfig)
        this.managersDir = path.join(path.resolve(config.dataDir), MANAGERS_DIR)
    }

    async load(target: string): Promise<Buffer> {
        const file = this.documentPath(this.targetName(target))
        try {
            return await fs.promises.readFile(file)
        } catch (e) {
            if (errorCode(e) === "ENOENT") {
                throw new NotFoundError(`cluster manager '${target}'`, { path: file })
            }
            throw new BackendIOError("load", target, toError(e))
        }
    }

    async persistState(target: string, bytes: Uint8Array): Promise<void> {
        const targetName = this.targetName(target)
        const file = this.documentPath(targetName)
        const tmpFile = `${file}.${process.pid}.${Date.now()}.tmp`

        this.logger.debug(`Writing state of ${targetName} to ${file}`)

        try {
            await fs.promises.mkdir(this.targetDir(targetName), { recursive: true })
            await fs.promises.writeFile(tmpFile, bytes)
            await fs.promises.rename(tmpFile, file)
        } catch (e) {
            await fs.promises.rm(tmpFile, { force: true })
            throw new BackendIOError("persist", target, toError(e))
        }
    }

    async delete(target: string): Promise<void> {
        const targetName = this.targetName(target)
        try {
            await fs.promises.rm(this.documentPath(targetName), { force: true })
        } catch (e) {
            throw new BackendIOError("delete", target, toError(e))
        }
    }

    async list(): Promise<string[]> {
        let entries: fs.Dirent[]
        try {
            entries = await fs.promises.readdir(this.managersDir, { withFileTypes: true })
        } catch (e) {
            if (errorCode(e) === "ENOENT") {
                return []
            }
            throw new BackendIOError("list", this.managersDir, toError(e))
        }

        const targets: string[] = []
        for (const entry of entries) {
            if (entry.isDirectory() && fs.existsSync(path.join(this.managersDir, entry.name, DOCUMENT_FILE_NAME))) {
                targets.push(entry.name)
            }
        }
        return targets.sort()
    }

    async releaseLock(lock: StateLock): Promise<void> {
        const targetName = this.targetName(lock.target)
        const lockFile = this.lockPath(targetName)

        let current: LockHolder
        try {
            current = this.parseHolder(await fs.promises.readFile(lockFile, "utf-8"))
        } catch (e) {
            if (errorCode(e) === "ENOENT") {
                this.logger.warn(`Lock on ${targetName} already released`)
                return
            }
            throw new BackendIOError("release lock", lock.target, toError(e))
        }

        if (current.token !== lock.token) {
            this.logger.warn(`Lock on ${targetName} is now held by token ${current.token}, not releasing it`)
            return
        }

        await fs.promises.rm(lockFile, { force: true })
        this.logger.debug(`Released lock on ${targetName}`)
    }

    terraformBackend(target: string): TerraformBackendBlock {
        return {
            local: {
                path: path.join(this.targetDir(this.targetName(target)), TERRAFORM_STATE_FILE_NAME),
            }
        }
    }

    protected async tryAcquireLock(target: TargetName, holder: LockHolder): Promise<LockHolder | undefined> {
        const lockFile = this.lockPath(target)
        try {
            await fs.promises.mkdir(this.targetDir(target), { recursive: true })
            await fs.promises.writeFile(lockFile, JSON.stringify(holder), { flag: "wx" })
            return undefined
        } catch (e) {
            if (errorCode(e) !== "EEXIST") {
                throw new BackendIOError("acquire lock", target, toError(e))
            }
        }

        try {
            return this.parseHolder(await fs.promises.readFile(lockFile, "utf-8"))
        } catch {
            // released between our attempt and this read, report it as held and let the caller retry
            return { token: "unknown" }
        }
    }

    private targetDir(target: TargetName): string {
        return path.join(this.managersDir, target)
    }

    private documentPath(target: TargetName): string {
        return path.join(this.targetDir(target), DOCUMENT_FILE_NAME)
    }

    private lockPath(target: TargetName): string {
        return path.join(this.targetDir(target), LOCK_FILE_NAME)
    }
}

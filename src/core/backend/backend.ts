import * as os from "os"
import { randomUUID } from "crypto"
import { z } from "zod"
import { getLogger } from "../../log/utils"
import { StateLockedError } from "../errors/state"
import { CoreBrandedTypeCreators, TargetName } from "../types/branded"
import type { TerraformBackendBlock } from "../state/document"
import type { CoreConfig } from "../config/interface"

export const LockHolderSchema = z.object({
    token: z.string(),
    operation: z.string().optional(),
    hostname: z.string().optional(),
    pid: z.number().optional(),
    acquiredAt: z.string().optional(),
})

/**
 * Content of a lock, written by the holder so a blocked operator knows who to wait for.
 */
export type LockHolder = z.infer<typeof LockHolderSchema>

export interface StateLock {
    readonly target: string
    readonly token: string
    readonly acquiredAt: string
}

export type LockConfig = CoreConfig["lock"]

/**
 * Durable storage of cluster manager documents, one document per target.
 *
 * Contract:
 * - persistState is the only mutation point of durable truth. Callers invoke it only after
 *   the infrastructure change the document describes has been realized.
 * - Callers hold the target's lock from before load() until after persistState()/delete():
 *   two operations on the same target can never both load, mutate and persist,
 *   each silently dropping the other's change.
 */
export interface StateBackend {

    /**
     * @throws NotFoundError if the target has no document yet
     */
    load(target: string): Promise<Buffer>

    persistState(target: string, bytes: Uint8Array): Promise<void>

    /**
     * Remove the target's document, once the whole cluster manager is destroyed.
     */
    delete(target: string): Promise<void>

    /**
     * @returns every target having a document, sorted
     */
    list(): Promise<string[]>

    /**
     * Wait for and take the target's lock.
     * @throws StateLockedError if still held by someone else after the configured wait
     */
    acquireLock(target: string, operation?: string): Promise<StateLock>

    releaseLock(lock: StateLock): Promise<void>

    /**
     * Terraform backend block storing Terraform's own state next to the target's document.
     */
    terraformBackend(target: string): TerraformBackendBlock
}

/**
 * Lock wait loop shared by implementations. Subclasses only implement
 * a single non-blocking attempt.
 */
export abstract class AbstractStateBackend implements StateBackend {

    protected readonly logger = getLogger(this.constructor.name)

    constructor(protected readonly lockConfig: LockConfig) {}

    abstract load(target: string): Promise<Buffer>
    abstract persistState(target: string, bytes: Uint8Array): Promise<void>
    abstract delete(target: string): Promise<void>
    abstract list(): Promise<string[]>
    abstract releaseLock(lock: StateLock): Promise<void>
    abstract terraformBackend(target: string): TerraformBackendBlock

    /**
     * Try to take the lock once.
     * @returns undefined if the lock was taken, current holder otherwise
     */
    protected abstract tryAcquireLock(target: TargetName, holder: LockHolder): Promise<LockHolder | undefined>

    async acquireLock(target: string, operation?: string): Promise<StateLock> {
        const targetName = this.targetName(target)
        const holder: LockHolder = {
            token: randomUUID(),
            operation: operation,
            hostname: os.hostname(),
            pid: process.pid,
            acquiredAt: new Date().toISOString(),
        }

        const deadline = Date.now() + this.lockConfig.waitTimeoutSeconds * 1000

        for (;;) {
            const current = await this.tryAcquireLock(targetName, holder)
            if (current === undefined) {
                this.logger.debug(`Acquired lock on ${targetName} (token ${holder.token})`)
                return {
                    target: targetName,
                    token: holder.token,
                    acquiredAt: holder.acquiredAt ?? new Date().toISOString(),
                }
            }

            if (Date.now() >= deadline) {
                throw new StateLockedError(targetName, current)
            }

            this.logger.info(`State of ${targetName} locked by ${describeHolder(current)}, waiting...`)
            await sleep(this.lockConfig.pollIntervalMs)
        }
    }

    /**
     * @throws InvalidTargetNameError for names unusable as storage keys
     */
    protected targetName(target: string): TargetName {
        return CoreBrandedTypeCreators.createTargetName(target)
    }

    protected parseHolder(raw: string): LockHolder {
        try {
            const result = LockHolderSchema.safeParse(JSON.parse(raw))
            if (result.success) {
                return result.data
            }
        } catch (e) {
            this.logger.debug("Unreadable lock content", e)
        }
        return { token: "unknown" }
    }
}

export function describeHolder(holder: LockHolder): string {
    const who = holder.hostname ? `${holder.hostname}${holder.pid ? ` (pid ${holder.pid})` : ""}` : "unknown holder"
    const what = holder.operation ? ` running '${holder.operation}'` : ""
    const since = holder.acquiredAt ? ` since ${holder.acquiredAt}` : ""
    return `${who}${what}${since}`
}

function sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms))
}

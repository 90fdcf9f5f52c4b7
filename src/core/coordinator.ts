import { getLogger } from "../log/utils"
import { StateBackend, StateLock } from "./backend/backend"
import { InfrastructureProvisioner } from "./provisioner/provisioner"
import { StateDocument } from "./state/document"
import { NotFoundError, PersistFailure } from "./errors/state"
import { toError } from "./errors/taxonomy"

/**
 * Idle → Loaded → Mutated → Applying → Committed | Discarded
 *
 * Any failure before the commit step ends in Discarded: the backend was not written
 * and its previous document stays authoritative.
 */
export type CoordinatorPhase = "idle" | "loaded" | "mutated" | "applying" | "committed" | "discarded"

export type ProvisionAction = "apply" | "destroy"

export interface ProvisionPlan<T> {

    /**
     * Cluster manager whose document is changed
     */
    target: string

    /**
     * Human-readable operation name, recorded in the lock and in logs
     */
    operation: string

    action: ProvisionAction

    /**
     * When false, a target without document starts from an empty document (first creation).
     * When true, a missing document fails the operation with NotFoundError.
     */
    requireExisting: boolean

    /**
     * In-memory change of the loaded document. Throwing here discards the operation.
     */
    mutate: (doc: StateDocument) => T

    /**
     * Modules to tear down, computed from the document before mutation.
     * Only used for 'destroy'; an empty list destroys everything.
     */
    destroyTargets?: (doc: StateDocument) => string[]

    /**
     * 'persist' writes the mutated document, 'delete' removes the target's document entirely.
     * Defaults to 'persist'.
     */
    commit?: "persist" | "delete"
}

export interface ProvisionResult<T> {
    phase: "committed"
    value: T
    document: StateDocument
}

export type PhaseListener = (event: { target: string, operation: string, phase: CoordinatorPhase }) => void

export interface ProvisionCoordinatorArgs {
    backend: StateBackend
    provisioner: InfrastructureProvisioner
}

/**
 * Runs a document change as one operation: lock, load, mutate, hand over to the provisioner,
 * then commit to the backend only if provisioning succeeded.
 *
 * For 'apply' the provisioner receives the mutated document. For 'destroy' it receives the
 * document as loaded (Terraform needs module definitions to tear them down) while the mutated
 * document, without the destroyed modules, is what gets committed.
 */
export class ProvisionCoordinator {

    private readonly logger = getLogger(ProvisionCoordinator.name)
    private readonly backend: StateBackend
    private readonly provisioner: InfrastructureProvisioner
    private readonly listeners: PhaseListener[] = []

    constructor(args: ProvisionCoordinatorArgs) {
        this.backend = args.backend
        this.provisioner = args.provisioner
    }

    onPhase(listener: PhaseListener): void {
        this.listeners.push(listener)
    }

    async run<T>(plan: ProvisionPlan<T>): Promise<ProvisionResult<T>> {
        const lock = await this.backend.acquireLock(plan.target, plan.operation)

        let result: ProvisionResult<T>
        try {
            result = await this.runLocked(plan)
        } catch (e) {
            await this.releaseAfterFailure(lock)
            throw e
        }

        await this.backend.releaseLock(lock)
        return result
    }

    private async runLocked<T>(plan: ProvisionPlan<T>): Promise<ProvisionResult<T>> {
        this.transition(plan, "idle")

        try {
            const document = await this.load(plan)
            this.transition(plan, "loaded")

            const loadedBytes = document.bytes()
            const destroyTargets = plan.action === "destroy" && plan.destroyTargets ? plan.destroyTargets(document) : []

            const value = plan.mutate(document)
            const commitBytes = document.bytes()
            this.transition(plan, "mutated")

            this.transition(plan, "applying")
            if (plan.action === "apply") {
                await this.provisioner.apply(commitBytes)
            } else {
                await this.provisioner.destroy(loadedBytes, destroyTargets)
            }

            await this.commit(plan, commitBytes)
            this.transition(plan, "committed")

            return { phase: "committed", value: value, document: document }
        } catch (e) {
            if (!(e instanceof PersistFailure)) {
                this.logger.debug(`Discarding '${plan.operation}' on ${plan.target}: ${toError(e).message}`)
                this.transition(plan, "discarded")
            }
            throw e
        }
    }

    private async load(plan: ProvisionPlan<unknown>): Promise<StateDocument> {
        try {
            return StateDocument.load(await this.backend.load(plan.target))
        } catch (e) {
            if (e instanceof NotFoundError && !plan.requireExisting) {
                this.logger.debug(`No document for ${plan.target} yet, starting from an empty document`)
                return StateDocument.empty()
            }
            throw e
        }
    }

    private async commit(plan: ProvisionPlan<unknown>, bytes: Buffer): Promise<void> {
        try {
            if (plan.commit === "delete") {
                await this.backend.delete(plan.target)
            } else {
                await this.backend.persistState(plan.target, bytes)
            }
        } catch (e) {
            const failure = new PersistFailure(plan.target, bytes.toString("utf-8"), toError(e))
            this.logger.fatal(
                `'${plan.operation}' changed infrastructure of ${plan.target} but its state could not be saved. ` +
                `Manual reconciliation required: restore the document below to the state backend before anything else.`
            )
            this.logger.fatal(bytes.toString("utf-8"))
            throw failure
        }
    }

    private async releaseAfterFailure(lock: StateLock): Promise<void> {
        try {
            await this.backend.releaseLock(lock)
        } catch (releaseError) {
            // the operation error is the one surfaced, a stale lock must still be visible to the operator
            this.logger.error(`Could not release lock on ${lock.target} (token ${lock.token}), remove it manually`, releaseError)
        }
    }

    private transition(plan: ProvisionPlan<unknown>, phase: CoordinatorPhase): void {
        this.logger.debug(`${plan.target} '${plan.operation}': ${phase}`)
        for (const listener of this.listeners) {
            listener({ target: plan.target, operation: plan.operation, phase: phase })
        }
    }
}

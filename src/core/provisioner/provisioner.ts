/**
 * External provisioning step run between mutation and commit of a document.
 * Implementations resolve only once the infrastructure matches the document
 * and reject with ApplyFailure otherwise. A rejection is always treated as a total failure.
 */
export interface InfrastructureProvisioner {

    /**
     * Create or update infrastructure so that it matches the document.
     */
    apply(document: Uint8Array): Promise<void>

    /**
     * Tear down modules of the document. An empty target list destroys everything.
     * @param targets module names, without the 'module.' prefix
     */
    destroy(document: Uint8Array, targets: string[]): Promise<void>
}

/**
 * Name formats accepted for modules, cluster managers and node hostnames
 */

export const CORE_VALIDATION_PATTERNS = {
    /** Terraform module name, e.g. 'cluster-manager' or 'node_triton_web-1' */
    MODULE_NAME: /^[a-zA-Z_][a-zA-Z0-9_-]*$/,

    /** Cluster manager name, used as state backend target key and storage path segment */
    TARGET_NAME: /^[a-zA-Z0-9][a-zA-Z0-9_-]*$/,

    /** Node hostname (RFC 1123 label) */
    HOSTNAME: /^[a-zA-Z0-9]([a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?$/,
} as const

/**
 * Kept as an own key by JSON.parse, but assigning it on a plain object changes the prototype instead
 */
export const RESERVED_OBJECT_KEY = '__proto__'

export class CoreValidators {

    static isValidModuleName(name: string): boolean {
        return typeof name === 'string' && name !== RESERVED_OBJECT_KEY && CORE_VALIDATION_PATTERNS.MODULE_NAME.test(name)
    }

    static isValidTargetName(name: string): boolean {
        return typeof name === 'string' && name.length <= 128 && CORE_VALIDATION_PATTERNS.TARGET_NAME.test(name)
    }

    /**
     * Validates hostname format (single DNS label, max 63 characters)
     */
    static isValidHostname(hostname: string): boolean {
        return typeof hostname === 'string' && CORE_VALIDATION_PATTERNS.HOSTNAME.test(hostname)
    }
}

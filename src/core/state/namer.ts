import { InvalidInputError, NamingCollisionError } from "../errors/state"

const POSITIVE_INTEGER = /^[1-9][0-9]*$/

/**
 * Assign names to `count` new nodes so that none collides with `existingNames`.
 *
 * - a single node whose base name is free keeps the base name as-is
 * - otherwise names are `<baseName>-<n>` counting up from the highest suffix already taken,
 *   gaps left by removed nodes are never reused
 *
 * Matching is exact and case-sensitive. Suffixes that are not positive integers
 * ('web-a', 'web-01', 'web-0') belong to unrelated names. Suffixes are compared
 * as bigints, whatever their length.
 *
 * @throws InvalidInputError if count is not finite
 */
export function assignNodeNames(existingNames: Iterable<string>, baseName: string, count: number): string[] {
    if (count === Number.POSITIVE_INFINITY) {
        throw new InvalidInputError(`node count must be finite, got ${count}`, { count })
    }
    if (!(count >= 1)) {
        return []
    }
    const total = Math.floor(count)
    const existing = new Set(existingNames)

    if (total === 1 && !existing.has(baseName)) {
        return [baseName]
    }

    const prefix = `${baseName}-`
    let maxSuffix = 0n
    for (const name of existing) {
        if (!name.startsWith(prefix)) {
            continue
        }
        const suffix = name.slice(prefix.length)
        if (!POSITIVE_INTEGER.test(suffix)) {
            continue
        }
        const value = BigInt(suffix)
        if (value > maxSuffix) {
            maxSuffix = value
        }
    }

    const names: string[] = []
    for (let i = 1; i <= total; i++) {
        const name = `${prefix}${maxSuffix + BigInt(i)}`
        if (existing.has(name) || names.includes(name)) {
            throw new NamingCollisionError(name, { baseName, maxSuffix: maxSuffix.toString() })
        }
        names.push(name)
    }
    return names
}

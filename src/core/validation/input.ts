import { z } from "zod"
import { InvalidInputError } from "../errors/state"

/**
 * Validate a fully-resolved module input at the boundary.
 * @throws InvalidInputError listing every issue found
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, raw: unknown, what: string): z.output<S> {
    const result = schema.safeParse(raw)
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`)
        throw new InvalidInputError(`${what}: ${issues.join("; ")}`, { issues })
    }
    return result.data
}

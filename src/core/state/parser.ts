import { z } from "zod"
import { isJsonArray, type JsonObject, type JsonValue, type ModuleRecord } from "../types"
import { DecodeError, InvalidInputError } from "../errors/state"
import { toError } from "../errors/taxonomy"
import { CoreValidators, RESERVED_OBJECT_KEY } from "../validation/patterns"
import { DOCUMENT_MODULE_SECTION } from "../const"

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() => z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
]))

export const ModuleRecordSchema = z.record(JsonValueSchema)

export const ModuleSectionSchema = z.record(ModuleRecordSchema)

export const StateDocumentSchema = z.record(JsonValueSchema)

export interface ParsedDocument {
    modules: [string, JsonObject][]
    sections: [string, JsonValue][]
}

/**
 * Decodes raw document bytes. Module order is the order found in the bytes.
 */
export class StateDocumentParser {

    parse(bytes: Uint8Array | string): ParsedDocument {
        const text = typeof bytes === "string" ? bytes : Buffer.from(bytes).toString("utf-8")

        if (text.trim() === "") {
            return { modules: [], sections: [] }
        }

        let raw: unknown
        const reservedKeys: string[] = []
        try {
            raw = JSON.parse(text, (key, value: unknown) => {
                if (key === RESERVED_OBJECT_KEY) {
                    reservedKeys.push(key)
                }
                return value
            })
        } catch (e) {
            throw new DecodeError(`invalid JSON (${toError(e).message})`, toError(e))
        }

        // zod records drop this key
        if (reservedKeys.length > 0) {
            throw new DecodeError(`reserved key '${RESERVED_OBJECT_KEY}'`)
        }

        if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
            throw new DecodeError("top level is not a JSON object")
        }

        const result = StateDocumentSchema.safeParse(raw)
        if (!result.success) {
            throw this.decodeError(result.error, [])
        }

        const sections: [string, JsonValue][] = []
        let modules: Record<string, JsonObject> = {}
        for (const [key, value] of Object.entries(result.data)) {
            if (key !== DOCUMENT_MODULE_SECTION) {
                sections.push([key, value])
                continue
            }
            const moduleResult = ModuleSectionSchema.safeParse(value)
            if (!moduleResult.success) {
                throw this.decodeError(moduleResult.error, [DOCUMENT_MODULE_SECTION])
            }
            modules = moduleResult.data
        }

        const moduleEntries = Object.entries(modules)
        for (const [name] of moduleEntries) {
            if (!CoreValidators.isValidModuleName(name)) {
                throw new DecodeError(`invalid module name '${name}'`)
            }
        }

        return {
            modules: moduleEntries,
            sections: sections,
        }
    }

    private decodeError(error: z.ZodError, pathPrefix: string[]): DecodeError {
        const issue = error.issues[0]
        const path = [...pathPrefix, ...issue.path].join(".") || "<root>"
        return new DecodeError(`${path}: ${issue.message}`, error)
    }
}

/**
 * Deep copy of a JSON value with object keys sorted at every depth.
 * Undefined object fields are dropped, non-finite numbers are rejected
 * as they have no JSON representation.
 */
export function canonicalJson(value: JsonValue | undefined, path: string = "<root>"): JsonValue | undefined {
    if (value === undefined || value === null) {
        return value
    }
    if (typeof value === "number") {
        if (!Number.isFinite(value)) {
            throw new InvalidInputError(`non-finite number at ${path}`, { path })
        }
        return value
    }
    if (typeof value === "string" || typeof value === "boolean") {
        return value
    }
    if (isJsonArray(value)) {
        const items: JsonValue[] = []
        value.forEach((item, index) => {
            const copy = canonicalJson(item, `${path}[${index}]`)
            // same as JSON.stringify, undefined array items become null
            items.push(copy === undefined ? null : copy)
        })
        return items
    }

    const copy: JsonObject = {}
    for (const key of Object.keys(value).sort()) {
        rejectReservedKey(key, `${path}.${key}`)
        const field = canonicalJson(value[key], `${path}.${key}`)
        if (field !== undefined) {
            copy[key] = field
        }
    }
    return copy
}

/**
 * Canonical copy of a module record, see canonicalJson
 */
export function canonicalRecord(record: ModuleRecord, name: string): JsonObject {
    const copy: JsonObject = {}
    for (const key of Object.keys(record).sort()) {
        rejectReservedKey(key, `module.${name}.${key}`)
        const field = canonicalJson(record[key], `module.${name}.${key}`)
        if (field !== undefined) {
            copy[key] = field
        }
    }
    return copy
}

function rejectReservedKey(key: string, path: string): void {
    if (key === RESERVED_OBJECT_KEY) {
        throw new InvalidInputError(`reserved key '${key}' at ${path}`, { path })
    }
}

import { isJsonArray, isJsonObject, type JsonObject, type JsonValue, type ModuleRecord } from "../core/types"

const SECRET_FIELD = /password|token|secret|key/i

export const REDACTED = "<redacted>"

/**
 * Copy of a module record fit for logs: string fields whose name looks like
 * a password, token, secret or key are replaced at every depth.
 */
export function redactSecrets(record: ModuleRecord): JsonObject {
    const copy: JsonObject = {}
    for (const [field, value] of Object.entries(record)) {
        if (value !== undefined) {
            copy[field] = redactField(field, value)
        }
    }
    return copy
}

function redactField(field: string, value: JsonValue): JsonValue {
    if (typeof value === "string") {
        return SECRET_FIELD.test(field) ? REDACTED : value
    }
    if (isJsonArray(value)) {
        const items: JsonValue[] = []
        value.forEach(item => items.push(redactField(field, item)))
        return items
    }
    if (isJsonObject(value)) {
        return redactSecrets(value)
    }
    return value
}

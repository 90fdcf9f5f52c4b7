import type { CoreConfig } from "../config/interface"
import { InvalidConfigError } from "../errors/state"
import { StateBackend } from "./backend"
import { LocalStateBackend } from "./local"
import { S3StateBackend } from "./s3"

export function createStateBackend(config: CoreConfig): StateBackend {
    const { s3, local } = config.stateBackend
    if (s3 !== undefined) {
        return new S3StateBackend({ config: s3, lockConfig: config.lock })
    }
    if (local !== undefined) {
        return new LocalStateBackend(local, config.lock)
    }
    throw new InvalidConfigError("no state backend configured")
}

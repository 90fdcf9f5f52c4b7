import { ILogObj, Logger } from "tslog"

export type AppLogger = Logger<ILogObj>

const DEFAULT_LOG_LEVEL = 3 // info

function parseLogLevel(raw: string | undefined): number {
    if (raw === undefined || raw.trim() === "") {
        return DEFAULT_LOG_LEVEL
    }
    const level = Number.parseInt(raw, 10)
    if (Number.isNaN(level) || level < 0 || level > 6) {
        return DEFAULT_LOG_LEVEL
    }
    return level
}

const rootLogger = new Logger<ILogObj>({
    name: "fleetform",
    type: "pretty",
    minLevel: parseLogLevel(process.env.FLEETFORM_LOG_LEVEL),
    hideLogPositionForProduction: true,
    prettyLogTemplate: "{{hh}}:{{MM}}:{{ss}} {{logLevelName}}\t[{{name}}] ",
})

// sub-loggers copy their parent's settings, keep track of them to change verbosity later
const subLoggers: Logger<ILogObj>[] = []

/**
 * Set verbosity of every logger created through getLogger, existing ones included.
 * 0 = silly ... 6 = fatal
 */
export function setLogVerbosity(level: number): void {
    rootLogger.settings.minLevel = level
    for (const logger of subLoggers) {
        logger.settings.minLevel = level
    }
}

export function getLogger(name: string): AppLogger {
    const logger = rootLogger.getSubLogger({ name: name })
    subLoggers.push(logger)
    return logger
}

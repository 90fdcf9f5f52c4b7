import * as path from 'path'
import lodash from 'lodash'
import { CoreConfig, CoreConfigInput, CoreConfigSchema } from './interface'
import { DEFAULT_MODULE_SOURCE_URL, DEFAULT_TERRAFORM_BINARY, defaultDataDir } from '../const'
import { InvalidConfigError } from '../errors/state'
import { getLogger } from '../../log/utils'

export const DEFAULT_CORE_CONFIG: CoreConfig = {
    terraform: {
        binary: DEFAULT_TERRAFORM_BINARY,
        moduleSourceUrl: DEFAULT_MODULE_SOURCE_URL,
    },
    stateBackend: {
        local: {
            dataDir: defaultDataDir(),
        }
    },
    lock: {
        waitTimeoutSeconds: 0,
        pollIntervalMs: 1000,
    },
}

type Environment = Record<string, string | undefined>

/**
 * Builds a CoreConfig once, from environment variables and explicit overrides.
 * The resulting value is passed to every component, nothing reads the environment afterwards.
 */
export class ConfigLoader {

    private readonly logger = getLogger(ConfigLoader.name)

    load(env: Environment = process.env, overrides: Partial<CoreConfigInput> = {}): CoreConfig {
        const fromEnv = this.fromEnvironment(env)

        // backends are exclusive, the most specific one wins instead of being merged
        const stateBackend = overrides.stateBackend ?? fromEnv.stateBackend ?? DEFAULT_CORE_CONFIG.stateBackend

        const merged = lodash.merge(
            {},
            lodash.omit(DEFAULT_CORE_CONFIG, "stateBackend"),
            lodash.omit(fromEnv, "stateBackend"),
            lodash.omit(overrides, "stateBackend"),
        )

        return ConfigLoader.parse({ ...merged, stateBackend: stateBackend })
    }

    /**
     * Validate a raw config value.
     * @throws InvalidConfigError with every issue found
     */
    static parse(raw: unknown): CoreConfig {
        const result = CoreConfigSchema.safeParse(raw)
        if (!result.success) {
            const issues = result.error.issues
                .map(i => `${i.path.join('.') || '<root>'}: ${i.message}`)
                .join('; ')
            throw new InvalidConfigError(issues, result.error)
        }
        return result.data
    }

    private fromEnvironment(env: Environment): Partial<CoreConfigInput> {
        const config: Partial<CoreConfigInput> = {}

        const binary = env.FLEETFORM_TERRAFORM_BINARY
        const moduleSourceUrl = env.FLEETFORM_MODULE_SOURCE_URL
        if (binary || moduleSourceUrl) {
            config.terraform = {
                binary: binary || undefined,
                moduleSourceUrl: moduleSourceUrl || undefined,
            }
        }

        if (env.FLEETFORM_S3_BUCKET) {
            this.logger.debug(`Using S3 state backend from environment: bucket ${env.FLEETFORM_S3_BUCKET}`)
            config.stateBackend = {
                s3: {
                    bucket: env.FLEETFORM_S3_BUCKET,
                    region: env.FLEETFORM_S3_REGION ?? env.AWS_REGION ?? "",
                    prefix: env.FLEETFORM_S3_PREFIX,
                    endpoint: env.FLEETFORM_S3_ENDPOINT,
                    forcePathStyle: env.FLEETFORM_S3_ENDPOINT ? true : undefined,
                }
            }
        } else if (env.FLEETFORM_HOME) {
            config.stateBackend = {
                local: {
                    dataDir: path.resolve(env.FLEETFORM_HOME),
                }
            }
        }

        if (env.FLEETFORM_LOCK_WAIT_SECONDS !== undefined && env.FLEETFORM_LOCK_WAIT_SECONDS !== "") {
            config.lock = {
                waitTimeoutSeconds: Number(env.FLEETFORM_LOCK_WAIT_SECONDS),
            }
        }

        return config
    }
}

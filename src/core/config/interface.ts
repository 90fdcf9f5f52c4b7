import { z } from "zod"
import { DEFAULT_MODULE_SOURCE_URL, DEFAULT_TERRAFORM_BINARY } from "../const"

export const LocalStateBackendConfigSchema = z.object({
    dataDir: z.string().min(1).describe("Directory holding one sub-directory per cluster manager"),
})

export const S3StateBackendConfigSchema = z.object({
    bucket: z.string().min(1).describe("S3 bucket holding cluster manager documents"),
    region: z.string().min(1).describe("S3 bucket region"),
    prefix: z.string().optional().describe("Key prefix prepended to every object, e.g. 'fleetform/'"),
    endpoint: z.string().url().optional().describe("Custom endpoint for S3-compatible stores"),
    forcePathStyle: z.boolean().optional().describe("Use path-style addressing, required by most S3-compatible stores"),
})

export const StateBackendConfigSchema = z.union([
    z.object({ local: LocalStateBackendConfigSchema, s3: z.undefined().optional() }),
    z.object({ s3: S3StateBackendConfigSchema, local: z.undefined().optional() }),
])

export const CoreConfigSchema = z.object({
    terraform: z.object({
        binary: z.string().min(1).default(DEFAULT_TERRAFORM_BINARY).describe("Terraform binary name or path"),
        moduleSourceUrl: z.string().min(1).default(DEFAULT_MODULE_SOURCE_URL)
            .describe("Base source of Terraform modules, module path is appended after '//'"),
    }),
    stateBackend: StateBackendConfigSchema,
    lock: z.object({
        waitTimeoutSeconds: z.number().int().min(0).default(0)
            .describe("How long to wait for a state lock held by another operation. 0 fails immediately."),
        pollIntervalMs: z.number().int().positive().default(1000),
    }).default({}),
})

export type CoreConfig = z.infer<typeof CoreConfigSchema>
export type CoreConfigInput = z.input<typeof CoreConfigSchema>
export type StateBackendConfig = z.infer<typeof StateBackendConfigSchema>
export type LocalStateBackendConfig = z.infer<typeof LocalStateBackendConfigSchema>
export type S3StateBackendConfig = z.infer<typeof S3StateBackendConfigSchema>

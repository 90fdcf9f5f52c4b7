import {
    DeleteObjectCommand,
    GetObjectCommand,
    ListObjectsV2Command,
    ListObjectsV2CommandOutput,
    PutObjectCommand,
    S3Client,
    S3ServiceException,
} from "@aws-sdk/client-s3"
import { AbstractStateBackend, LockConfig, LockHolder, StateLock } from "./backend"
import { BackendIOError, NotFoundError } from "../errors/state"
import { toError } from "../errors/taxonomy"
import { DOCUMENT_FILE_NAME, TERRAFORM_STATE_FILE_NAME } from "../const"
import type { TargetName } from "../types/branded"
import type { TerraformBackendBlock } from "../state/document"
import type { S3StateBackendConfig } from "../config/interface"
import type { JsonObject } from "../types"

const LOCK_OBJECT_NAME = ".lock"

function isS3Error(e: unknown, name: string, httpStatusCode?: number): boolean {
    if (!(e instanceof S3ServiceException)) {
        return false
    }
    return e.name === name || (httpStatusCode !== undefined && e.$metadata?.httpStatusCode === httpStatusCode)
}

export interface S3StateBackendArgs {
    config: S3StateBackendConfig
    lockConfig: LockConfig
    client?: S3Client
}

/**
 * Documents stored in an S3 (or S3-compatible) bucket:
 *   <prefix><target>/main.tf.json
 *   <prefix><target>/.lock
 *
 * The lock object is created with a conditional write (If-None-Match: *), the store itself
 * guarantees a single holder. Stores without conditional writes cannot provide mutual exclusion.
 */
export class S3StateBackend extends AbstractStateBackend {

    private readonly client: S3Client
    private readonly bucket: string
    private readonly prefix: string
    private readonly config: S3StateBackendConfig

    constructor(args: S3StateBackendArgs) {
        super(args.lockConfig)
        this.config = args.config
        this.bucket = args.config.bucket
        this.prefix = args.config.prefix ?? ""
        this.client = args.client ?? new S3Client({
            region: args.config.region,
            endpoint: args.config.endpoint,
            forcePathStyle: args.config.forcePathStyle,
        })
    }

    async load(target: string): Promise<Buffer> {
        const key = this.documentKey(this.targetName(target))
        const bytes = await this.getObject(key, "load", target)
        if (bytes === undefined) {
            throw new NotFoundError(`cluster manager '${target}'`, { bucket: this.bucket, key: key })
        }
        return bytes
    }

    async persistState(target: string, bytes: Uint8Array): Promise<void> {
        const key = this.documentKey(this.targetName(target))
        this.logger.debug(`Writing state of ${target} to s3://${this.bucket}/${key}`)
        try {
            await this.client.send(new PutObjectCommand({
                Bucket: this.bucket,
                Key: key,
                Body: bytes,
                ContentType: "application/json",
            }))
        } catch (e) {
            throw new BackendIOError("persist", target, toError(e))
        }
    }

    async delete(target: string): Promise<void> {
        const key = this.documentKey(this.targetName(target))
        try {
            await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }))
        } catch (e) {
            throw new BackendIOError("delete", target, toError(e))
        }
    }

    async list(): Promise<string[]> {
        const targets: string[] = []
        let continuationToken: string | undefined = undefined

        do {
            let page: ListObjectsV2CommandOutput
            try {
                page = await this.client.send(new ListObjectsV2Command({
                    Bucket: this.bucket,
                    Prefix: this.prefix,
                    ContinuationToken: continuationToken,
                }))
            } catch (e) {
                throw new BackendIOError("list", `s3://${this.bucket}/${this.prefix}`, toError(e))
            }

            for (const object of page.Contents ?? []) {
                const target = this.targetFromKey(object.Key)
                if (target !== undefined) {
                    targets.push(target)
                }
            }
            continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined
        } while (continuationToken !== undefined)

        return targets.sort()
    }

    async releaseLock(lock: StateLock): Promise<void> {
        const targetName = this.targetName(lock.target)
        const key = this.lockKey(targetName)

        const raw = await this.getObject(key, "release lock", lock.target)
        if (raw === undefined) {
            this.logger.warn(`Lock on ${targetName} already released`)
            return
        }

        const current = this.parseHolder(raw.toString("utf-8"))
        if (current.token !== lock.token) {
            this.logger.warn(`Lock on ${targetName} is now held by token ${current.token}, not releasing it`)
            return
        }

        try {
            await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }))
        } catch (e) {
            throw new BackendIOError("release lock", lock.target, toError(e))
        }
        this.logger.debug(`Released lock on ${targetName}`)
    }

    terraformBackend(target: string): TerraformBackendBlock {
        const s3: JsonObject = {
            bucket: this.bucket,
            key: `${this.prefix}${this.targetName(target)}/${TERRAFORM_STATE_FILE_NAME}`,
            region: this.config.region,
        }
        if (this.config.endpoint) {
            s3.endpoints = { s3: this.config.endpoint }
        }
        if (this.config.forcePathStyle) {
            s3.use_path_style = true
        }
        return { s3: s3 }
    }

    protected async tryAcquireLock(target: TargetName, holder: LockHolder): Promise<LockHolder | undefined> {
        const key = this.lockKey(target)
        try {
            await this.client.send(new PutObjectCommand({
                Bucket: this.bucket,
                Key: key,
                Body: JSON.stringify(holder),
                ContentType: "application/json",
                IfNoneMatch: "*",
            }))
            return undefined
        } catch (e) {
            // 412: lock object exists, 409: concurrent conditional write in progress
            if (!isS3Error(e, "PreconditionFailed", 412) && !isS3Error(e, "ConditionalRequestConflict", 409)) {
                throw new BackendIOError("acquire lock", target, toError(e))
            }
        }

        const raw = await this.getObject(key, "read lock", target)
        return raw === undefined ? { token: "unknown" } : this.parseHolder(raw.toString("utf-8"))
    }

    /**
     * @returns object content, undefined if the object does not exist
     */
    private async getObject(key: string, operation: string, target: string): Promise<Buffer | undefined> {
        try {
            const result = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }))
            if (result.Body === undefined) {
                return Buffer.alloc(0)
            }
            return Buffer.from(await result.Body.transformToByteArray())
        } catch (e) {
            if (isS3Error(e, "NoSuchKey", 404)) {
                return undefined
            }
            throw new BackendIOError(operation, target, toError(e))
        }
    }

    private targetFromKey(key: string | undefined): string | undefined {
        if (key === undefined || !key.startsWith(this.prefix)) {
            return undefined
        }
        const parts = key.slice(this.prefix.length).split("/")
        if (parts.length === 2 && parts[1] === DOCUMENT_FILE_NAME && parts[0] !== "") {
            return parts[0]
        }
        return undefined
    }

    private documentKey(target: TargetName): string {
        return `${this.prefix}${target}/${DOCUMENT_FILE_NAME}`
    }

    private lockKey(target: TargetName): string {
        return `${this.prefix}${target}/${LOCK_OBJECT_NAME}`
    }
}

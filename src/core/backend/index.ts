export { AbstractStateBackend, LockHolderSchema, describeHolder } from './backend'
export type { StateBackend, StateLock, LockHolder, LockConfig } from './backend'
export { LocalStateBackend } from './local'
export { S3StateBackend } from './s3'
export type { S3StateBackendArgs } from './s3'
export { createStateBackend } from './factory'

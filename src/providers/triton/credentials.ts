import { z } from "zod"

export const TritonCredentialsV1Schema = z.object({
    account: z.string().min(1).describe("Triton account name"),
    keyPath: z.string().min(1).describe("Path to the private key used to sign Triton API requests"),
    keyId: z.string().min(1).describe("Fingerprint of the key"),
    url: z.string().url().optional().describe("Triton CloudAPI endpoint, defaults to the module's"),
})

export type TritonCredentialsV1 = z.infer<typeof TritonCredentialsV1Schema>

export function tritonCredentialVariables(credentials: TritonCredentialsV1) {
    return {
        triton_account: credentials.account,
        triton_key_path: credentials.keyPath,
        triton_key_id: credentials.keyId,
        triton_url: credentials.url,
    }
}

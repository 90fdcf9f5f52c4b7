import lodash from "lodash"
import { isJsonArray, isJsonObject, type JsonObject, type JsonValue, type ModuleRecord } from "../types"
import { CoreBrandedTypeCreators } from "../types/branded"
import { canonicalJson, canonicalRecord, StateDocumentParser } from "./parser"
import {
    CLUSTER_MODULE_PREFIX,
    DOCUMENT_MODULE_SECTION,
    DOCUMENT_TERRAFORM_SECTION,
    MANAGER_MODULE_NAME,
    NODE_CLUSTER_LINK_FIELD,
    NODE_HOSTNAME_FIELD,
    NODE_MODULE_PREFIX,
} from "../const"
import { clusterLinkReference } from "./modules"

/**
 * Terraform backend block, e.g. { s3: { bucket: "...", key: "...", region: "..." } }
 */
export type TerraformBackendBlock = { [backendType: string]: JsonObject }

/**
 * In-memory working copy of a cluster manager document: a Terraform JSON configuration
 * whose "module" section maps module name to an opaque module record.
 *
 * Instances are ephemeral, owned by the operation that loaded them. Only a state backend
 * holds the durable copy.
 */
export class StateDocument {

    private static readonly parser = new StateDocumentParser()

    // insertion order is kept, an upsert keeps the module at its original position
    private readonly modules = new Map<string, JsonObject>()

    // other top-level sections (terraform settings, providers...) kept as-is
    private readonly sections = new Map<string, JsonValue>()

    static empty(): StateDocument {
        return new StateDocument()
    }

    /**
     * Decode a document. Empty input yields an empty document.
     * @throws DecodeError if bytes are not a well-formed document
     */
    static load(bytes: Uint8Array | string): StateDocument {
        const parsed = StateDocument.parser.parse(bytes)
        const doc = new StateDocument()
        for (const [name, record] of parsed.modules) {
            doc.modules.set(name, canonicalRecord(record, name))
        }
        for (const [key, value] of parsed.sections) {
            const copy = canonicalJson(value, key)
            if (copy !== undefined) {
                doc.sections.set(key, copy)
            }
        }
        return doc
    }

    /**
     * Insert or replace a module. Replacing drops every field of the previous record.
     * @param name module name, with or without the 'module.' prefix
     * @throws InvalidModuleNameError if name is empty or not a valid Terraform module name
     */
    add(name: string, record: ModuleRecord): void {
        const moduleName = CoreBrandedTypeCreators.createModuleName(name)
        this.modules.set(moduleName, canonicalRecord(record, moduleName))
    }

    /**
     * @returns true if the module existed
     */
    remove(name: string): boolean {
        return this.modules.delete(this.normalizeName(name))
    }

    has(name: string): boolean {
        return this.modules.has(this.normalizeName(name))
    }

    moduleNames(): string[] {
        return Array.from(this.modules.keys())
    }

    getModule(name: string): JsonObject | undefined {
        const record = this.modules.get(this.normalizeName(name))
        return record === undefined ? undefined : lodash.cloneDeep(record)
    }

    setManager(record: ModuleRecord): void {
        this.add(MANAGER_MODULE_NAME, record)
    }

    getManager(): JsonObject | undefined {
        return this.getModule(MANAGER_MODULE_NAME)
    }

    /**
     * Point Terraform's own state next to this document. Other Terraform settings are kept.
     */
    setTerraformBackend(backend: TerraformBackendBlock): void {
        const current = this.sections.get(DOCUMENT_TERRAFORM_SECTION)
        const settings: JsonObject = isJsonObject(current) ? { ...current } : {}
        settings.backend = backend
        const copy = canonicalJson(settings, DOCUMENT_TERRAFORM_SECTION)
        if (copy !== undefined) {
            this.sections.set(DOCUMENT_TERRAFORM_SECTION, copy)
        }
    }

    /**
     * Resolve a dotted path from the document root, e.g. 'module.cluster_triton_dev.name'
     * or 'module.node_triton_web.triton_network_names.0'.
     *
     * Never throws: a path that does not resolve (yet) returns undefined.
     */
    get(path: string): JsonValue | undefined {
        const segments = path.split(".")
        if (segments.some(s => s === "")) {
            return undefined
        }

        const [root, ...rest] = segments
        let current: JsonValue | undefined
        if (root === DOCUMENT_MODULE_SECTION) {
            if (rest.length === 0) {
                return lodash.cloneDeep(this.moduleSection())
            }
            const [moduleName, ...fields] = rest
            current = this.modules.get(moduleName)
            return lodash.cloneDeep(this.traverse(current, fields))
        }

        current = this.sections.get(root)
        return lodash.cloneDeep(this.traverse(current, rest))
    }

    /**
     * Like get() but returns the zero value '' when the path does not resolve to a scalar.
     */
    getString(path: string): string {
        const value = this.get(path)
        if (typeof value === "string") {
            return value
        }
        if (typeof value === "number" || typeof value === "boolean") {
            return String(value)
        }
        return ""
    }

    clusters(): string[] {
        return this.moduleNames().filter(n => n.startsWith(CLUSTER_MODULE_PREFIX))
    }

    /**
     * Node modules belonging to a cluster: 'node_' modules whose linkage field references the cluster.
     */
    nodes(clusterName: string): string[] {
        const reference = clusterLinkReference(this.normalizeName(clusterName))
        return this.moduleNames().filter(n => {
            if (!n.startsWith(NODE_MODULE_PREFIX)) {
                return false
            }
            return this.modules.get(n)?.[NODE_CLUSTER_LINK_FIELD] === reference
        })
    }

    /**
     * Hostnames of node modules, of a single cluster or of the whole document.
     */
    nodeHostnames(clusterName?: string): string[] {
        const names = clusterName === undefined
            ? this.moduleNames().filter(n => n.startsWith(NODE_MODULE_PREFIX))
            : this.nodes(clusterName)

        const hostnames: string[] = []
        for (const name of names) {
            const hostname = this.modules.get(name)?.[NODE_HOSTNAME_FIELD]
            if (typeof hostname === "string") {
                hostnames.push(hostname)
            }
        }
        return hostnames
    }

    /**
     * Deterministic serialization: top-level sections sorted, modules in insertion order,
     * record fields sorted at every depth.
     */
    bytes(): Buffer {
        return Buffer.from(this.toString(), "utf-8")
    }

    toString(): string {
        const sectionNames = [DOCUMENT_MODULE_SECTION, ...this.sections.keys()].sort()
        const doc: JsonObject = {}
        for (const name of sectionNames) {
            const section = name === DOCUMENT_MODULE_SECTION ? this.moduleSection() : this.sections.get(name)
            if (section !== undefined) {
                doc[name] = section
            }
        }
        return JSON.stringify(doc, null, "\t")
    }

    clone(): StateDocument {
        return StateDocument.load(this.toString())
    }

    private moduleSection(): JsonObject {
        const section: JsonObject = {}
        for (const [name, record] of this.modules) {
            section[name] = record
        }
        return section
    }

    private traverse(start: JsonValue | undefined, fields: string[]): JsonValue | undefined {
        let current = start
        for (const field of fields) {
            if (isJsonArray(current)) {
                if (!/^\d+$/.test(field)) {
                    return undefined
                }
                current = current[Number(field)]
            } else if (isJsonObject(current)) {
                current = Object.prototype.hasOwnProperty.call(current, field) ? current[field] : undefined
            } else {
                return undefined
            }
        }
        return current
    }

    private normalizeName(name: string): string {
        return name.startsWith(`${DOCUMENT_MODULE_SECTION}.`) ? name.slice(DOCUMENT_MODULE_SECTION.length + 1) : name
    }
}

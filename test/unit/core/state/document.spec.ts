import fc from 'fast-check'
import * as assert from 'assert'
import { describe, it } from 'mocha'
import { expect } from 'chai'
import { StateDocument } from '../../../../src/core/state/document'
import { DecodeError, InvalidInputError, InvalidModuleNameError } from '../../../../src/core/errors/state'
import type { JsonObject, JsonValue, ModuleRecord } from '../../../../src/core/types'

const MANAGER = { name: 'ops', source: 'example.com/modules//azure-rancher' }
const CLUSTER = { name: 'dev', rancher_api_url: 'http://${element(module.cluster-manager.masters, 0)}:8080', source: 'example.com/modules//triton-rancher-k8s' }

function node(hostname: string, cluster: string) {
    return {
        hostname: hostname,
        rancher_environment_id: `\${module.${cluster}.rancher_environment_id}`,
        source: 'example.com/modules//triton-rancher-k8s-host',
        triton_network_names: ['Joyent-SDC-Public', 'private'],
    }
}

describe('StateDocument', () => {

    describe('serialization', () => {

        it('serializes an empty document with an empty module section', () => {
            assert.strictEqual(StateDocument.empty().toString(), '{\n\t"module": {}\n}')
        })

        it('loads empty or blank input as an empty document', () => {
            assert.deepStrictEqual(StateDocument.load('').moduleNames(), [])
            assert.deepStrictEqual(StateDocument.load(Buffer.from('  \n')).moduleNames(), [])
        })

        it('round-trips canonical bytes unchanged', () => {
            const text = JSON.stringify({
                module: {
                    'cluster-manager': MANAGER,
                    cluster_triton_dev: CLUSTER,
                },
                terraform: { backend: { local: { path: '/tmp/state' } } },
            }, null, '\t')

            const doc = StateDocument.load(Buffer.from(text))
            assert.strictEqual(doc.toString(), text)
            assert.strictEqual(StateDocument.load(doc.bytes()).toString(), text)
        })

        it('keeps module order as found in the bytes', () => {
            const doc = StateDocument.load('{"module": {"zeta": {"a": 1}, "alpha": {"a": 2}, "mid": {"a": 3}}}')
            assert.deepStrictEqual(doc.moduleNames(), ['zeta', 'alpha', 'mid'])
            assert.deepStrictEqual(doc.clone().moduleNames(), ['zeta', 'alpha', 'mid'])
        })

        it('sorts record fields at every depth', () => {
            const doc = StateDocument.empty()
            doc.add('x', { b: 1, a: { d: true, c: null } })
            assert.strictEqual(doc.toString(), '{\n\t"module": {\n\t\t"x": {\n\t\t\t"a": {\n\t\t\t\t"c": null,\n\t\t\t\t"d": true\n\t\t\t},\n\t\t\t"b": 1\n\t\t}\n\t}\n}')
        })

        it('sorts top-level sections', () => {
            const doc = StateDocument.load('{"provider": {"triton": {}}, "module": {}, "locals": {"a": 1}}')
            assert.deepStrictEqual(Object.keys(JSON.parse(doc.toString())), ['locals', 'module', 'provider'])
        })

        it('produces identical bytes for identical operation sequences', () => {
            const build = () => {
                const doc = StateDocument.empty()
                doc.setManager({ source: 's', name: 'ops' })
                doc.add('cluster_triton_dev', { source: 's', name: 'dev' })
                doc.add('node_triton_web', node('web', 'cluster_triton_dev'))
                return doc
            }
            assert.ok(build().bytes().equals(build().bytes()))
        })

        it('does not depend on field order of added records', () => {
            const a = StateDocument.empty()
            a.add('x', { one: 1, two: 2 })
            const b = StateDocument.empty()
            b.add('x', { two: 2, one: 1 })
            assert.strictEqual(a.toString(), b.toString())
        })
    })

    describe('decoding errors', () => {

        it('rejects invalid JSON', () => {
            assert.throws(() => StateDocument.load('{"module": '), DecodeError)
        })

        it('rejects a non-object top level', () => {
            assert.throws(() => StateDocument.load('["module"]'), (e: unknown) => {
                return e instanceof DecodeError && e.message === 'State document is not a well-formed module document: top level is not a JSON object'
            })
        })

        it('rejects a module record that is not an object', () => {
            assert.throws(() => StateDocument.load('{"module": {"cluster-manager": 3}}'), (e: unknown) => {
                return e instanceof DecodeError && e.message.includes('module.cluster-manager')
            })
        })

        it('rejects a module section that is not an object', () => {
            assert.throws(() => StateDocument.load('{"module": []}'), DecodeError)
        })

        it('rejects invalid module names', () => {
            assert.throws(() => StateDocument.load('{"module": {"bad name": {}}}'), DecodeError)
        })

        it('rejects __proto__ keys at any depth', () => {
            assert.throws(() => StateDocument.load('{"module": {"__proto__": {"source": "s"}}}'), DecodeError)
            assert.throws(() => StateDocument.load('{"module": {"web": {"source": "s", "__proto__": {"a": 1}}}}'), DecodeError)
            assert.throws(() => StateDocument.load('{"__proto__": {}}'), DecodeError)
        })
    })

    describe('module operations', () => {

        it('inserts, replaces and removes modules', () => {
            const doc = StateDocument.empty()
            doc.add('first', { a: 1, old: 'x' })
            doc.add('second', { b: 2 })
            doc.add('first', { a: 3 })

            assert.deepStrictEqual(doc.moduleNames(), ['first', 'second'])
            assert.deepStrictEqual(doc.getModule('first'), { a: 3 })

            assert.strictEqual(doc.remove('first'), true)
            assert.strictEqual(doc.remove('first'), false)
            assert.deepStrictEqual(doc.moduleNames(), ['second'])
        })

        it('accepts names with the module. prefix', () => {
            const doc = StateDocument.empty()
            doc.add('module.node_triton_web', { hostname: 'web' })
            assert.deepStrictEqual(doc.moduleNames(), ['node_triton_web'])
            assert.strictEqual(doc.has('module.node_triton_web'), true)
            assert.strictEqual(doc.has('node_triton_web'), true)
        })

        it('rejects empty and malformed module names', () => {
            const doc = StateDocument.empty()
            assert.throws(() => doc.add('', {}), InvalidModuleNameError)
            assert.throws(() => doc.add('with.dot', {}), InvalidModuleNameError)
            assert.throws(() => doc.add('1starts-with-digit', {}), InvalidModuleNameError)
        })

        it('rejects __proto__ as module name or field', () => {
            const doc = StateDocument.empty()
            assert.throws(() => doc.add('__proto__', { source: 's', a: 1 }), InvalidModuleNameError)

            const record: ModuleRecord = { source: 's' }
            Object.defineProperty(record, '__proto__', { value: { a: 1 }, enumerable: true, configurable: true, writable: true })
            assert.throws(() => doc.add('web', record), InvalidInputError)

            const settings: JsonObject = {}
            Object.defineProperty(settings, '__proto__', { value: 1, enumerable: true, configurable: true, writable: true })
            assert.throws(() => doc.add('web', { source: 's', settings: settings }), InvalidInputError)

            assert.deepStrictEqual(doc.moduleNames(), [])
            assert.strictEqual(doc.toString(), '{\n\t"module": {}\n}')
        })

        it('drops undefined fields', () => {
            const doc = StateDocument.empty()
            doc.add('x', { kept: 'yes', dropped: undefined })
            assert.deepStrictEqual(doc.getModule('x'), { kept: 'yes' })
        })

        it('rejects non-finite numbers', () => {
            const doc = StateDocument.empty()
            assert.throws(() => doc.add('x', { count: Number.POSITIVE_INFINITY }), InvalidInputError)
        })

        it('does not keep references to added records', () => {
            const record = { tags: ['a'] }
            const doc = StateDocument.empty()
            doc.add('x', record)
            record.tags.push('b')
            assert.deepStrictEqual(doc.get('module.x.tags'), ['a'])
        })

        it('stores the manager under the fixed manager key', () => {
            const doc = StateDocument.empty()
            doc.setManager(MANAGER)
            assert.deepStrictEqual(doc.moduleNames(), ['cluster-manager'])
            assert.deepStrictEqual(doc.getManager(), MANAGER)
        })

        it('sets the Terraform backend and keeps other Terraform settings', () => {
            const doc = StateDocument.load('{"terraform": {"required_version": ">= 0.11"}}')
            doc.setTerraformBackend({ local: { path: '/data/terraform.tfstate' } })
            assert.strictEqual(doc.get('terraform.required_version'), '>= 0.11')
            assert.strictEqual(doc.get('terraform.backend.local.path'), '/data/terraform.tfstate')
        })
    })

    describe('get', () => {

        const doc = StateDocument.empty()
        doc.setManager(MANAGER)
        doc.add('cluster_triton_dev', CLUSTER)
        doc.add('node_triton_web', node('web', 'cluster_triton_dev'))
        doc.add('flags', { count: 3, enabled: false, nested: { list: [{ x: 'deep' }] } })

        it('resolves module fields', () => {
            assert.strictEqual(doc.get('module.cluster_triton_dev.name'), 'dev')
            assert.strictEqual(doc.get('module.cluster-manager.name'), 'ops')
        })

        it('indexes arrays with numeric segments', () => {
            assert.strictEqual(doc.get('module.node_triton_web.triton_network_names.1'), 'private')
            assert.strictEqual(doc.get('module.flags.nested.list.0.x'), 'deep')
            assert.strictEqual(doc.get('module.node_triton_web.triton_network_names.2'), undefined)
            assert.strictEqual(doc.get('module.node_triton_web.triton_network_names.first'), undefined)
        })

        it('returns undefined for paths that do not resolve', () => {
            assert.strictEqual(doc.get('module.missing.name'), undefined)
            assert.strictEqual(doc.get('module.cluster_triton_dev.missing'), undefined)
            assert.strictEqual(doc.get('module.cluster_triton_dev.name.deeper'), undefined)
            assert.strictEqual(doc.get('nosuchsection'), undefined)
            assert.strictEqual(doc.get(''), undefined)
            assert.strictEqual(doc.get('module..name'), undefined)
            assert.strictEqual(doc.get('module.flags.toString'), undefined)
        })

        it('returns whole records and the module section', () => {
            assert.deepStrictEqual(doc.get('module.cluster_triton_dev'), CLUSTER)
            expect(Object.keys(doc.get('module') ?? {})).to.deep.equal(['cluster-manager', 'cluster_triton_dev', 'node_triton_web', 'flags'])
        })

        it('returns copies', () => {
            const names = doc.get('module.node_triton_web.triton_network_names')
            if (!Array.isArray(names)) {
                throw new Error('expected an array')
            }
            names.push('mutated')
            assert.deepStrictEqual(doc.get('module.node_triton_web.triton_network_names'), ['Joyent-SDC-Public', 'private'])
        })

        it('renders scalars as strings with getString', () => {
            assert.strictEqual(doc.getString('module.flags.count'), '3')
            assert.strictEqual(doc.getString('module.flags.enabled'), 'false')
            assert.strictEqual(doc.getString('module.cluster_triton_dev.name'), 'dev')
            assert.strictEqual(doc.getString('module.flags.nested'), '')
            assert.strictEqual(doc.getString('module.missing'), '')
        })
    })

    describe('clusters and nodes', () => {

        const doc = StateDocument.empty()
        doc.setManager(MANAGER)
        doc.add('cluster_triton_dev', CLUSTER)
        doc.add('cluster_triton_prod', { ...CLUSTER, name: 'prod' })
        doc.add('node_triton_web', node('web', 'cluster_triton_dev'))
        doc.add('node_triton_db', node('db', 'cluster_triton_prod'))
        doc.add('node_triton_web-1', node('web-1', 'cluster_triton_dev'))
        doc.add('node_triton_orphan', { hostname: 'orphan' })

        it('lists cluster modules', () => {
            assert.deepStrictEqual(doc.clusters(), ['cluster_triton_dev', 'cluster_triton_prod'])
        })

        it('lists nodes linked to a cluster', () => {
            assert.deepStrictEqual(doc.nodes('cluster_triton_dev'), ['node_triton_web', 'node_triton_web-1'])
            assert.deepStrictEqual(doc.nodes('module.cluster_triton_prod'), ['node_triton_db'])
            assert.deepStrictEqual(doc.nodes('cluster_triton_none'), [])
        })

        it('lists node hostnames of a cluster or of the whole document', () => {
            assert.deepStrictEqual(doc.nodeHostnames('cluster_triton_dev'), ['web', 'web-1'])
            assert.deepStrictEqual(doc.nodeHostnames(), ['web', 'db', 'web-1', 'orphan'])
        })
    })

    describe('properties', () => {

        const moduleNameArb = fc.stringMatching(/^[a-zA-Z_][a-zA-Z0-9_-]{0,10}$/).filter(n => n !== '__proto__')
        const fieldArb = fc.stringMatching(/^[a-z][a-z0-9_]{0,8}$/)
        const scalarArb: fc.Arbitrary<JsonValue> = fc.oneof(
            fc.string(),
            fc.integer(),
            fc.double({ noNaN: true, noDefaultInfinity: true }),
            fc.boolean(),
            fc.constant(null),
        )
        const nestedArb: fc.Arbitrary<JsonValue> = fc.oneof(
            scalarArb,
            fc.array(scalarArb, { maxLength: 4 }),
            fc.dictionary(fieldArb, scalarArb, { maxKeys: 4, noNullPrototype: true }),
        )
        const valueArb: fc.Arbitrary<JsonValue> = fc.oneof(
            nestedArb,
            fc.array(nestedArb, { maxLength: 3 }),
            fc.dictionary(fieldArb, nestedArb, { maxKeys: 3, noNullPrototype: true }),
        )
        const modulesArb = fc.uniqueArray(
            fc.tuple(moduleNameArb, fc.dictionary(fieldArb, valueArb, { maxKeys: 5, noNullPrototype: true })),
            { selector: ([name]) => name, maxLength: 5 },
        )

        it('round-trips documents built with add byte for byte', () => {
            fc.assert(fc.property(modulesArb, (modules) => {
                const doc = StateDocument.empty()
                for (const [name, record] of modules) {
                    doc.add(name, record)
                }

                const bytes = doc.toString()
                const loaded = StateDocument.load(doc.bytes())
                assert.strictEqual(loaded.toString(), bytes)
                assert.deepStrictEqual(loaded.moduleNames(), modules.map(([name]) => name))
            }))
        })

        it('resolves every added field with get', () => {
            fc.assert(fc.property(modulesArb, (modules) => {
                const doc = StateDocument.empty()
                for (const [name, record] of modules) {
                    doc.add(name, record)
                }

                for (const [name, record] of modules) {
                    for (const [field, value] of Object.entries(record)) {
                        assert.deepStrictEqual(doc.get(`module.${name}.${field}`), value)
                    }
                }
            }))
        })
    })
})

import * as assert from 'assert'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { describe, it, beforeEach, afterEach } from 'mocha'
import { buildProgram, formatValue, readInputFile } from '../../../src/cli/program'
import { FleetManager } from '../../../src/core/manager'
import { StateDocument } from '../../../src/core/state/document'
import { InvalidInputError, NotFoundError } from '../../../src/core/errors/state'
import { MemoryStateBackend } from '../../helpers/stand-ins/memory-backend'
import { FakeProvisioner } from '../../helpers/stand-ins/fake-provisioner'
import {
    AZURE_MANAGER_INPUT,
    TRITON_CLUSTER_INPUT,
    TRITON_NODE_INPUT,
    testCoreConfig,
} from '../../helpers/fixtures'

describe('CLI program', () => {

    let tmpDir: string
    let backend: MemoryStateBackend
    let provisioner: FakeProvisioner
    let printed: string[]

    function writeInput(name: string, content: unknown): string {
        const file = path.join(tmpDir, name)
        fs.writeFileSync(file, JSON.stringify(content))
        return file
    }

    async function run(...args: string[]): Promise<string[]> {
        printed = []
        const fleet = new FleetManager({ backend, provisioner })
        const program = buildProgram({
            coreConfig: testCoreConfig(tmpDir),
            fleet,
            print: line => printed.push(line),
        })
        program.exitOverride()
        await program.parseAsync(['node', 'fleetform', ...args])
        return printed
    }

    async function createCluster(): Promise<void> {
        await run('create', 'manager', '--input', writeInput('manager.json', AZURE_MANAGER_INPUT))
        await run('create', 'cluster', '--manager', 'ops', '--input', writeInput('cluster.json', TRITON_CLUSTER_INPUT))
    }

    beforeEach(() => {
        tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'fleetform-cli-'))
        backend = new MemoryStateBackend()
        provisioner = new FakeProvisioner()
        printed = []
    })

    afterEach(() => {
        fs.rmSync(tmpDir, { recursive: true, force: true })
    })

    it('should create a cluster manager, a cluster and nodes from input files', async () => {
        assert.deepStrictEqual(
            await run('create', 'manager', '--input', writeInput('manager.json', AZURE_MANAGER_INPUT)),
            ['ops']
        )
        assert.deepStrictEqual(
            await run('create', 'cluster', '--manager', 'ops', '--input', writeInput('cluster.json', TRITON_CLUSTER_INPUT)),
            ['cluster_triton_dev']
        )
        assert.deepStrictEqual(
            await run('create', 'node', '--manager', 'ops', '--cluster', 'cluster_triton_dev',
                '--input', writeInput('node.json', { ...TRITON_NODE_INPUT, count: 2 })),
            ['web-1', 'web-2']
        )

        const stored = backend.stored('ops')
        assert.ok(stored)
        const doc = StateDocument.load(stored)
        assert.deepStrictEqual(doc.moduleNames(), [
            'cluster-manager',
            'cluster_triton_dev',
            'node_triton_web-1',
            'node_triton_web-2',
        ])
        assert.strictEqual(provisioner.calls.length, 3)
    })

    it('should list managers, clusters and nodes', async () => {
        await createCluster()
        await run('create', 'node', '--manager', 'ops', '--cluster', 'cluster_triton_dev', '--input', writeInput('node.json', TRITON_NODE_INPUT))

        assert.deepStrictEqual(await run('get', 'managers'), ['ops'])
        assert.deepStrictEqual(await run('get', 'clusters', '--manager', 'ops'), ['cluster_triton_dev'])
        assert.deepStrictEqual(await run('get', 'nodes', '--manager', 'ops', '--cluster', 'cluster_triton_dev'), ['node_triton_web'])
    })

    it('should print document values', async () => {
        await createCluster()

        assert.deepStrictEqual(await run('get', 'value', '--manager', 'ops', '--path', 'module.cluster_triton_dev.name'), ['dev'])
        assert.deepStrictEqual(await run('get', 'value', '--manager', 'ops', '--path', 'module.cluster_triton_dev.missing'), [''])
    })

    it('should destroy nodes, clusters and the cluster manager', async () => {
        await createCluster()
        await run('create', 'node', '--manager', 'ops', '--cluster', 'cluster_triton_dev', '--input', writeInput('node.json', TRITON_NODE_INPUT))

        await run('destroy', 'node', '--manager', 'ops', '--node', 'node_triton_web')
        assert.deepStrictEqual(provisioner.calls[provisioner.calls.length - 1].targets, ['node_triton_web'])
        assert.deepStrictEqual(await run('get', 'nodes', '--manager', 'ops', '--cluster', 'cluster_triton_dev'), [])

        await run('destroy', 'cluster', '--manager', 'ops', '--cluster', 'cluster_triton_dev')
        assert.deepStrictEqual(await run('get', 'clusters', '--manager', 'ops'), [])

        await run('destroy', 'manager', '--manager', 'ops')
        assert.deepStrictEqual(await run('get', 'managers'), [])
    })

    it('should fail on invalid module input', async () => {
        const input = writeInput('manager.json', { ...AZURE_MANAGER_INPUT, name: '' })

        await assert.rejects(run('create', 'manager', '--input', input), InvalidInputError)
        assert.strictEqual(backend.stored('ops'), undefined)
        assert.strictEqual(provisioner.calls.length, 0)
    })

    it('should fail to create a cluster without cluster manager', async () => {
        const input = writeInput('cluster.json', TRITON_CLUSTER_INPUT)

        await assert.rejects(run('create', 'cluster', '--manager', 'ops', '--input', input), NotFoundError)
    })

    describe('readInputFile', () => {

        it('should parse JSON input', async () => {
            assert.deepStrictEqual(await readInputFile(writeInput('input.json', { name: 'dev' })), { name: 'dev' })
        })

        it('should reject missing files and invalid JSON', async () => {
            const invalid = path.join(tmpDir, 'invalid.json')
            fs.writeFileSync(invalid, '{ not json')

            await assert.rejects(readInputFile(path.join(tmpDir, 'missing.json')), InvalidInputError)
            await assert.rejects(readInputFile(invalid), InvalidInputError)
        })
    })

    describe('formatValue', () => {

        it('should print strings raw and other values as JSON', () => {
            assert.strictEqual(formatValue(undefined), '')
            assert.strictEqual(formatValue('dev'), 'dev')
            assert.strictEqual(formatValue(3), '3')
            assert.strictEqual(formatValue(['a']), '[\n  "a"\n]')
        })
    })
})

import * as assert from 'assert'
import { describe, it } from 'mocha'
import { AzureManagerModuleBuilder } from '../../../src/providers/azure/manager'
import { TritonClusterModuleBuilder } from '../../../src/providers/triton/cluster'
import { TritonNodeModuleBuilder } from '../../../src/providers/triton/node'
import { InvalidInputError } from '../../../src/core/errors/state'
import { StateDocument } from '../../../src/core/state/document'
import { AZURE_MANAGER_INPUT, TRITON_CLUSTER_INPUT, TRITON_NODE_INPUT, testCoreConfig } from '../../helpers/fixtures'

const API_URL = 'http://${element(module.cluster-manager.masters, 0)}:8080'

describe('Provider module builders', () => {

    const config = testCoreConfig()

    describe('AzureManagerModuleBuilder', () => {

        const builder = new AzureManagerModuleBuilder(config)

        it('builds a manager module with defaults applied', () => {
            const record = builder.build(AZURE_MANAGER_INPUT)

            assert.strictEqual(record.source, 'example.test/fleetform-modules//terraform/modules/azure-rancher')
            assert.strictEqual(record.name, 'ops')
            assert.strictEqual(record.ha, false)
            assert.strictEqual(record.azure_environment, 'public')
            assert.strictEqual(record.azure_resource_group_name, 'ops')
            assert.strictEqual(record.azure_ssh_user, 'ubuntu')
            assert.strictEqual(record.azure_client_secret, 'test-secret')
            assert.strictEqual(record.rancher_admin_password, 'test-password')
        })

        it('leaves optional fields out of the stored record', () => {
            const doc = StateDocument.empty()
            doc.setManager(builder.build(AZURE_MANAGER_INPUT))

            const stored = doc.getManager() ?? {}
            assert.strictEqual('rancher_server_image' in stored, false)
            assert.strictEqual('azure_image_publisher' in stored, false)
            assert.strictEqual('rancher_registry' in stored, false)
        })

        it('passes registry credentials along with the registry', () => {
            const record = builder.build({
                ...AZURE_MANAGER_INPUT,
                registry: { url: 'registry.example.test', username: 'puller', password: 'test-password' },
            })

            assert.strictEqual(record.rancher_registry, 'registry.example.test')
            assert.strictEqual(record.rancher_registry_username, 'puller')
            assert.strictEqual(record.rancher_registry_password, 'test-password')
        })

        it('lists every invalid field', () => {
            assert.throws(() => builder.build({ ...AZURE_MANAGER_INPUT, location: '', environment: 'moon' }), (e: unknown) => {
                assert.ok(e instanceof InvalidInputError)
                assert.ok(e.message.startsWith('Invalid module input: Azure cluster manager: '))
                assert.ok(e.message.includes('environment: '))
                assert.ok(e.message.includes('location: '))
                return true
            })
        })
    })

    describe('TritonClusterModuleBuilder', () => {

        const builder = new TritonClusterModuleBuilder(config)

        it('builds the cluster module and its key', () => {
            const cluster = builder.build(TRITON_CLUSTER_INPUT)

            assert.strictEqual(cluster.key, 'cluster_triton_dev')
            assert.strictEqual(cluster.record.source, 'example.test/fleetform-modules//terraform/modules/triton-rancher-k8s')
            assert.strictEqual(cluster.record.name, 'dev')
            assert.strictEqual(cluster.record.rancher_api_url, API_URL)
            assert.strictEqual(cluster.record.k8s_plane_isolation, 'none')
            assert.strictEqual(cluster.record.triton_account, 'ops-team')
            assert.strictEqual(cluster.record.triton_key_id, 'aa:bb:cc:dd')
        })

        it('rejects names unusable in module keys', () => {
            assert.throws(() => builder.build({ ...TRITON_CLUSTER_INPUT, name: 'my cluster' }), InvalidInputError)
        })
    })

    describe('TritonNodeModuleBuilder', () => {

        const builder = new TritonNodeModuleBuilder(config)

        it('links the node to its cluster and labels its role', () => {
            const input = builder.parse({ ...TRITON_NODE_INPUT, role: 'etcd' })
            const record = builder.build(input, 'cluster_triton_dev', 'web-2')

            assert.strictEqual(record.source, 'example.test/fleetform-modules//terraform/modules/triton-rancher-k8s-host')
            assert.strictEqual(record.hostname, 'web-2')
            assert.strictEqual(record.rancher_environment_id, '${module.cluster_triton_dev.rancher_environment_id}')
            assert.strictEqual(record.rancher_api_url, API_URL)
            assert.deepStrictEqual(record.rancher_host_labels, { etcd: 'true' })
            assert.deepStrictEqual(record.triton_network_names, ['public-net'])
            assert.strictEqual(record.triton_ssh_user, 'root')
        })

        it('defaults to a single node', () => {
            assert.strictEqual(builder.parse(TRITON_NODE_INPUT).count, 1)
        })

        it('rejects unknown roles and invalid hostnames', () => {
            assert.throws(() => builder.parse({ ...TRITON_NODE_INPUT, role: 'storage' }), InvalidInputError)
            assert.throws(() => builder.parse({ ...TRITON_NODE_INPUT, hostname: 'web_1' }), InvalidInputError)
            assert.throws(() => builder.parse({ ...TRITON_NODE_INPUT, count: 0 }), InvalidInputError)
        })
    })
})

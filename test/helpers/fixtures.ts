/**
 * Fully-resolved module inputs shared by provider, workflow and CLI tests
 */

import { CoreConfig } from '../../src/core/config/interface'

export const TEST_MODULE_SOURCE_URL = 'example.test/fleetform-modules'

export function testCoreConfig(dataDir: string = '/tmp/fleetform-test'): CoreConfig {
    return {
        terraform: {
            binary: 'terraform',
            moduleSourceUrl: TEST_MODULE_SOURCE_URL,
        },
        stateBackend: {
            local: { dataDir },
        },
        lock: {
            waitTimeoutSeconds: 0,
            pollIntervalMs: 10,
        },
    }
}

export const AZURE_MANAGER_INPUT = {
    name: 'ops',
    adminPassword: 'test-password',
    subscriptionId: 'sub-0000',
    clientId: 'client-0000',
    clientSecret: 'test-secret',
    tenantId: 'tenant-0000',
    location: 'West US 2',
    size: 'Standard_D2_v3',
    publicKeyPath: '/home/ops/.ssh/id_rsa.pub',
    privateKeyPath: '/home/ops/.ssh/id_rsa',
}

export const TRITON_CREDENTIALS = {
    account: 'ops-team',
    keyPath: '/home/ops/.ssh/triton',
    keyId: 'aa:bb:cc:dd',
}

export const TRITON_CLUSTER_INPUT = {
    name: 'dev',
    credentials: TRITON_CREDENTIALS,
}

export const TRITON_NODE_INPUT = {
    hostname: 'web',
    role: 'compute',
    credentials: TRITON_CREDENTIALS,
    networkNames: ['public-net'],
    imageName: 'ubuntu-certified-22.04',
    imageVersion: '20240101',
    machinePackage: 'k4-highcpu-kvm-1.75G',
}

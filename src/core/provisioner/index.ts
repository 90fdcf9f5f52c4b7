export type { InfrastructureProvisioner } from './provisioner'
export { TerraformProvisioner } from './terraform'
export type { TerraformProvisionerArgs } from './terraform'

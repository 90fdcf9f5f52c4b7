/**
 * Triton Provider Module
 */

export {
  TritonCredentialsV1Schema,
  type TritonCredentialsV1
} from './credentials';

export {
  TritonClusterModuleBuilder,
  TritonClusterInputV1Schema,
  TRITON_CLUSTER_MODULE_PATH,
  PLANE_ISOLATION_MODES,
  type TritonClusterInputV1,
  type TritonClusterModule
} from './cluster';

export {
  TritonNodeModuleBuilder,
  TritonNodeInputV1Schema,
  TRITON_NODE_MODULE_PATH,
  type TritonNodeInputV1
} from './node';

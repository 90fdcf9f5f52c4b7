/**
 * Azure Provider Module
 */

export {
  AzureManagerModuleBuilder,
  AzureManagerInputV1Schema,
  AZURE_MANAGER_MODULE_PATH,
  AZURE_ENVIRONMENTS,
  type AzureManagerInputV1
} from './manager';

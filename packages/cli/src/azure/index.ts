/**
 * Azure CLI utilities for appship
 */

export {
  createAzRunner,
  runAzJson,
  runAzTsv,
  summarizeStderr,
  describeCommand,
  AzCliError,
  type AzRunner,
  type AzResult,
  type AzRunnerOptions,
} from './runner';

export {
  getAzVersion,
  isBicepAvailable,
  installBicep,
  getAccount,
  setSubscription,
  type AzureAccount,
} from './account';

export {
  validateSubscriptionDeployment,
  whatIfSubscriptionDeployment,
  createSubscriptionDeployment,
  getSubscriptionDeploymentOutputs,
  resourceGroupExists,
  deleteResourceGroup,
  getWebApp,
  type SubscriptionDeploymentRequest,
  type WebAppInfo,
} from './deployments';

export {
  findAdApp,
  createAdApp,
  findServicePrincipal,
  createServicePrincipal,
  listRoleAssignments,
  createRoleAssignment,
  listFederatedCredentials,
  createFederatedCredential,
  type AdApplication,
  type ServicePrincipal,
  type RoleAssignment,
  type FederatedCredential,
} from './identity';

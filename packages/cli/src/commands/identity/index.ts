/**
 * Identity commands
 * Commands for CI identities and federated credentials
 */

export { oidcCommand } from './oidc';

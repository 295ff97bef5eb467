/**
 * appship CLI Commands
 *
 * Commands are organized into groups:
 * - infra/    - Infrastructure (deploy, validate, status, destroy, doctor)
 * - identity/ - CI identities (oidc)
 */

// Infrastructure commands
export {
  deployCommand,
  validateCommand,
  statusCommand,
  destroyCommand,
  doctorCommand,
} from './infra';

// Identity commands
export { oidcCommand } from './identity';

/**
 * Entra ID application identities, service principals, role assignments
 * and federated credentials
 */

import { z } from 'zod';
import { runAzJson, type AzRunner } from './runner';

export interface AdApplication {
  /** Client id used by workflows to log in */
  appId: string;
  /** Directory object id used to manage the application */
  objectId: string;
  displayName: string;
}

export interface ServicePrincipal {
  objectId: string;
  appId: string;
}

export interface RoleAssignment {
  id: string;
  roleDefinitionName: string;
  scope: string;
}

export interface FederatedCredential {
  name: string;
  issuer: string;
  subject: string;
  description?: string;
  audiences: string[];
}

const applicationSchema = z.object({
  appId: z.string(),
  id: z.string(),
  displayName: z.string(),
});

const servicePrincipalSchema = z.object({
  id: z.string(),
  appId: z.string(),
});

const roleAssignmentSchema = z.object({
  id: z.string(),
  roleDefinitionName: z.string().optional(),
  scope: z.string(),
});

const federatedCredentialSchema = z.object({
  name: z.string(),
  issuer: z.string(),
  subject: z.string(),
  description: z.string().nullish(),
  audiences: z.array(z.string()),
});

function parseWith<T>(schema: z.ZodType<T>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Unexpected ${what} from az: ${result.error.issues[0]?.message ?? 'invalid'}`);
  }
  return result.data;
}

function toApplication(app: z.infer<typeof applicationSchema>): AdApplication {
  return { appId: app.appId, objectId: app.id, displayName: app.displayName };
}

/**
 * Find an application by exact display name
 */
export async function findAdApp(runner: AzRunner, displayName: string): Promise<AdApplication | null> {
  const raw = await runAzJson(runner, ['ad', 'app', 'list', '--display-name', displayName]);
  const apps = parseWith(z.array(applicationSchema), raw ?? [], 'application list');
  const match = apps.find((app) => app.displayName === displayName);
  return match ? toApplication(match) : null;
}

/**
 * Register a new application
 */
export async function createAdApp(runner: AzRunner, displayName: string): Promise<AdApplication> {
  const raw = await runAzJson(runner, ['ad', 'app', 'create', '--display-name', displayName]);
  return toApplication(parseWith(applicationSchema, raw, 'application'));
}

/**
 * Find the service principal for an application
 */
export async function findServicePrincipal(
  runner: AzRunner,
  appId: string
): Promise<ServicePrincipal | null> {
  const raw = await runAzJson(runner, ['ad', 'sp', 'list', '--filter', `appId eq '${appId}'`]);
  const principals = parseWith(z.array(servicePrincipalSchema), raw ?? [], 'service principal list');
  const match = principals[0];
  return match ? { objectId: match.id, appId: match.appId } : null;
}

/**
 * Create the service principal for an application
 */
export async function createServicePrincipal(
  runner: AzRunner,
  appId: string
): Promise<ServicePrincipal> {
  const raw = await runAzJson(runner, ['ad', 'sp', 'create', '--id', appId]);
  const sp = parseWith(servicePrincipalSchema, raw, 'service principal');
  return { objectId: sp.id, appId: sp.appId };
}

/**
 * List role assignments of a principal at a scope
 */
export async function listRoleAssignments(
  runner: AzRunner,
  principalObjectId: string,
  role: string,
  scope: string
): Promise<RoleAssignment[]> {
  const raw = await runAzJson(runner, [
    'role',
    'assignment',
    'list',
    '--assignee',
    principalObjectId,
    '--role',
    role,
    '--scope',
    scope,
  ]);
  const assignments = parseWith(z.array(roleAssignmentSchema), raw ?? [], 'role assignment list');
  return assignments.map((a) => ({
    id: a.id,
    roleDefinitionName: a.roleDefinitionName ?? role,
    scope: a.scope,
  }));
}

/**
 * Assign a role to a service principal at a scope
 */
export async function createRoleAssignment(
  runner: AzRunner,
  principalObjectId: string,
  role: string,
  scope: string
): Promise<RoleAssignment> {
  const raw = await runAzJson(runner, [
    'role',
    'assignment',
    'create',
    '--assignee-object-id',
    principalObjectId,
    '--assignee-principal-type',
    'ServicePrincipal',
    '--role',
    role,
    '--scope',
    scope,
  ]);
  const assignment = parseWith(roleAssignmentSchema, raw, 'role assignment');
  return {
    id: assignment.id,
    roleDefinitionName: assignment.roleDefinitionName ?? role,
    scope: assignment.scope,
  };
}

/**
 * List the federated credentials registered on an application
 */
export async function listFederatedCredentials(
  runner: AzRunner,
  appObjectId: string
): Promise<FederatedCredential[]> {
  const raw = await runAzJson(runner, ['ad', 'app', 'federated-credential', 'list', '--id', appObjectId]);
  const credentials = parseWith(z.array(federatedCredentialSchema), raw ?? [], 'federated credential list');
  return credentials.map((c) => ({
    name: c.name,
    issuer: c.issuer,
    subject: c.subject,
    audiences: c.audiences,
    ...(c.description ? { description: c.description } : {}),
  }));
}

/**
 * Register a federated credential on an application
 */
export async function createFederatedCredential(
  runner: AzRunner,
  appObjectId: string,
  credential: FederatedCredential
): Promise<FederatedCredential> {
  const raw = await runAzJson(runner, [
    'ad',
    'app',
    'federated-credential',
    'create',
    '--id',
    appObjectId,
    '--parameters',
    JSON.stringify(credential),
  ]);
  const created = parseWith(federatedCredentialSchema, raw, 'federated credential');
  return {
    name: created.name,
    issuer: created.issuer,
    subject: created.subject,
    audiences: created.audiences,
    ...(created.description ? { description: created.description } : {}),
  };
}

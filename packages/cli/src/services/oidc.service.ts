/**
 * GitHub Actions OIDC federation
 *
 * Creates (or reuses) one application identity with a service principal and
 * a role assignment on the subscription, then trusts two GitHub subjects:
 * pushes to the default branch and pull requests. Reruns find the existing
 * objects and report the same identifiers.
 */

import * as path from 'path';
import {
  createAdApp,
  createFederatedCredential,
  createRoleAssignment,
  createServicePrincipal,
  findAdApp,
  findServicePrincipal,
  listFederatedCredentials,
  listRoleAssignments,
  type AdApplication,
  type AzRunner,
  type FederatedCredential,
  type ServicePrincipal,
} from '../azure';
import type { CliConfig } from '../config';
import { ConfigError, DeploymentError, errorMessage } from '../errors';
import { createCommandLogger } from '../logger';
import type { StepReporter } from '../reporter';
import { checkPrerequisites } from './prerequisites.service';
import { writeOidcReceipt, type OidcReceipt } from './receipt.service';

const log = createCommandLogger('oidc');

const GITHUB_NAME = /^[A-Za-z0-9_.-]+$/;

export interface OidcSetupOptions {
  org?: string;
  repo?: string;
  appName?: string;
  branch?: string;
  role?: string;
  subscription?: string;
}

export interface OidcContext {
  runner: AzRunner;
  reporter: StepReporter;
  config: CliConfig;
  cwd: string;
  now?: Date;
}

export interface OidcSetupResult {
  receipt: OidcReceipt;
  receiptPath: string;
  createdApplication: boolean;
  createdServicePrincipal: boolean;
  createdRoleAssignment: boolean;
  createdCredentials: string[];
  existingCredentials: string[];
}

export interface GithubTarget {
  org: string;
  repo: string;
  branch: string;
}

/** Subject GitHub puts in tokens for workflow runs on a branch */
export function branchSubject(target: GithubTarget): string {
  return `repo:${target.org}/${target.repo}:ref:refs/heads/${target.branch}`;
}

/** Subject GitHub puts in tokens for pull_request workflow runs */
export function pullRequestSubject(target: GithubTarget): string {
  return `repo:${target.org}/${target.repo}:pull_request`;
}

function credentialName(...parts: string[]): string {
  return parts
    .join('-')
    .replace(/[^A-Za-z0-9_-]+/g, '-')
    .replace(/-+/g, '-')
    .slice(0, 120);
}

/**
 * The two trust relationships registered on the application
 */
export function buildFederatedCredentials(
  target: GithubTarget,
  issuer: string,
  audience: string
): FederatedCredential[] {
  return [
    {
      name: credentialName('github', target.repo, target.branch),
      issuer,
      subject: branchSubject(target),
      description: `GitHub Actions on ${target.branch} of ${target.org}/${target.repo}`,
      audiences: [audience],
    },
    {
      name: credentialName('github', target.repo, 'pull-request'),
      issuer,
      subject: pullRequestSubject(target),
      description: `GitHub Actions pull requests of ${target.org}/${target.repo}`,
      audiences: [audience],
    },
  ];
}

function resolveTarget(options: OidcSetupOptions, config: CliConfig): GithubTarget {
  const target: GithubTarget = {
    org: options.org ?? config.oidc.githubOrg,
    repo: options.repo ?? config.oidc.githubRepo,
    branch: options.branch ?? config.oidc.branch,
  };

  if (!GITHUB_NAME.test(target.org)) {
    throw new ConfigError(`Invalid GitHub organization: ${target.org}`);
  }
  if (!GITHUB_NAME.test(target.repo)) {
    throw new ConfigError(`Invalid GitHub repository: ${target.repo}`);
  }
  if (!target.branch || /\s/.test(target.branch)) {
    throw new ConfigError(`Invalid branch name: ${target.branch}`);
  }
  return target;
}

async function step<T>(reporter: StepReporter, failure: string, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    reporter.fail(failure);
    log.error(failure, error);
    throw new DeploymentError(
      `${failure}: ${errorMessage(error)}`,
      'Fix the cause and rerun; objects created so far are reused.'
    );
  }
}

/**
 * Configure OIDC federation end to end
 */
export async function setupOidc(options: OidcSetupOptions, ctx: OidcContext): Promise<OidcSetupResult> {
  const { runner, reporter, config } = ctx;
  const target = resolveTarget(options, config);
  const appName = options.appName ?? config.oidc.appName;
  const role = options.role ?? config.oidc.role;

  const { account } = await checkPrerequisites(runner, reporter, {
    subscription: options.subscription ?? config.subscription,
  });
  const scope = `/subscriptions/${account.subscriptionId}`;

  // 1. Application identity
  reporter.start(`Looking up application ${appName}...`);
  let app: AdApplication | null = await step(reporter, 'Could not query applications', () =>
    findAdApp(runner, appName)
  );
  const createdApplication = app === null;
  if (!app) {
    reporter.start(`Creating application ${appName}...`);
    app = await step(reporter, 'Could not create application', () => createAdApp(runner, appName));
    reporter.succeed(`Created application ${appName} (${app.appId})`);
  } else {
    reporter.succeed(`Using existing application ${appName} (${app.appId})`);
  }
  const application = app;

  // 2. Service principal
  reporter.start('Looking up service principal...');
  let sp: ServicePrincipal | null = await step(reporter, 'Could not query service principals', () =>
    findServicePrincipal(runner, application.appId)
  );
  const createdServicePrincipal = sp === null;
  if (!sp) {
    reporter.start('Creating service principal...');
    sp = await step(reporter, 'Could not create service principal', () =>
      createServicePrincipal(runner, application.appId)
    );
    reporter.succeed(`Created service principal (${sp.objectId})`);
  } else {
    reporter.succeed(`Using existing service principal (${sp.objectId})`);
  }
  const principal = sp;

  // 3. Role assignment
  reporter.start(`Checking ${role} assignment on ${scope}...`);
  const assignments = await step(reporter, 'Could not query role assignments', () =>
    listRoleAssignments(runner, principal.objectId, role, scope)
  );
  const createdRoleAssignment = assignments.length === 0;
  if (createdRoleAssignment) {
    reporter.start(`Assigning ${role} on ${scope}...`);
    await step(reporter, `Could not assign ${role}`, () =>
      createRoleAssignment(runner, principal.objectId, role, scope)
    );
    reporter.succeed(`Assigned ${role} on ${scope}`);
  } else {
    reporter.succeed(`${role} already assigned on ${scope}`);
  }

  // 4. Federated credentials
  const desired = buildFederatedCredentials(target, config.oidc.issuer, config.oidc.audience);
  reporter.start('Checking federated credentials...');
  const existing = await step(reporter, 'Could not list federated credentials', () =>
    listFederatedCredentials(runner, application.objectId)
  );

  const createdCredentials: string[] = [];
  const existingCredentials: string[] = [];
  for (const credential of desired) {
    const match = existing.find((c) => c.subject === credential.subject && c.issuer === credential.issuer);
    if (match) {
      existingCredentials.push(credential.subject);
      reporter.succeed(`Federated credential for ${credential.subject} already exists (${match.name})`);
      continue;
    }

    reporter.start(`Creating federated credential for ${credential.subject}...`);
    await step(reporter, `Could not create federated credential ${credential.name}`, () =>
      createFederatedCredential(runner, application.objectId, credential)
    );
    createdCredentials.push(credential.subject);
    reporter.succeed(`Created federated credential for ${credential.subject}`);
  }

  // 5. Receipt
  const receipt: OidcReceipt = {
    clientId: application.appId,
    tenantId: account.tenantId,
    subscriptionId: account.subscriptionId,
    repository: `${target.org}/${target.repo}`,
    appObjectId: application.objectId,
    servicePrincipalId: principal.objectId,
    role,
    subjects: desired.map((c) => c.subject),
    timestamp: (ctx.now ?? new Date()).toISOString(),
  };
  const receiptPath = await writeOidcReceipt(path.resolve(ctx.cwd, config.stateDir), receipt);
  log.info('OIDC setup complete', { receiptPath, createdCredentials, existingCredentials });

  return {
    receipt,
    receiptPath,
    createdApplication,
    createdServicePrincipal,
    createdRoleAssignment,
    createdCredentials,
    existingCredentials,
  };
}

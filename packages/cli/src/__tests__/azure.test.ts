import { describe, it, expect } from 'vitest';
import {
  createSubscriptionDeployment,
  findAdApp,
  getAzVersion,
  getWebApp,
  listFederatedCredentials,
  resourceGroupExists,
} from '../azure';
import { FakeAzRunner } from './helpers/fake-az';

const request = {
  deploymentName: 'infrastructure-deployment-20240115090503',
  location: 'East US',
  templateFile: '/repo/bicep/deploy.bicep',
  parameters: ['sku=B1'],
};

describe('azure wrappers', () => {
  it('should detect a missing az', async () => {
    const runner = new FakeAzRunner().on('version', { error: { notInstalled: true } });

    expect(await getAzVersion(runner)).toBeNull();
  });

  it('should report an unrecognised version document as unknown', async () => {
    const runner = new FakeAzRunner().on('version', { json: { extensions: {} } });

    expect(await getAzVersion(runner)).toBe('unknown');
  });

  it('should read the provisioning state of a deployment', async () => {
    const runner = new FakeAzRunner().on('deployment sub create', { json: { unexpected: true } });

    expect(await createSubscriptionDeployment(runner, request)).toBe('Unknown');
    expect(runner.calls[0]).toEqual([
      'deployment',
      'sub',
      'create',
      '--name',
      'infrastructure-deployment-20240115090503',
      '--location',
      'East US',
      '--template-file',
      '/repo/bicep/deploy.bicep',
      '--parameters',
      'sku=B1',
      '--output',
      'json',
    ]);
  });

  it('should compare group existence as text', async () => {
    const runner = new FakeAzRunner().on('group exists', { stdout: 'false\n' });

    expect(await resourceGroupExists(runner, 'rg-demo')).toBe(false);
    expect(runner.calls[0]).toEqual(['group', 'exists', '--name', 'rg-demo', '--output', 'tsv']);
  });

  it('should return null for a web app az cannot find', async () => {
    const runner = new FakeAzRunner().on('webapp show', {
      error: { stderr: "ERROR: The Resource 'Microsoft.Web/sites/webapp-demo' was not found." },
    });

    expect(await getWebApp(runner, 'rg-demo', 'webapp-demo')).toBeNull();
  });

  it('should only match applications by exact display name', async () => {
    const runner = new FakeAzRunner().on('ad app list', {
      json: [{ appId: 'app-1', id: 'object-1', displayName: 'github-actions-oidc-old' }],
    });

    expect(await findAdApp(runner, 'github-actions-oidc')).toBeNull();
  });

  it('should drop empty credential descriptions', async () => {
    const runner = new FakeAzRunner().on('ad app federated-credential list', {
      json: [
        {
          name: 'github-dotnet-webapp-main',
          issuer: 'https://token.actions.githubusercontent.com',
          subject: 'repo:my-org/dotnet-webapp:ref:refs/heads/main',
          description: null,
          audiences: ['api://AzureADTokenExchange'],
        },
      ],
    });

    expect(await listFederatedCredentials(runner, 'object-1')).toEqual([
      {
        name: 'github-dotnet-webapp-main',
        issuer: 'https://token.actions.githubusercontent.com',
        subject: 'repo:my-org/dotnet-webapp:ref:refs/heads/main',
        audiences: ['api://AzureADTokenExchange'],
      },
    ]);
  });
});

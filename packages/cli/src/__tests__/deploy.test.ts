import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { runDeployCommand } from '../commands/infra/deploy';
import { runValidateCommand } from '../commands/infra/validate';
import { ConfigError, DeploymentError, TemplateValidationError } from '../errors';
import { configureLogger } from '../logger';
import { planDeployment, runDeployment, type DeployContext } from '../services/deploy.service';
import { readDeploymentReceipt } from '../services/receipt.service';
import {
  FakeAzRunner,
  SUBSCRIPTION_ID,
  TEMPLATE_FILE,
  cleanupTempDir,
  createTempDir,
  fileExists,
  recordingReporter,
  signedInRunner,
  testConfig,
} from './helpers/fake-az';

const NOW = new Date(2024, 0, 15, 9, 5, 3);
const STAMP = '20240115090503';
const DEPLOYMENT_NAME = `infrastructure-deployment-${STAMP}`;
const RESOURCE_GROUP = `rg-dotnet-app-${STAMP}`;
const WEB_APP = `webapp-dotnet-${STAMP}`;
const WEB_APP_URL = `https://${WEB_APP}.azurewebsites.net`;

function deployingRunner(): FakeAzRunner {
  return signedInRunner()
    .on('deployment sub validate', { json: { properties: { provisioningState: 'Succeeded' } } })
    .on('deployment sub create', {
      json: { name: DEPLOYMENT_NAME, properties: { provisioningState: 'Succeeded' } },
    })
    .on('deployment sub show', {
      json: {
        webAppUrl: { type: 'String', value: WEB_APP_URL },
        webAppName: { type: 'String', value: WEB_APP },
        resourceGroupName: { type: 'String', value: RESOURCE_GROUP },
      },
    });
}

describe('appship deploy', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    configureLogger({ filePath: path.join(tempDir, 'debug.log') });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  it('should deploy with generated names and write a receipt', async () => {
    const runner = deployingRunner();

    const code = await runDeployCommand(
      { yes: true },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(0);
    expect(runner.commands()).toEqual([
      'version',
      'bicep version',
      'account show',
      'deployment sub validate',
      'deployment sub create',
      'deployment sub show',
    ]);
    expect(runner.argsOf('deployment sub create')).toEqual([
      'deployment',
      'sub',
      'create',
      '--name',
      DEPLOYMENT_NAME,
      '--location',
      'East US',
      '--template-file',
      TEMPLATE_FILE,
      '--parameters',
      `resourceGroupName=${RESOURCE_GROUP}`,
      'location=East US',
      `webAppName=${WEB_APP}`,
      'sku=B1',
      'runtimeVersion=8.0',
      'environment=dev',
      'tags={"costCenter":"web"}',
      '--output',
      'json',
    ]);

    const receipt = await readDeploymentReceipt(path.join(tempDir, '.appship'));
    expect(receipt).toEqual({
      resourceGroupName: RESOURCE_GROUP,
      webAppName: WEB_APP,
      webAppUrl: WEB_APP_URL,
      deploymentName: DEPLOYMENT_NAME,
      location: 'East US',
      environment: 'dev',
      subscriptionId: SUBSCRIPTION_ID,
      timestamp: NOW.toISOString(),
    });
  });

  it('should let command-line options override the parameter file', async () => {
    const runner = deployingRunner();

    const code = await runDeployCommand(
      {
        yes: true,
        env: 'prod',
        sku: 'S1',
        resourceGroup: 'rg-contoso',
        name: 'webapp-contoso',
        planName: 'asp-custom',
      },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(0);
    const args = runner.argsOf('deployment sub create') ?? [];
    expect(args.slice(args.indexOf('--parameters') + 1, args.indexOf('--output'))).toEqual([
      'resourceGroupName=rg-contoso',
      'location=East US',
      'webAppName=webapp-contoso',
      'sku=S1',
      'runtimeVersion=8.0',
      'environment=prod',
      'appServicePlanName=asp-custom',
      'tags={"costCenter":"web"}',
    ]);
  });

  it('should stop before any deployment call when az is not installed', async () => {
    const runner = new FakeAzRunner().on('version', { error: { notInstalled: true } });

    const code = await runDeployCommand(
      { yes: true },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(1);
    expect(runner.commands()).toEqual(['version']);
    expect(await fileExists(path.join(tempDir, '.appship', 'deployment.json'))).toBe(false);
  });

  it('should stop when not logged in', async () => {
    const runner = deployingRunner().on('account show', {
      error: { stderr: "ERROR: Please run 'az login' to setup account." },
    });

    const code = await runDeployCommand(
      { yes: true },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(1);
    expect(runner.commands()).toEqual(['version', 'bicep version', 'account show']);
    expect(runner.called('deployment sub create')).toBe(false);
  });

  it('should install Bicep when it is missing', async () => {
    const runner = deployingRunner()
      .on('bicep version', { error: { stderr: 'ERROR: Bicep CLI not found.' } })
      .on('bicep install', { stdout: 'Successfully installed Bicep CLI\n' });
    const reporter = recordingReporter();

    const code = await runDeployCommand(
      { yes: true },
      { runner, reporter, config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(0);
    expect(runner.commands().slice(0, 3)).toEqual(['version', 'bicep version', 'bicep install']);
    expect(reporter.events).toContain('warn: Bicep is not installed. Installing now...');
  });

  it('should not deploy when the provider rejects the template', async () => {
    const runner = deployingRunner().on('deployment sub validate', {
      error: { stderr: 'ERROR: InvalidTemplateDeployment: The SKU is not available in this region.' },
    });

    const code = await runDeployCommand(
      { yes: true },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(1);
    expect(runner.called('deployment sub create')).toBe(false);
    expect(await fileExists(path.join(tempDir, '.appship', 'deployment.json'))).toBe(false);
  });

  it('should reject invalid parameters before calling az', async () => {
    const runner = deployingRunner();

    const code = await runDeployCommand(
      { yes: true, sku: 'P9' },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(1);
    expect(runner.calls).toEqual([]);
  });

  it('should do nothing when the confirmation is declined', async () => {
    const runner = deployingRunner();
    const confirm = vi.fn().mockResolvedValue(false);

    const code = await runDeployCommand(
      {},
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW, confirm }
    );

    expect(code).toBe(0);
    expect(confirm).toHaveBeenCalledWith('Do you want to proceed with deployment?');
    expect(runner.calls).toEqual([]);
  });

  it('should not prompt for --what-if', async () => {
    const runner = deployingRunner().on('deployment sub what-if', { stdout: 'Resource changes: 3 to create.\n' });
    const confirm = vi.fn().mockResolvedValue(false);

    const code = await runDeployCommand(
      { whatIf: true },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW, confirm }
    );

    expect(code).toBe(0);
    expect(confirm).not.toHaveBeenCalled();
    expect(runner.called('deployment sub what-if')).toBe(true);
    expect(runner.called('deployment sub create')).toBe(false);
  });

  it('should fail when the deployment call fails', async () => {
    const runner = deployingRunner().on('deployment sub create', {
      error: { stderr: 'ERROR: Conflict: website name already taken' },
    });

    const code = await runDeployCommand(
      { yes: true },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(1);
    expect(runner.called('deployment sub show')).toBe(false);
    expect(await fileExists(path.join(tempDir, '.appship', 'deployment.json'))).toBe(false);
  });
});

describe('appship validate', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
    configureLogger({ filePath: path.join(tempDir, 'debug.log') });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  it('should validate without deploying', async () => {
    const runner = deployingRunner();

    const code = await runValidateCommand(
      { env: 'staging' },
      { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW }
    );

    expect(code).toBe(0);
    expect(runner.commands()).toEqual(['version', 'bicep version', 'account show', 'deployment sub validate']);
    expect(runner.argsOf('deployment sub validate')).toContain('environment=staging');
  });
});

describe('deploy service', () => {
  let tempDir: string;

  function context(runner: FakeAzRunner, overrides: Partial<DeployContext> = {}): DeployContext {
    return { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir, now: NOW, ...overrides };
  }

  beforeEach(async () => {
    tempDir = await createTempDir();
    configureLogger({ filePath: path.join(tempDir, 'debug.log') });
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  describe('planDeployment', () => {
    it('should prefer options over the parameter file over configuration', () => {
      const ctx = context(new FakeAzRunner(), { config: testConfig({ location: 'West Europe', sku: 'F1' }) });

      const fromFile = planDeployment({}, ctx);
      expect(fromFile.parameters.location).toBe('East US');
      expect(fromFile.parameters.sku).toBe('B1');

      const fromOptions = planDeployment({ location: 'North Europe' }, ctx);
      expect(fromOptions.parameters.location).toBe('North Europe');
      expect(fromOptions.request.location).toBe('North Europe');
    });

    it('should fall back to configuration when no parameter file exists', () => {
      const ctx = context(new FakeAzRunner(), {
        config: testConfig({ parametersDir: tempDir, location: 'West Europe', sku: 'F1' }),
      });

      const plan = planDeployment({}, ctx);

      expect(plan.parameterFile).toBeNull();
      expect(plan.parameters).toEqual({
        resourceGroupName: RESOURCE_GROUP,
        location: 'West Europe',
        webAppName: WEB_APP,
        sku: 'F1',
        runtimeVersion: '8.0',
        environment: 'dev',
      });
      expect(plan.deploymentName).toBe(DEPLOYMENT_NAME);
    });

    it('should require a parameter file for an explicit environment', () => {
      const ctx = context(new FakeAzRunner());

      expect(() => planDeployment({ env: 'qa' }, ctx)).toThrow(ConfigError);
      expect(() => planDeployment({ env: 'qa' }, ctx)).toThrow('No parameter file for environment "qa"');
    });

    it('should fail for a missing template', () => {
      const ctx = context(new FakeAzRunner());
      const missing = path.join(tempDir, 'missing.bicep');

      expect(() => planDeployment({ template: missing }, ctx)).toThrow(`Template file not found: ${missing}`);
    });

    it('should report every invalid parameter', () => {
      const ctx = context(new FakeAzRunner());

      try {
        planDeployment({ sku: 'P9', name: '-bad-' }, ctx);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(TemplateValidationError);
        if (error instanceof TemplateValidationError) {
          expect(error.details).toContain('sku: sku must be one of: F1, B1, B2, B3, S1, S2, S3, P1v3, P2v3, P3v3');
          expect(error.details.some((d) => d.startsWith('webAppName: '))).toBe(true);
        }
      }
    });

    it('should reject a broken parameter file', async () => {
      const parametersDir = path.join(tempDir, 'parameters');
      await fs.mkdir(parametersDir);
      await fs.writeFile(path.join(parametersDir, 'dev.parameters.json'), '{ not json');
      const ctx = context(new FakeAzRunner(), { config: testConfig({ parametersDir }) });

      expect(() => planDeployment({}, ctx)).toThrow(TemplateValidationError);
    });
  });

  describe('runDeployment', () => {
    it('should stop after provider validation with validateOnly', async () => {
      const runner = deployingRunner();

      const result = await runDeployment({ validateOnly: true }, context(runner));

      expect(result.status).toBe('validated');
      expect(runner.called('deployment sub create')).toBe(false);
    });

    it('should return the what-if preview', async () => {
      const runner = deployingRunner().on('deployment sub what-if', { stdout: 'Resource changes: 3 to create.\n' });

      const result = await runDeployment({ whatIf: true }, context(runner));

      expect(result.status).toBe('previewed');
      if (result.status === 'previewed') {
        expect(result.preview).toBe('Resource changes: 3 to create.\n');
      }
      expect(runner.argsOf('deployment sub what-if')).toContain('--no-pretty-print');
    });

    it('should turn provider rejections into validation errors', async () => {
      const runner = deployingRunner().on('deployment sub validate', {
        error: { stderr: 'ERROR: InvalidTemplate: bad' },
      });

      await expect(runDeployment({}, context(runner))).rejects.toThrow(TemplateValidationError);
    });

    it('should fail when provisioning does not succeed', async () => {
      const runner = deployingRunner().on('deployment sub create', {
        json: { name: DEPLOYMENT_NAME, properties: { provisioningState: 'Failed' } },
      });

      const run = runDeployment({}, context(runner));

      await expect(run).rejects.toThrow(DeploymentError);
      await expect(run).rejects.toThrow(`Deployment ${DEPLOYMENT_NAME} finished in state Failed.`);
      expect(runner.called('deployment sub show')).toBe(false);
    });

    it('should fail when an output is missing', async () => {
      const runner = deployingRunner().on('deployment sub show', {
        json: {
          webAppUrl: { type: 'String', value: WEB_APP_URL },
          webAppName: { type: 'String', value: WEB_APP },
        },
      });

      await expect(runDeployment({}, context(runner))).rejects.toThrow(
        'Deployment output "resourceGroupName" is missing'
      );
      expect(await fileExists(path.join(tempDir, '.appship', 'deployment.json'))).toBe(false);
    });

    it('should select the requested subscription first', async () => {
      const runner = deployingRunner().on('account set', { stdout: '' });

      await runDeployment({ subscription: 'Test Subscription' }, context(runner));

      expect(runner.argsOf('account set')).toEqual(['account', 'set', '--subscription', 'Test Subscription']);
      expect(runner.commands().indexOf('account set')).toBeLessThan(runner.commands().indexOf('account show'));
    });
  });
});

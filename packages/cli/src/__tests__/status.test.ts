import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import { runStatusCommand } from '../commands/infra/status';
import { configureLogger } from '../logger';
import { createSpinnerReporter } from '../reporter';
import { writeDeploymentReceipt, type DeploymentReceipt } from '../services/receipt.service';
import {
  FakeAzRunner,
  cleanupTempDir,
  createTempDir,
  recordingReporter,
  signedInRunner,
  testConfig,
} from './helpers/fake-az';

const receipt: DeploymentReceipt = {
  resourceGroupName: 'rg-demo',
  webAppName: 'webapp-demo',
  webAppUrl: 'https://webapp-demo.azurewebsites.net',
  deploymentName: 'infrastructure-deployment-20240115090503',
  location: 'East US',
  environment: 'dev',
  subscriptionId: '00000000-0000-0000-0000-000000000001',
  timestamp: '2024-01-15T09:05:03.000Z',
};

describe('appship status', () => {
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

  function deps(runner: FakeAzRunner) {
    return { runner, reporter: recordingReporter(), config: testConfig(), cwd: tempDir };
  }

  it('should fail when nothing was deployed', async () => {
    const runner = new FakeAzRunner();

    expect(await runStatusCommand({}, deps(runner))).toBe(1);
    expect(runner.calls).toEqual([]);
  });

  it('should print the receipt as JSON without calling Azure', async () => {
    await writeDeploymentReceipt(path.join(tempDir, '.appship'), receipt);
    const runner = new FakeAzRunner();

    expect(await runStatusCommand({ json: true }, deps(runner))).toBe(0);
    expect(console.log).toHaveBeenCalledWith(JSON.stringify(receipt, null, 2));
    expect(runner.calls).toEqual([]);
  });

  it('should include the live state with --live', async () => {
    await writeDeploymentReceipt(path.join(tempDir, '.appship'), receipt);
    const runner = signedInRunner()
      .on('group exists', { stdout: 'true\n' })
      .on('webapp show', {
        json: {
          name: 'webapp-demo',
          state: 'Running',
          defaultHostName: 'webapp-demo.azurewebsites.net',
          httpsOnly: true,
          kind: 'app,linux',
        },
      });

    expect(await runStatusCommand({ json: true, live: true }, deps(runner))).toBe(0);
    expect(runner.commands()).toEqual(['version', 'account show', 'group exists', 'webapp show']);
    expect(console.log).toHaveBeenCalledWith(
      JSON.stringify(
        {
          ...receipt,
          live: {
            resourceGroupExists: true,
            webApp: {
              name: 'webapp-demo',
              state: 'Running',
              defaultHostName: 'webapp-demo.azurewebsites.net',
              httpsOnly: true,
            },
          },
        },
        null,
        2
      )
    );
  });

  it('should keep stdout parseable with --live --json and the spinner reporter', async () => {
    await writeDeploymentReceipt(path.join(tempDir, '.appship'), receipt);
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const runner = signedInRunner()
      .on('group exists', { stdout: 'true\n' })
      .on('webapp show', {
        json: { name: 'webapp-demo', state: 'Stopped', defaultHostName: 'webapp-demo.azurewebsites.net', httpsOnly: false },
      });

    const code = await runStatusCommand(
      { json: true, live: true },
      { runner, reporter: createSpinnerReporter(), config: testConfig(), cwd: tempDir }
    );

    expect(code).toBe(0);
    const stdout = vi
      .mocked(console.log)
      .mock.calls.map((args) => args.join(' '))
      .join('\n');
    expect(JSON.parse(stdout)).toEqual({
      ...receipt,
      live: {
        resourceGroupExists: true,
        webApp: {
          name: 'webapp-demo',
          state: 'Stopped',
          defaultHostName: 'webapp-demo.azurewebsites.net',
          httpsOnly: false,
        },
      },
    });
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Current subscription: Test Subscription (00000000-0000-0000-0000-000000000001)')
    );
  });

  it('should skip the web app when the resource group is gone', async () => {
    await writeDeploymentReceipt(path.join(tempDir, '.appship'), receipt);
    const runner = signedInRunner().on('group exists', { stdout: 'false\n' });

    expect(await runStatusCommand({ live: true }, deps(runner))).toBe(0);
    expect(runner.called('webapp show')).toBe(false);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as path from 'path';
import { collectChecks, runDoctorCommand } from '../commands/infra/doctor';
import type { CommandContext } from '../commands/shared';
import { configureLogger } from '../logger';
import {
  FakeAzRunner,
  cleanupTempDir,
  createTempDir,
  recordingReporter,
  signedInRunner,
  testConfig,
} from './helpers/fake-az';

describe('appship doctor', () => {
  let tempDir: string;

  function context(runner: FakeAzRunner, parametersDir?: string): CommandContext {
    return {
      runner,
      reporter: recordingReporter(),
      config: testConfig(parametersDir ? { parametersDir } : {}),
      cwd: tempDir,
      now: new Date(),
      confirm: vi.fn().mockResolvedValue(true),
    };
  }

  beforeEach(async () => {
    tempDir = await createTempDir();
    configureLogger({ filePath: path.join(tempDir, 'debug.log') });
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await cleanupTempDir(tempDir);
  });

  it('should pass every check on a ready machine', async () => {
    const results = await collectChecks(context(signedInRunner()), {});

    expect(results.map((r) => `${r.name}: ${r.status}`)).toEqual([
      'Node.js: ok',
      'Azure CLI: ok',
      'Bicep: ok',
      'Azure login: ok',
      'Template: ok',
      'Parameters (dev): ok',
      'Parameters (staging): ok',
      'Parameters (prod): ok',
    ]);
    expect(results[1]?.message).toBe('2.61.0');
    expect(results[3]?.message).toBe(
      'dev@example.com on Test Subscription (00000000-0000-0000-0000-000000000001)'
    );
  });

  it('should skip the Azure checks when az is missing', async () => {
    const runner = new FakeAzRunner().on('version', { error: { notInstalled: true } });

    const results = await collectChecks(context(runner), {});

    expect(results.find((r) => r.name === 'Azure CLI')?.status).toBe('fail');
    expect(results.some((r) => r.name === 'Azure login')).toBe(false);
    expect(runner.commands()).toEqual(['version']);
    expect(await runDoctorCommand({}, context(runner))).toBe(1);
  });

  it('should warn about Bicep without --fix', async () => {
    const runner = signedInRunner().on('bicep version', { error: { stderr: 'ERROR: Bicep CLI not found.' } });

    const results = await collectChecks(context(runner), {});

    expect(results.find((r) => r.name === 'Bicep')).toEqual({
      name: 'Bicep',
      status: 'warn',
      message: 'not installed',
      fix: 'az bicep install',
    });
    expect(runner.called('bicep install')).toBe(false);
    expect(await runDoctorCommand({}, context(runner))).toBe(0);
  });

  it('should install Bicep with --fix', async () => {
    let installed = false;
    const runner = signedInRunner()
      .on('bicep version', () => (installed ? { stdout: 'Bicep CLI version 0.28.1\n' } : { error: { stderr: 'ERROR: missing' } }))
      .on('bicep install', () => {
        installed = true;
        return { stdout: '' };
      });

    const results = await collectChecks(context(runner), { fix: true });

    expect(results.find((r) => r.name === 'Bicep')?.status).toBe('ok');
    expect(runner.commands()).toEqual(['version', 'bicep version', 'bicep install', 'bicep version', 'account show']);
  });

  it('should report a failed Bicep install and still print the summary', async () => {
    const runner = signedInRunner()
      .on('bicep version', { error: { stderr: 'ERROR: missing' } })
      .on('bicep install', { error: { stderr: 'ERROR: download failed' } });

    const results = await collectChecks(context(runner), { fix: true });

    expect(results.find((r) => r.name === 'Bicep')).toEqual({
      name: 'Bicep',
      status: 'fail',
      message: 'az bicep install failed: download failed',
      fix: 'az bicep install',
    });
    expect(results.find((r) => r.name === 'Azure login')?.status).toBe('ok');

    expect(await runDoctorCommand({ fix: true }, context(runner))).toBe(1);
    expect(console.log).toHaveBeenCalledWith(expect.stringContaining('Summary'));
  });

  it('should fail when not logged in', async () => {
    const runner = signedInRunner().on('account show', { error: { stderr: "ERROR: Please run 'az login'." } });

    expect(await runDoctorCommand({}, context(runner))).toBe(1);
  });

  it('should warn about missing parameter files', async () => {
    const results = await collectChecks(context(signedInRunner(), tempDir), {});

    expect(results.filter((r) => r.name.startsWith('Parameters')).map((r) => r.status)).toEqual([
      'warn',
      'warn',
      'warn',
    ]);
  });
});

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, writeFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';

vi.mock('node:child_process', () => ({
  spawnSync: vi.fn(),
}));

import { spawnSync } from 'node:child_process';
import { run } from '../../src/commands/run.js';
import { compile } from '../../src/commands/compile.js';
import { sync } from '../../src/commands/sync.js';
import { UnknownProfileError, ConfigLoadError } from '../../src/core/config-loader.js';
import { exitedWith, failedToStart } from '../helpers/spawn-result.js';

let projectDir: string;

function stageExitCodes(compileCode: number, syncCode = 0): void {
  vi.mocked(spawnSync).mockImplementation((_command, args) =>
    exitedWith(args?.[1] === 'compile' ? compileCode : syncCode),
  );
}

beforeEach(async () => {
  projectDir = await mkdtemp(join(tmpdir(), 'reqlock-run-test-'));
  await writeFile(join(projectDir, 'requirements.in'), 'package-a\n');
  await writeFile(join(projectDir, 'requirements.txt'), 'package-a==1.0.0\n');
  await writeFile(join(projectDir, 'requirements.dev.in'), '-r requirements.in\npytest\n');
  await writeFile(join(projectDir, 'requirements.dev.txt'), 'package-a==1.0.0\npytest==8.3.3\n');
  vi.mocked(spawnSync).mockReset();
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(projectDir, { recursive: true, force: true });
});

describe('reqlock run', () => {
  it('compiles and syncs the default profile and exits 0', async () => {
    stageExitCodes(0, 0);

    const exitCode = await run(undefined, { dir: projectDir, env: {} });

    expect(exitCode).toBe(0);
    expect(vi.mocked(spawnSync).mock.calls.map(([command, args]) => [command, args])).toEqual([
      ['uv', ['pip', 'compile', 'requirements.in', '-o', 'requirements.txt']],
      ['uv', ['pip', 'sync', 'requirements.txt']],
    ]);
    expect(console.log).toHaveBeenCalledWith(
      expect.stringContaining('Dependencies successfully compiled and synced.'),
    );
  });

  it('exits with the compiler exit code and skips sync on an invalid constraint', async () => {
    stageExitCodes(1);

    const exitCode = await run(undefined, { dir: projectDir, env: {} });

    expect(exitCode).toBe(1);
    expect(spawnSync).toHaveBeenCalledTimes(1);
    expect(console.error).toHaveBeenCalledWith(
      expect.stringContaining('Compilation failed. Fix errors and try again.'),
    );
  });

  it('exits with the sync exit code when sync fails', async () => {
    stageExitCodes(0, 2);

    const exitCode = await run(undefined, { dir: projectDir, env: {} });

    expect(exitCode).toBe(2);
    expect(spawnSync).toHaveBeenCalledTimes(2);
    expect(console.error).toHaveBeenCalledWith(expect.stringContaining('Sync failed.'));
  });

  it('--dev uses the dev requirements pair', async () => {
    stageExitCodes(0, 0);

    await run(undefined, { dir: projectDir, dev: true, env: {} });

    expect(vi.mocked(spawnSync).mock.calls[0][1]).toEqual([
      'pip', 'compile', 'requirements.dev.in', '-o', 'requirements.dev.txt',
    ]);
    expect(vi.mocked(spawnSync).mock.calls[1][1]).toEqual(['pip', 'sync', 'requirements.dev.txt']);
  });

  it('an explicit profile name wins over --dev', async () => {
    stageExitCodes(0, 0);

    await run('default', { dir: projectDir, dev: true, env: {} });

    expect(vi.mocked(spawnSync).mock.calls[0][1]).toEqual([
      'pip', 'compile', 'requirements.in', '-o', 'requirements.txt',
    ]);
  });

  it('uses the tool named in the project .env file', async () => {
    await writeFile(join(projectDir, '.env'), 'REQLOCK_TOOL=/opt/uv/bin/uv\n');
    stageExitCodes(0, 0);

    await run(undefined, { dir: projectDir, env: {} });

    expect(vi.mocked(spawnSync).mock.calls[0][0]).toBe('/opt/uv/bin/uv');
  });

  it('runs a profile and extra args from reqlock.json', async () => {
    await writeFile(
      join(projectDir, 'reqlock.json'),
      JSON.stringify({
        profiles: { docs: { spec: 'docs.in', lock: 'docs.txt' } },
        syncArgs: ['--strict'],
      }),
    );
    await writeFile(join(projectDir, 'docs.in'), 'package-b\n');
    await writeFile(join(projectDir, 'docs.txt'), 'package-b==2.0.0\n');
    stageExitCodes(0, 0);

    const exitCode = await run('docs', { dir: projectDir, env: {} });

    expect(exitCode).toBe(0);
    expect(vi.mocked(spawnSync).mock.calls[1][1]).toEqual(['pip', 'sync', 'docs.txt', '--strict']);
  });

  it('exits 127 when the package manager is not installed', async () => {
    vi.mocked(spawnSync).mockReturnValue(failedToStart('uv'));

    const exitCode = await run(undefined, { dir: projectDir, env: {} });

    expect(exitCode).toBe(127);
    expect(spawnSync).toHaveBeenCalledTimes(1);
  });

  it('throws for an unknown profile before running anything', async () => {
    await expect(run('staging', { dir: projectDir, env: {} })).rejects.toThrow(
      UnknownProfileError,
    );
    expect(spawnSync).not.toHaveBeenCalled();
  });

  it('throws for an invalid config file', async () => {
    await writeFile(join(projectDir, 'reqlock.json'), JSON.stringify({ tool: 42 }));
    await expect(run(undefined, { dir: projectDir, env: {} })).rejects.toThrow(ConfigLoadError);
    expect(spawnSync).not.toHaveBeenCalled();
  });
});

describe('reqlock compile', () => {
  it('only compiles and forwards --upgrade', async () => {
    stageExitCodes(0);

    const exitCode = await compile(undefined, { dir: projectDir, upgrade: true, env: {} });

    expect(exitCode).toBe(0);
    expect(spawnSync).toHaveBeenCalledTimes(1);
    expect(vi.mocked(spawnSync).mock.calls[0][1]).toEqual([
      'pip', 'compile', 'requirements.in', '-o', 'requirements.txt', '--upgrade',
    ]);
  });
});

describe('reqlock sync', () => {
  it('only syncs from the existing lock file', async () => {
    stageExitCodes(0, 0);

    const exitCode = await sync('dev', { dir: projectDir, env: {} });

    expect(exitCode).toBe(0);
    expect(spawnSync).toHaveBeenCalledTimes(1);
    expect(vi.mocked(spawnSync).mock.calls[0][1]).toEqual(['pip', 'sync', 'requirements.dev.txt']);
  });

  it('fails with exit 1 when the lock file is missing', async () => {
    await rm(join(projectDir, 'requirements.txt'));

    const exitCode = await sync(undefined, { dir: projectDir, env: {} });

    expect(exitCode).toBe(1);
    expect(spawnSync).not.toHaveBeenCalled();
  });
});

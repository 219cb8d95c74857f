import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { remove } from 'fs-extra';
import { SubprocessError, ToolchainError } from '@cartwright/shared';
import type { CommandRunner } from '@cartwright/exec';
import { parseXcodeVersion, XcodeToolchain } from './toolchain';

function fakeRunner(outputs: Record<string, string>): CommandRunner {
  return {
    run: vi.fn(),
    runWithResult: vi.fn(async (argv: readonly string[]) => {
      const output = outputs[argv[0] ?? ''];
      if (output === undefined) {
        throw new SubprocessError('Command exited with code 1', { exitCode: 1, command: argv });
      }
      return output;
    }),
  };
}

describe('parseXcodeVersion', () => {
  it('parses version and build', () => {
    expect(parseXcodeVersion('Xcode 12.4\nBuild version 12D4e')).toEqual({
      version: '12.4',
      majorVersion: 12,
      buildVersion: '12D4e',
    });
  });

  it('parses a major-only version without build line', () => {
    expect(parseXcodeVersion('Xcode 15')).toEqual({ version: '15', majorVersion: 15 });
  });

  it('parses three-part versions', () => {
    expect(parseXcodeVersion('Xcode 11.3.1\nBuild version 11C505')?.version).toBe('11.3.1');
  });

  it('returns null for unrelated output', () => {
    expect(parseXcodeVersion('xcode-select: error: tool requires Xcode')).toBeNull();
  });
});

describe('XcodeToolchain.info', () => {
  it('uses the configured major version without running xcodebuild', async () => {
    const runner = fakeRunner({});
    const toolchain = new XcodeToolchain({ runner, majorVersion: 12 });

    await expect(toolchain.info()).resolves.toEqual({ version: '12', majorVersion: 12 });
    expect(runner.runWithResult).not.toHaveBeenCalled();
  });

  it('detects the active Xcode once', async () => {
    const runner = fakeRunner({ xcodebuild: 'Xcode 11.7\nBuild version 11E801a' });
    const toolchain = new XcodeToolchain({ runner });

    await toolchain.info();
    const info = await toolchain.info();

    expect(info.majorVersion).toBe(11);
    expect(runner.runWithResult).toHaveBeenCalledTimes(1);
    expect(runner.runWithResult).toHaveBeenCalledWith(['xcodebuild', '-version']);
  });

  it('wraps a failing xcodebuild in ToolchainError', async () => {
    const toolchain = new XcodeToolchain({ runner: fakeRunner({}) });

    await expect(toolchain.info()).rejects.toThrow(ToolchainError);
    await expect(toolchain.info()).rejects.toThrow('Unable to determine the active Xcode version');
  });

  it('rejects unparseable output', async () => {
    const toolchain = new XcodeToolchain({ runner: fakeRunner({ xcodebuild: 'garbage' }) });

    await expect(toolchain.info()).rejects.toThrow('Unable to parse `xcodebuild -version` output');
  });
});

describe('XcodeToolchain.selectEnvironment', () => {
  let appsDir: string;

  async function installXcode(app: string): Promise<string> {
    const developerDir = path.join(appsDir, app, 'Contents', 'Developer');
    await fs.mkdir(path.join(developerDir, 'usr', 'bin'), { recursive: true });
    await fs.writeFile(path.join(developerDir, 'usr', 'bin', 'xcodebuild'), '');
    return developerDir;
  }

  beforeEach(async () => {
    appsDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cartwright-apps-'));
  });

  afterEach(async () => {
    await remove(appsDir);
  });

  it('returns DEVELOPER_DIR of the matching installation', async () => {
    const xcode11 = await installXcode('Xcode-11.7.app');
    const xcode12 = await installXcode('Xcode-12.4.app');
    await fs.mkdir(path.join(appsDir, 'Safari.app'));

    const runner = fakeRunner({
      [`${xcode11}/usr/bin/xcodebuild`]: 'Xcode 11.7\nBuild version 11E801a',
      [`${xcode12}/usr/bin/xcodebuild`]: 'Xcode 12.4\nBuild version 12D4e',
    });
    const toolchain = new XcodeToolchain({ runner, applicationsDir: appsDir });

    await expect(toolchain.selectEnvironment('12')).resolves.toEqual({ DEVELOPER_DIR: xcode12 });
    await expect(toolchain.selectEnvironment('11.7')).resolves.toEqual({ DEVELOPER_DIR: xcode11 });
    await expect(toolchain.selectEnvironment('12D4e')).resolves.toEqual({
      DEVELOPER_DIR: xcode12,
    });
  });

  it('matches a build version by prefix', async () => {
    const xcode11 = await installXcode('Xcode-11.7.app');
    const xcode12 = await installXcode('Xcode-12.4.app');
    const runner = fakeRunner({
      [`${xcode11}/usr/bin/xcodebuild`]: 'Xcode 11.7\nBuild version 11E801a',
      [`${xcode12}/usr/bin/xcodebuild`]: 'Xcode 12.4\nBuild version 12D4e',
    });
    const toolchain = new XcodeToolchain({ runner, applicationsDir: appsDir });

    await expect(toolchain.selectEnvironment('12D')).resolves.toEqual({ DEVELOPER_DIR: xcode12 });
  });

  it('does not match a longer minor version by prefix', async () => {
    const xcode = await installXcode('Xcode.app');
    const runner = fakeRunner({ [`${xcode}/usr/bin/xcodebuild`]: 'Xcode 12.4' });
    const toolchain = new XcodeToolchain({ runner, applicationsDir: appsDir });

    await expect(toolchain.selectEnvironment('12.41')).rejects.toThrow(ToolchainError);
  });

  it('skips installations whose xcodebuild fails', async () => {
    await installXcode('Xcode-beta.app');
    const xcode = await installXcode('Xcode.app');
    const runner = fakeRunner({ [`${xcode}/usr/bin/xcodebuild`]: 'Xcode 12.4' });
    const toolchain = new XcodeToolchain({ runner, applicationsDir: appsDir });

    await expect(toolchain.selectEnvironment('12.4')).resolves.toEqual({ DEVELOPER_DIR: xcode });
  });

  it('throws ToolchainError when no installation matches', async () => {
    const xcode = await installXcode('Xcode.app');
    const runner = fakeRunner({ [`${xcode}/usr/bin/xcodebuild`]: 'Xcode 13.0' });
    const toolchain = new XcodeToolchain({ runner, applicationsDir: appsDir });

    await expect(toolchain.selectEnvironment('12.4')).rejects.toThrow(
      `Xcode version 12.4 was not found in ${appsDir}`,
    );
  });

  it('throws ToolchainError when the applications directory is missing', async () => {
    const toolchain = new XcodeToolchain({
      runner: fakeRunner({}),
      applicationsDir: path.join(appsDir, 'missing'),
    });

    await expect(toolchain.selectEnvironment('12.4')).rejects.toThrow(ToolchainError);
  });
});

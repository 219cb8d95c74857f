import { promises as fs } from 'fs';
import { fileExists, join, ToolchainError, type Logger } from '@cartwright/shared';
import type { CommandRunner } from '@cartwright/exec';

export interface ToolchainInfo {
  /** e.g. `12.4` */
  version: string;
  majorVersion: number;
  /** e.g. `12D4e` */
  buildVersion?: string;
}

/**
 * What the Carthage tasks need to know about Xcode.
 */
export interface XcodeToolchainProvider {
  info(): Promise<ToolchainInfo>;
  /**
   * Environment that makes command-line tools use the given Xcode version.
   */
  selectEnvironment(requiredVersion: string): Promise<Record<string, string>>;
}

/**
 * Parses `xcodebuild -version` output:
 *
 * ```
 * Xcode 12.4
 * Build version 12D4e
 * ```
 */
export function parseXcodeVersion(output: string): ToolchainInfo | null {
  const versionMatch = /^Xcode\s+(\d+)((?:\.\d+)*)\s*$/m.exec(output);
  if (!versionMatch) {
    return null;
  }
  const buildMatch = /^Build version\s+(\S+)\s*$/m.exec(output);
  const info: ToolchainInfo = {
    version: `${versionMatch[1]}${versionMatch[2]}`,
    majorVersion: Number(versionMatch[1]),
  };
  if (buildMatch) {
    info.buildVersion = buildMatch[1];
  }
  return info;
}

function matchesRequired(info: ToolchainInfo, required: string): boolean {
  return (
    info.version === required ||
    info.version.startsWith(`${required}.`) ||
    (info.buildVersion?.startsWith(required) ?? false)
  );
}

export interface XcodeToolchainOptions {
  runner: CommandRunner;
  /** Where `Xcode*.app` bundles are installed. */
  applicationsDir?: string;
  /** Skips detection and reports this major version. */
  majorVersion?: number;
  logger?: Logger;
}

export class XcodeToolchain implements XcodeToolchainProvider {
  private readonly applicationsDir: string;
  private detected: ToolchainInfo | undefined;

  constructor(private readonly options: XcodeToolchainOptions) {
    this.applicationsDir = options.applicationsDir ?? '/Applications';
  }

  async info(): Promise<ToolchainInfo> {
    if (this.options.majorVersion !== undefined) {
      return { version: String(this.options.majorVersion), majorVersion: this.options.majorVersion };
    }
    if (!this.detected) {
      this.detected = await this.detect();
    }
    return this.detected;
  }

  async selectEnvironment(requiredVersion: string): Promise<Record<string, string>> {
    let apps: string[];
    try {
      apps = (await fs.readdir(this.applicationsDir))
        .filter((name) => /^Xcode.*\.app$/.test(name))
        .sort();
    } catch (error: unknown) {
      throw new ToolchainError(`Cannot list Xcode installations in ${this.applicationsDir}`, {
        cause: error,
      });
    }

    for (const app of apps) {
      const developerDir = join(this.applicationsDir, app, 'Contents', 'Developer');
      const info = await this.readInstalledVersion(developerDir);
      if (info && matchesRequired(info, requiredVersion)) {
        await this.options.logger?.debug(`Selected ${app} (${info.version}) for Xcode ${requiredVersion}`);
        return { DEVELOPER_DIR: developerDir };
      }
    }

    throw new ToolchainError(
      `Xcode version ${requiredVersion} was not found in ${this.applicationsDir}`,
      { details: { candidates: apps } },
    );
  }

  private async detect(): Promise<ToolchainInfo> {
    let output: string;
    try {
      output = await this.options.runner.runWithResult(['xcodebuild', '-version']);
    } catch (error: unknown) {
      throw new ToolchainError('Unable to determine the active Xcode version', { cause: error });
    }
    const info = parseXcodeVersion(output);
    if (!info) {
      throw new ToolchainError('Unable to parse `xcodebuild -version` output', {
        details: output,
      });
    }
    return info;
  }

  private async readInstalledVersion(developerDir: string): Promise<ToolchainInfo | null> {
    const xcodebuild = join(developerDir, 'usr', 'bin', 'xcodebuild');
    if (!(await fileExists(xcodebuild))) {
      return null;
    }
    try {
      return parseXcodeVersion(await this.options.runner.runWithResult([xcodebuild, '-version']));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      await this.options.logger?.debug(`Skipping ${developerDir}: ${message}`);
      return null;
    }
  }
}

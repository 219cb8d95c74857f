import type { Logger } from '@cartwright/shared';
import type { XcodeToolchainProvider } from '../xcode/toolchain';
import { XCCONFIG_ENV_KEY } from './constants';
import { createXCConfigIfNeeded } from './workaround';

export interface EnvironmentContext {
  projectRoot: string;
  toolchain: XcodeToolchainProvider;
  serializeDebugging: boolean;
  /** Xcode version the build must use, if pinned. */
  requiredXcodeVersion?: string;
  logger?: Logger;
}

/**
 * Environment overrides for the carthage subprocess. May write the Xcode 12
 * workaround xcconfig as a side effect.
 */
export async function buildEnvironment(ctx: EnvironmentContext): Promise<Record<string, string>> {
  const environment: Record<string, string> = {};
  const { majorVersion } = await ctx.toolchain.info();

  const xcconfig = await createXCConfigIfNeeded(
    {
      projectRoot: ctx.projectRoot,
      xcodeMajorVersion: majorVersion,
      serializeDebugging: ctx.serializeDebugging,
    },
    ctx.logger,
  );
  if (xcconfig) {
    await ctx.logger?.info(
      `Apply carthage workaround for Xcode 12: ${JSON.stringify(Object.fromEntries(xcconfig.entries))}`,
    );
    environment[XCCONFIG_ENV_KEY] = xcconfig.file;
  }

  if (ctx.requiredXcodeVersion) {
    Object.assign(environment, await ctx.toolchain.selectEnvironment(ctx.requiredXcodeVersion));
  }
  return environment;
}

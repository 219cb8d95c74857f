import { join, resolve, type CarthageConfig, type Logger, type PlatformType } from '@cartwright/shared';
import type { CommandRunner, OutputAppender } from '@cartwright/exec';
import type { XcodeToolchainProvider } from '../xcode/toolchain';
import {
  ARGUMENT_CACHE_BUILDS,
  ARGUMENT_DERIVED_DATA,
  ARGUMENT_PLATFORM,
  CARTHAGE_DERIVED_DATA_DIR,
  CARTHAGE_DIR,
  type CarthageAction,
} from './constants';
import { buildEnvironment } from './environment';
import { hasCartfile } from './manifest';
import { carthagePlatformName, type CarthagePlatformName } from './platform';

export interface ExecutableResolver {
  locate(): Promise<string>;
}

export interface CarthageTaskContext {
  projectRoot: string;
  /** Derived-data root of the Xcode project; carthage gets a `carthage` folder below it. */
  derivedDataRoot: string;
  platform?: PlatformType;
  carthage: Pick<CarthageConfig, 'cache' | 'serializeDebugging'>;
  requiredXcodeVersion?: string;
  runner: CommandRunner;
  locator: ExecutableResolver;
  toolchain: XcodeToolchainProvider;
  output: OutputAppender;
  logger: Logger;
}

/**
 * Everything that shapes one carthage command line.
 */
export interface InvocationRequest {
  readonly action: CarthageAction;
  readonly extraArguments: readonly string[];
  readonly platformName: CarthagePlatformName;
  readonly useBuildCache: boolean;
  readonly derivedDataPath: string;
}

/**
 * `<tool> <action> [extra...] --platform <name> [--cache-builds] --derived-data <path>`
 */
export function buildArguments(toolPath: string, request: InvocationRequest): string[] {
  const args = [toolPath, request.action, ...request.extraArguments];
  args.push(ARGUMENT_PLATFORM, request.platformName);
  if (request.useBuildCache) {
    args.push(ARGUMENT_CACHE_BUILDS);
  }
  args.push(ARGUMENT_DERIVED_DATA, request.derivedDataPath);
  return args;
}

/**
 * Runs one carthage action for a project. Holds no state between runs.
 */
export class CarthageTask {
  constructor(private readonly ctx: CarthageTaskContext) {}

  get platformName(): CarthagePlatformName {
    return carthagePlatformName(this.ctx.platform);
  }

  get derivedDataPath(): string {
    return resolve(this.ctx.derivedDataRoot, CARTHAGE_DERIVED_DATA_DIR);
  }

  /** Where carthage puts the built frameworks for this platform. */
  outputDirectory(): string {
    return join(this.ctx.projectRoot, CARTHAGE_DIR, 'Build', this.platformName);
  }

  async hasCartfile(): Promise<boolean> {
    return hasCartfile(this.ctx.projectRoot);
  }

  /**
   * Does nothing when the project has no Cartfile. Subprocess failures propagate.
   */
  async run(
    action: CarthageAction,
    extraArguments: readonly string[] = [],
    useBuildCache: boolean = this.ctx.carthage.cache,
  ): Promise<void> {
    const { logger } = this.ctx;

    if (!(await this.hasCartfile())) {
      await logger.debug('No Cartfile found, so we are done');
      return;
    }

    await logger.info(`Update Carthage for platform ${this.platformName}`);

    const request: InvocationRequest = Object.freeze({
      action,
      extraArguments: [...extraArguments],
      platformName: this.platformName,
      useBuildCache,
      derivedDataPath: this.derivedDataPath,
    });
    const args = buildArguments(await this.ctx.locator.locate(), request);
    await logger.info(`Carthage arguments ${JSON.stringify(args)}`);

    const environment = await buildEnvironment({
      projectRoot: this.ctx.projectRoot,
      toolchain: this.ctx.toolchain,
      serializeDebugging: this.ctx.carthage.serializeDebugging,
      requiredXcodeVersion: this.ctx.requiredXcodeVersion,
      logger,
    });
    await logger.info(`Carthage environment ${JSON.stringify(environment)}`);

    await this.ctx.runner.run(args, {
      cwd: this.ctx.projectRoot,
      env: environment,
      output: this.ctx.output,
    });
  }
}

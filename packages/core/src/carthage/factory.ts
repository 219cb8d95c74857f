import { resolve, type Config, type Logger } from '@cartwright/shared';
import {
  ConsoleOutputAppender,
  ExecutableLocator,
  ProcessCommandRunner,
  type CommandRunner,
  type OutputAppender,
} from '@cartwright/exec';
import { XcodeToolchain } from '../xcode/toolchain';
import { CARTHAGE_DISPLAY_NAME } from './constants';
import { CarthageTask } from './task';

export interface CarthageTaskOptions {
  projectRoot: string;
  config: Config;
  logger: Logger;
  runner?: CommandRunner;
  output?: OutputAppender;
}

/**
 * Wires a CarthageTask to the real process runner, PATH lookup and Xcode detection.
 */
export function createCarthageTask(options: CarthageTaskOptions): CarthageTask {
  const { config, logger } = options;
  const projectRoot = resolve(options.projectRoot);
  const runner = options.runner ?? new ProcessCommandRunner();

  return new CarthageTask({
    projectRoot,
    derivedDataRoot: resolve(projectRoot, config.derivedDataPath),
    platform: config.platform,
    carthage: config.carthage,
    requiredXcodeVersion: config.xcode.version,
    runner,
    locator: new ExecutableLocator(config.carthage.executable, {
      displayName: CARTHAGE_DISPLAY_NAME,
      logger,
    }),
    toolchain: new XcodeToolchain({
      runner,
      applicationsDir: config.xcode.applicationsDir,
      majorVersion: config.xcode.majorVersion,
      logger,
    }),
    output: options.output ?? new ConsoleOutputAppender(),
    logger,
  });
}

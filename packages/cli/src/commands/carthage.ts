import { Command } from 'commander';
import path from 'path';
import {
  ConsoleLogger,
  PlatformTypeSchema,
  UsageError,
  type ConfigInput,
  type Logger,
} from '@cartwright/shared';
import { ConsoleOutputAppender } from '@cartwright/exec';
import {
  CARTHAGE_TASKS,
  ConfigLoader,
  createCarthageTask,
  executeTask,
  type CarthageTaskDefinition,
  type CarthageTaskOptions,
} from '@cartwright/core';
import { OutputRenderer } from '../output';

export interface GlobalOptions {
  json?: boolean;
  config?: string;
  verbose?: boolean;
  projectDir?: string;
}

interface CarthageCommandOptions {
  platform?: string;
  cache?: boolean;
}

export interface CarthageCommandDeps {
  createTask: typeof createCarthageTask;
  createLogger(globals: GlobalOptions): Logger;
}

export const defaultDeps: CarthageCommandDeps = {
  createTask: createCarthageTask,
  createLogger: (globals) => new ConsoleLogger({ level: globals.verbose ? 'debug' : 'info' }),
};

export function toConfigFlags(options: CarthageCommandOptions): ConfigInput {
  const flags: ConfigInput = {};
  if (options.platform !== undefined) {
    const platform = PlatformTypeSchema.safeParse(options.platform);
    if (!platform.success) {
      throw new UsageError(
        `Unknown platform '${options.platform}'. Expected one of: ${PlatformTypeSchema.options.join(', ')}`,
      );
    }
    flags.platform = platform.data;
  }
  if (options.cache !== undefined) {
    flags.carthage = { cache: options.cache };
  }
  return flags;
}

export function resolveProjectRoot(globals: GlobalOptions): string {
  return path.resolve(globals.projectDir ?? process.cwd());
}

function registerTask(
  program: Command,
  definition: CarthageTaskDefinition,
  deps: CarthageCommandDeps,
): void {
  const command = new Command(definition.name);

  command
    .description(definition.description)
    .option('--platform <platform>', 'Target platform (iOS, macOS, tvOS, watchOS)')
    .option('--cache', 'Reuse cached builds (--cache-builds)')
    .option('--no-cache', 'Rebuild every dependency')
    .action(async (options: CarthageCommandOptions) => {
      const globals = program.opts<GlobalOptions>();
      const projectRoot = resolveProjectRoot(globals);
      const config = ConfigLoader.load({
        cwd: projectRoot,
        configPath: globals.config,
        flags: toConfigFlags(options),
      });

      const taskOptions: CarthageTaskOptions = {
        projectRoot,
        config,
        logger: deps.createLogger(globals).child({ task: definition.name }),
        // Keep stdout parseable in JSON mode.
        output: new ConsoleOutputAppender(globals.json ? process.stderr : process.stdout),
      };
      const task = deps.createTask(taskOptions);
      const status = await executeTask(definition, task, config.carthage);

      new OutputRenderer(Boolean(globals.json)).render({
        task: definition.name,
        status,
        platform: task.platformName,
        outputDirectory: task.outputDirectory(),
      });
    });

  program.addCommand(command);
}

export const registerCarthageCommands = (
  program: Command,
  deps: CarthageCommandDeps = defaultDeps,
) => {
  for (const definition of CARTHAGE_TASKS) {
    registerTask(program, definition, deps);
  }
};

import { Command } from 'commander';
import { version } from '../package.json';
import { registerCarthageCommands, type CarthageCommandDeps } from './commands/carthage';
import { registerDoctorCommand } from './commands/doctor';

export const name = '@cartwright/cli';

export function createProgram(deps?: CarthageCommandDeps): Command {
  const program = new Command();

  program
    .name('cartwright')
    .description('Run Carthage for an Xcode project')
    .version(version)
    .option('--json', 'Output results as JSON')
    .option('--config <path>', 'Path to configuration file')
    .option('--project-dir <path>', 'Project root containing the Cartfile')
    .option('--verbose', 'Enable verbose logging');

  registerCarthageCommands(program, deps);
  registerDoctorCommand(program);

  return program;
}

import type { CarthageConfig } from '@cartwright/shared';
import {
  ACTION_BOOTSTRAP,
  ACTION_BUILD,
  ACTION_UPDATE,
  ARGUMENT_ARCHIVE,
  type CarthageAction,
} from './constants';
import type { CarthageTask } from './task';

export interface CarthageTaskDefinition {
  name: string;
  description: string;
  action: CarthageAction;
  extraArguments(config: CarthageConfig): string[];
}

export const CARTHAGE_TASKS: readonly CarthageTaskDefinition[] = [
  {
    name: 'bootstrap',
    description: 'Check out and build the Carthage project dependencies',
    action: ACTION_BOOTSTRAP,
    extraArguments: () => [],
  },
  {
    name: 'update',
    description: 'Update and rebuild the Carthage project dependencies',
    action: ACTION_UPDATE,
    extraArguments: () => [],
  },
  {
    name: 'build',
    description: 'Build the Carthage project dependencies',
    action: ACTION_BUILD,
    extraArguments: (config) => (config.archive ? [ARGUMENT_ARCHIVE] : []),
  },
];

export type TaskOutcome = 'ran' | 'skipped';

/**
 * Runs a task definition, skipping it when the project has no Cartfile.
 */
export async function executeTask(
  definition: CarthageTaskDefinition,
  task: Pick<CarthageTask, 'hasCartfile' | 'run'>,
  config: CarthageConfig,
): Promise<TaskOutcome> {
  if (!(await task.hasCartfile())) {
    return 'skipped';
  }
  await task.run(definition.action, definition.extraArguments(config), config.cache);
  return 'ran';
}

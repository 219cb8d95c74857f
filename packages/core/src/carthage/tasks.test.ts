import { describe, it, expect, vi } from 'vitest';
import { ConfigSchema } from '@cartwright/shared';
import { CARTHAGE_TASKS, executeTask } from './tasks';
import type { CarthageTask } from './task';

function taskDefinition(name: string) {
  const definition = CARTHAGE_TASKS.find((t) => t.name === name);
  if (!definition) throw new Error(`missing task ${name}`);
  return definition;
}

function fakeTask(hasCartfile: boolean): Pick<CarthageTask, 'hasCartfile' | 'run'> {
  return {
    hasCartfile: vi.fn().mockResolvedValue(hasCartfile),
    run: vi.fn().mockResolvedValue(undefined),
  };
}

describe('CARTHAGE_TASKS', () => {
  it('defines bootstrap, update and build', () => {
    expect(CARTHAGE_TASKS.map((t) => [t.name, t.action])).toEqual([
      ['bootstrap', 'bootstrap'],
      ['update', 'update'],
      ['build', 'build'],
    ]);
    expect(taskDefinition('bootstrap').description).toBe(
      'Check out and build the Carthage project dependencies',
    );
  });

  it('passes --archive to build only when archiving is configured', () => {
    const build = taskDefinition('build');
    expect(build.extraArguments(ConfigSchema.parse({}).carthage)).toEqual([]);
    expect(build.extraArguments(ConfigSchema.parse({ carthage: { archive: true } }).carthage)).toEqual([
      '--archive',
    ]);
    expect(
      taskDefinition('update').extraArguments(
        ConfigSchema.parse({ carthage: { archive: true } }).carthage,
      ),
    ).toEqual([]);
  });
});

describe('executeTask', () => {
  it('skips without a Cartfile', async () => {
    const task = fakeTask(false);

    const outcome = await executeTask(taskDefinition('update'), task, ConfigSchema.parse({}).carthage);

    expect(outcome).toBe('skipped');
    expect(task.run).not.toHaveBeenCalled();
  });

  it('runs the action with its arguments and cache setting', async () => {
    const task = fakeTask(true);
    const carthage = ConfigSchema.parse({ carthage: { archive: true, cache: true } }).carthage;

    const outcome = await executeTask(taskDefinition('build'), task, carthage);

    expect(outcome).toBe('ran');
    expect(task.run).toHaveBeenCalledWith('build', ['--archive'], true);
  });
});

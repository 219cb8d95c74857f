import { Command } from 'commander';
import which from 'which';
import chalk from 'chalk';
import { isMacOS, type Config } from '@cartwright/shared';
import { ExecutableLocator, ProcessCommandRunner } from '@cartwright/exec';
import {
  CARTHAGE_DISPLAY_NAME,
  checkManifests,
  ConfigLoader,
  XcodeToolchain,
  BROKEN_XCODE_MAJOR_VERSION,
} from '@cartwright/core';
import { resolveProjectRoot, type GlobalOptions } from './carthage';

const CHECKS = {
  OK: chalk.green('✔'),
  WARN: chalk.yellow('!'),
  FAIL: chalk.red('✖'),
};

type CheckResult = [string, string];

function checkHost(): CheckResult {
  if (isMacOS()) {
    return [CHECKS.OK, 'Running on macOS.'];
  }
  return [CHECKS.FAIL, `Running on ${process.platform}. Carthage and Xcode require macOS.`];
}

async function checkExecutable(name: string): Promise<CheckResult> {
  const found = await which(name, { nothrow: true });
  if (found) {
    return [CHECKS.OK, `${name} found at: ${found}`];
  }
  return [CHECKS.FAIL, `${name} not found in PATH.`];
}

async function checkCarthage(config: Config): Promise<CheckResult> {
  const locator = new ExecutableLocator(config.carthage.executable, {
    displayName: CARTHAGE_DISPLAY_NAME,
  });
  try {
    return [CHECKS.OK, `carthage found at: ${await locator.locate()}`];
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return [CHECKS.FAIL, message];
  }
}

async function checkXcode(config: Config): Promise<CheckResult[]> {
  const runner = new ProcessCommandRunner();
  const toolchain = new XcodeToolchain({
    runner,
    applicationsDir: config.xcode.applicationsDir,
    majorVersion: config.xcode.majorVersion,
  });
  const results: CheckResult[] = [];

  try {
    const info = await toolchain.info();
    const build = info.buildVersion ? ` (${info.buildVersion})` : '';
    results.push([CHECKS.OK, `Xcode ${info.version}${build}.`]);
    if (info.majorVersion === BROKEN_XCODE_MAJOR_VERSION) {
      results.push([CHECKS.WARN, 'Xcode 12 detected. The excluded-architectures workaround will be applied.']);
    }
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    results.push([CHECKS.FAIL, message]);
  }

  if (config.xcode.version) {
    try {
      const env = await toolchain.selectEnvironment(config.xcode.version);
      results.push([CHECKS.OK, `Required Xcode ${config.xcode.version}: ${env.DEVELOPER_DIR}`]);
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      results.push([CHECKS.FAIL, message]);
    }
  }
  return results;
}

async function checkProject(projectRoot: string): Promise<CheckResult[]> {
  const manifests = await checkManifests(projectRoot);
  if (!manifests.hasCartfile) {
    return [[CHECKS.WARN, `No Cartfile in ${projectRoot}. Carthage tasks will be skipped.`]];
  }
  return [
    [CHECKS.OK, 'Cartfile found.'],
    manifests.hasResolvedCartfile
      ? [CHECKS.OK, 'Cartfile.resolved found.']
      : [CHECKS.WARN, 'Cartfile.resolved missing. Run `cartwright update` to pin versions.'],
  ];
}

export const registerDoctorCommand = (program: Command) => {
  const command = new Command('doctor');

  command.description('Run checks to diagnose issues with the environment.').action(async () => {
    console.log(chalk.bold('cartwright Environment Checkup'));

    const results: CheckResult[] = [];

    console.log('---------------------------------');
    console.log(chalk.bold('System Environment'));
    results.push(checkHost());
    results.push(await checkExecutable('git'));

    const globals = program.opts<GlobalOptions>();
    const projectRoot = resolveProjectRoot(globals);
    try {
      const config = ConfigLoader.load({ cwd: projectRoot, configPath: globals.config });

      console.log('\n' + chalk.bold('Toolchain'));
      results.push(await checkCarthage(config));
      results.push(...(await checkXcode(config)));

      console.log('\n' + chalk.bold('Project Status'));
      results.push(...(await checkProject(projectRoot)));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      results.push([CHECKS.FAIL, `Failed to load configuration: ${message}`]);
    }

    results.forEach(([status, message]) => {
      console.log(`${status} ${message}`);
    });

    console.log('---------------------------------');

    const hasFailures = results.some(([status]) => status === CHECKS.FAIL);
    if (hasFailures) {
      console.log(
        chalk.red.bold('Doctor checks failed.') +
          ' Please resolve the issues marked with ' +
          CHECKS.FAIL,
      );
      process.exitCode = 1;
    } else {
      console.log(chalk.green.bold('All checks passed. Your environment looks good!'));
    }
  });

  program.addCommand(command);
};

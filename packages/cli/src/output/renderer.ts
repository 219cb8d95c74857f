import pc from 'picocolors';
import { AppError, SubprocessError, ToolNotFoundError } from '@cartwright/shared';

export interface TaskResult {
  task: string;
  status: 'ran' | 'skipped';
  platform: string;
  outputDirectory: string;
}

export interface ErrorReport {
  code: string;
  message: string;
  tool?: string;
  exitCode?: number | null;
  command?: readonly string[];
  details?: Record<string, unknown> | string;
}

export function describeError(error: unknown): ErrorReport {
  if (!(error instanceof AppError)) {
    return { code: 'UnknownError', message: error instanceof Error ? error.message : String(error) };
  }
  const report: ErrorReport = { code: error.code, message: error.message };
  if (error instanceof ToolNotFoundError) {
    report.tool = error.toolName;
  }
  if (error instanceof SubprocessError) {
    report.exitCode = error.exitCode;
    report.command = error.command;
  }
  if (error.details !== undefined) {
    report.details = error.details;
  }
  return report;
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  render(result: TaskResult): void {
    if (this.isJson) {
      console.log(JSON.stringify(result, null, 2));
    } else if (result.status === 'ran') {
      this.renderRan(result);
    } else {
      this.renderSkipped(result);
    }
  }

  renderError(error: unknown, verbose = false): void {
    const report = describeError(error);
    if (this.isJson) {
      console.log(JSON.stringify({ error: report }, null, 2));
      return;
    }

    console.error(pc.red(`❌ ${report.code}: ${report.message}`));
    if (report.command && report.command.length > 0) {
      console.error(`  Command: ${report.command.join(' ')}`);
    }
    if (report.exitCode !== undefined && report.exitCode !== null) {
      console.error(`  Exit code: ${report.exitCode}`);
    }
    if (report.details !== undefined) {
      const details =
        typeof report.details === 'string' ? report.details : JSON.stringify(report.details);
      console.error(`  Details: ${details}`);
    }
    if (verbose && error instanceof Error && error.stack) {
      console.error(pc.gray(error.stack));
    }
  }

  private renderRan(result: TaskResult): void {
    console.log(`\n${pc.green(`✅ carthage ${result.task} finished.`)}`);
    console.log(`  ${pc.bold('Platform:')} ${result.platform}`);
    console.log(`  ${pc.bold('Frameworks:')} ${result.outputDirectory}`);
  }

  private renderSkipped(result: TaskResult): void {
    console.log(pc.gray(`No Cartfile found, skipping carthage ${result.task}.`));
  }
}

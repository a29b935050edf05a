import { Command } from 'commander';
import { Config, Runner } from '@scansplit/core';
import { PartitionCommand } from '../../base/partition-command';
import type { PartitionCommandOptions } from '../../base/partition-command';

/**
 * Scan Command Options
 */
export interface ScanCommandOptions extends PartitionCommandOptions {
  /** Server settings; each falls back to the config file (and the token to SCANSPLIT_API_TOKEN) */
  serverUrl?: string;
  apiToken?: string;
  project?: string;
  projectVersion?: string;
  /** Directory for per-group Detect logs */
  loggingDir?: string;
  /** File with extra Detect properties, one per line */
  detectProperties?: string;
  /** Hand files larger than the limit to the scanner anyway */
  scanOversized?: boolean;
}

/**
 * Scan Command - partitions a directory and runs one Detect scan per group.
 *
 * This command is responsible for:
 * - Parsing CLI arguments into config overrides
 * - Reporting skipped paths and the planned groups
 * - Running the groups sequentially and summarising the outcome
 * - Setting the exit code (1 on a fatal error or a failed scan)
 */
export class ScanCommand extends PartitionCommand<ScanCommandOptions> {
  protected description = 'Split a directory into scan groups and scan each one';

  register(program: Command): void {
    const scanCmd = program
      .command('scan <targetDir>')
      .description(this.description)
      .option('--server-url <url>', 'Scanning server URL')
      .option('--api-token <token>', 'Scanning server API token (default: $SCANSPLIT_API_TOKEN)')
      .option('--project <name>', 'Project name on the server')
      .option('--project-version <version>', 'Project version name on the server')
      .option('-l, --logging-dir <dir>', 'Directory for Detect log files (default: current directory)')
      .option('-p, --detect-properties <file>', 'File with additional Detect properties, one per line')
      .option('--scan-oversized', 'Scan files larger than the size limit anyway', false);

    this.addPartitionOptions(scanCmd)
      .action(async (targetDir: string, options: Omit<ScanCommandOptions, 'targetDir'>) => {
        await this.execute({ ...options, targetDir });
      });
  }

  async execute(options: ScanCommandOptions): Promise<void> {
    this.configureLogger(options);
    try {
      const detectProperties = options.detectProperties
        ? await this.container.readDetectProperties(options.detectProperties)
        : undefined;

      const plan = await this.buildPlan(options, {
        serverUrl: options.serverUrl,
        apiToken: options.apiToken,
        project: options.project,
        version: options.projectVersion,
        loggingDir: options.loggingDir,
        detectProperties,
        scanOversized: options.scanOversized ? true : undefined,
      });
      const credentials = Config.requireCredentials(plan.config);
      this.printPlan(plan);

      const executor = this.container.getScanExecutor(plan.config, credentials, this.logger);
      const report = await Runner.runScanGroups(plan.groups, executor, {
        scanOversized: plan.config.scanOversized,
        logger: this.logger,
      });

      if (options.json) {
        this.handleSuccess({
          ...this.planToJson(plan),
          scans: report.outcomes.map(outcome => ({
            group: outcome.group.index,
            status: outcome.status,
            codeLocation: outcome.result?.codeLocation,
            logPath: outcome.result?.logPath,
            message: outcome.message,
          })),
          passed: report.passed,
          failed: report.failed,
          skipped: report.skipped,
        }, options);
      } else {
        this.handleSuccess(
          null,
          options,
          `Scanned ${report.passed} of ${plan.groups.length} group(s): ${report.failed} failed, ${report.skipped} skipped`
        );
      }

      if (report.failed > 0) {
        process.exit(1);
      }
    } catch (error) {
      this.failWith(error, options);
    }
  }
}

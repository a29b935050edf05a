/**
 * Shared sizing and partitioning for commands that work on a target directory.
 */

import { Command } from 'commander';
import { Config, Logger, Partitioner } from '@scansplit/core';
import type { Sizer } from '@scansplit/core';
import { BaseCommand } from './base-command';
import type { BaseCommandOptions } from '../interfaces/command';
import { collectRepeatable, formatBytes, parseByteCount } from '../utils/format';

/**
 * Options shared by every command that partitions a directory
 */
export interface PartitionCommandOptions extends BaseCommandOptions {
  targetDir: string;
  /** Maximum bytes per scan group */
  sizeLimit?: number;
  /** Glob patterns to leave out of the walk */
  exclude?: string[];
  dontFollowSymlinks?: boolean;
  /** YAML or JSON config file */
  config?: string;
}

export type PartitionPlan = {
  config: Config.ScanSplitConfig;
  sized: Sizer.TreeSizeResult;
  groups: Partitioner.ScanGroup[];
  summary: Partitioner.GroupSummary;
}

export abstract class PartitionCommand<TOptions extends PartitionCommandOptions> extends BaseCommand<TOptions> {
  /**
   * Adds the sizing options shared by plan and scan.
   */
  protected addPartitionOptions(command: Command): Command {
    return command
      .option('-s, --size-limit <bytes>', 'Maximum bytes per scan group (default: 5 GiB)', parseByteCount)
      .option('-e, --exclude <pattern>', 'Leave matching paths out of the scan (repeatable)', collectRepeatable)
      .option('--dont-follow-symlinks', 'Do not follow symbolic links', false)
      .option('-c, --config <file>', 'YAML or JSON config file')
      .option('--json', 'Output in JSON format', false)
      .option('-v, --verbose', 'Show debug output', false)
      .option('-q, --quiet', 'Only show warnings and errors', false);
  }

  protected configureLogger(options: TOptions): void {
    if (options.json) {
      // Keep stdout parseable
      this.logger = Logger.createLogger('', 'silent');
      return;
    }
    super.configureLogger(options);
  }

  /**
   * Resolves config, sizes the target directory and partitions it.
   * @param overrides - Command-specific config values; undefined fields are ignored
   */
  protected async buildPlan(options: TOptions, overrides: Config.ScanSplitConfigFile = {}): Promise<PartitionPlan> {
    const fileConfig = await this.container.loadConfigFile(options.config);
    const config = Config.resolveConfig(
      {
        maxScanSizeBytes: options.sizeLimit,
        exclude: options.exclude,
        followSymlinks: options.dontFollowSymlinks ? false : undefined,
        ...overrides,
      },
      fileConfig
    );
    this.logger.debug(`Size limit: ${config.maxScanSizeBytes} bytes, follow symlinks: ${config.followSymlinks}`);

    const sized = await this.container.getTreeSizer(config).sizeTree(options.targetDir);
    this.reportSkipped(sized);

    const groups = Partitioner.partition(sized.root, config.maxScanSizeBytes);
    return { config, sized, groups, summary: Partitioner.summarizeGroups(groups) };
  }

  protected reportSkipped(sized: Sizer.TreeSizeResult): void {
    for (const excluded of sized.excluded) {
      this.logger.debug(`Excluded ${excluded}`);
    }
    if (sized.skipped.length === 0) {
      return;
    }
    this.logger.warn(`⚠️ Skipped ${sized.skipped.length} unreadable path(s):`);
    for (const record of sized.skipped) {
      this.logger.warn(`  ${record.path}: ${record.reason}`);
    }
  }

  protected printPlan(plan: PartitionPlan): void {
    const { sized, groups, config } = plan;
    this.logger.info(
      `📦 ${groups.length} scan group(s) for ${sized.root.path} ` +
      `(${formatBytes(sized.root.size)}, limit ${formatBytes(config.maxScanSizeBytes)})`
    );
    for (const group of groups) {
      const flag = group.oversized ? ' ⚠️ oversized' : '';
      this.logger.info(`  #${group.index} ${formatBytes(group.size)} in ${group.members.length} path(s)${flag}`);
      for (const member of group.members) {
        this.logger.debug(`      ${member}`);
      }
    }
  }

  protected planToJson(plan: PartitionPlan): object {
    return {
      root: plan.sized.root.path,
      totalBytes: plan.sized.root.size,
      maxScanSizeBytes: plan.config.maxScanSizeBytes,
      summary: plan.summary,
      groups: plan.groups,
      skipped: plan.sized.skipped,
      excluded: plan.sized.excluded,
    };
  }

  protected failWith(error: unknown, options: TOptions): void {
    this.handleError(
      error instanceof Error ? error.message : String(error),
      options,
      error instanceof Error ? error : undefined
    );
  }
}

import { Command } from 'commander';
import { PartitionCommand } from '../../base/partition-command';
import type { PartitionCommandOptions } from '../../base/partition-command';

export type PlanCommandOptions = PartitionCommandOptions;

/**
 * Plan Command - sizes a directory and prints the scan groups it would produce.
 * Nothing is scanned.
 */
export class PlanCommand extends PartitionCommand<PlanCommandOptions> {
  protected description = 'Show how a directory would be split into scan groups';

  register(program: Command): void {
    const planCmd = program
      .command('plan <targetDir>')
      .description(this.description);

    this.addPartitionOptions(planCmd)
      .action(async (targetDir: string, options: Omit<PlanCommandOptions, 'targetDir'>) => {
        await this.execute({ ...options, targetDir });
      });
  }

  async execute(options: PlanCommandOptions): Promise<void> {
    this.configureLogger(options);
    try {
      const plan = await this.buildPlan(options);

      if (options.json) {
        this.handleSuccess(this.planToJson(plan), options);
        return;
      }

      this.printPlan(plan);
      if (plan.summary.oversizedCount > 0) {
        this.logger.warn(`⚠️ ${plan.summary.oversizedCount} file(s) exceed the size limit and cannot be split`);
      }
    } catch (error) {
      this.failWith(error, options);
    }
  }
}

import { Command } from 'commander';
import { PlanCommand } from './plan-command';

/**
 * Register the plan command
 */
export function registerPlanCommand(program: Command): void {
  const planCommand = new PlanCommand();
  planCommand.register(program);
}

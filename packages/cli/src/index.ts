#!/usr/bin/env node

import { Command } from 'commander';
import { registerPlanCommand } from './commands/plan/plan';
import { registerScanCommand } from './commands/scan/scan';

const program = new Command();

program
  .name('scansplit')
  .description('Split a directory tree into size-bounded scan groups and scan each one')
  .version('1.0.0');

registerPlanCommand(program);
registerScanCommand(program);

program.parseAsync().catch((error: unknown) => {
  console.error("❌ Fatal error:", error);
  process.exit(1);
});

import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { STEP_CATALOG } from '../../steps/catalog.js';

export const stepsCommand = new Command('steps')
  .description('List installation steps in execution order')
  .option('--json', 'Output result as JSON')
  .action(
    withErrorHandler(async (options: { json?: boolean }) => {
      if (options.json) {
        console.log(JSON.stringify(STEP_CATALOG.map(({ number, name }) => ({ number, name }))));
        return;
      }
      for (const entry of STEP_CATALOG) {
        console.log(`  ${chalk.bold(String(entry.number).padStart(2))}. ${entry.name}`);
      }
      console.log('');
      console.log(chalk.dim('  Resume from any step with: openshift-sts-installer install --start-from-step <n>'));
    }),
  );

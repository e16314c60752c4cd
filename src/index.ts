#!/usr/bin/env node
import { Command } from 'commander';
import { installCommand } from './commands/install/index.js';
import { statusCommand } from './commands/status/index.js';
import { stepsCommand } from './commands/steps/index.js';
import { cleanupCommand } from './commands/cleanup/index.js';
import { CONFIG_DEFAULTS } from './config/index.js';

const program = new Command();

program
  .name('openshift-sts-installer')
  .description('Resumable OpenShift-on-AWS installer with STS (manual mode) credentials')
  .version('0.1.0')
  .option('--config <file>', `Config file (default: ${CONFIG_DEFAULTS.configFile})`)
  .option('--verbose', 'Show debug output, including captured tool output');

program.addCommand(installCommand);
program.addCommand(statusCommand);
program.addCommand(stepsCommand);
program.addCommand(cleanupCommand);

await program.parseAsync();

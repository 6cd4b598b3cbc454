#!/usr/bin/env node

/**
 * Configuration Validation CLI
 *
 * Validates project configurations without synthesising any stack.
 *
 * Usage:
 *   npm run validate-config                       # every project and environment
 *   npm run validate-config -- -p instance -e prod
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';

import { getAvailableProjects } from '../lib/config/projects';

import { ReportFlags, buildConfigReports, hasErrors, selectReports } from './config-report';
import logger from './logger';

// Load environment variables from .env file
dotenv.config();

const program = new Command();

program
  .name('validate-config')
  .description('Validate EC2 compute project configurations')
  .version('1.0.0');

program
  .command('validate')
  .description('Run the configuration validators and print rendered instance names')
  .option('-p, --project <project>', `Project (${getAvailableProjects().join(', ')})`)
  .option('-e, --environment <env>', 'Environment (development, staging, production or dev, prod)')
  .action((flags: ReportFlags) => {
    const selection = selectReports(flags);
    if ('error' in selection) {
      logger.error(selection.error);
      process.exitCode = 1;
      return;
    }

    const environment = selection.options.environments?.[0];
    if (environment) {
      logger.setEnvironment(environment);
    }

    const reports = buildConfigReports(selection.options);

    logger.header('Configuration validation');
    logger.table(
      ['Project', 'Environment', 'Instance names', 'Errors'],
      reports.map((report) => [
        report.project,
        report.environment,
        report.names.join(', '),
        String(report.errors.length),
      ]),
    );

    for (const report of reports) {
      if (report.errors.length === 0) {
        logger.success(`${report.project}/${report.environment}`);
        continue;
      }
      logger.error(`${report.project}/${report.environment}`);
      report.errors.forEach((error) => logger.listItem(error));
    }

    logger.debug(`Checked ${reports.length} configuration(s)`);

    if (hasErrors(reports)) {
      process.exitCode = 1;
    }
  });

program.parse();

#!/usr/bin/env node

/**
 * Idle Gateways CLI
 * Detect idle NAT Gateways and Internet Gateways from CloudWatch metrics.
 */

import { Command } from 'commander';
import { createAwsApis } from '../backend/src/lib/cloud-provider/aws-clients.js';
import { resolveCredentials } from '../backend/src/lib/aws-helpers.js';
import { loadConfig } from '../backend/src/lib/environment-config.js';
import { logger } from '../backend/src/lib/logger.js';
import { VERSION } from '../backend/src/lib/version.js';
import { IdleGatewaysCLI } from './idle-gateways.js';

interface CliOptions {
  region?: string;
  profile?: string;
  days: string;
  output?: string;
  concurrency?: string;
  logLevel?: string;
}

const program = new Command();

program
  .name('idle-gateways')
  .description('Detect idle NAT Gateways and Internet Gateways using CloudWatch metrics.')
  .version(VERSION)
  .option('-r, --region <region>', 'AWS region (e.g. us-east-1), defaults to AWS_REGION')
  .option('-p, --profile <name>', 'AWS CLI profile name')
  .option('-d, --days <number>', 'Number of days to look back', '90')
  .option('-o, --output <path>', 'Output Excel file path (default: gateway_analysis_<account>_<region>_<timestamp>.xlsx)')
  .option('-c, --concurrency <number>', 'Gateways analyzed in parallel')
  .option('--log-level <level>', 'DEBUG, INFO, WARN or ERROR')
  .action(async (options: CliOptions) => {
    try {
      const config = loadConfig({
        region: options.region,
        profile: options.profile,
        lookbackDays: options.days,
        output: options.output,
        concurrency: options.concurrency,
        logLevel: options.logLevel?.toUpperCase(),
      });
      logger.setLevel(config.logLevel);

      const apis = createAwsApis({ region: config.region, credentials: resolveCredentials(config.profile) });
      const { exitCode } = await new IdleGatewaysCLI(config, apis).run();
      process.exitCode = exitCode;
    } catch (error) {
      logger.critical('Gateway analysis aborted', error);
      console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
      process.exitCode = 1;
    }
  });

await program.parseAsync(process.argv);

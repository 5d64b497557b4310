#!/usr/bin/env node

/**
 * EC2 Details CLI
 *
 * Looks up EC2 instances by Name tag and reports their details,
 * including attached EBS volumes. Read-only credentials are enough.
 *
 * Usage:
 *   npx tsx scripts/ec2-details/cli.ts MY-EC2-NAME
 *   npx tsx scripts/ec2-details/cli.ts MY-EC2-NAME --human
 *   npx tsx scripts/ec2-details/cli.ts MY-EC2-NAME --region us-east-1 --output report.json
 */

import { Command } from 'commander';
import * as dotenv from 'dotenv';

import { errorMessage } from '../../lib/errors';
import logger, { LogLevel } from '../../lib/utilities/logger';

import { lookupCommand } from './lookup.js';

// Load environment variables (AWS credentials, LOG_LEVEL) from .env file
dotenv.config();

interface CliOptions {
  region?: string;
  output?: string;
  human?: boolean;
  profile?: string;
  verbose?: boolean;
}

const program = new Command();

program
  .name('ec2-details')
  .description('Get EC2 instance details by server name')
  .version('1.0.0')
  .argument('<server-name>', 'Name of the server (EC2 Name tag)')
  .option('-r, --region <region>', 'AWS region (default: ap-southeast-2)')
  .option('-o, --output <file>', 'Output JSON file (default: output/{server_name}_details.json)')
  .option('--human', 'Human-readable output instead of JSON')
  .option('--profile <profile>', 'AWS profile to use')
  .option('-v, --verbose', 'Log request details')
  .action(async (serverName: string, options: CliOptions) => {
    if (options.verbose) {
      logger.setLevel(LogLevel.DEBUG);
    }

    // SDK clients resolve named profiles through the env var
    if (options.profile) {
      process.env.AWS_PROFILE = options.profile;
    }

    process.exitCode = await lookupCommand({
      serverName,
      region: options.region,
      output: options.output,
      human: options.human,
    });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.error(`Unexpected error: ${errorMessage(error)}`);
  process.exitCode = 1;
});

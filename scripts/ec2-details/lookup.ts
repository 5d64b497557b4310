/**
 * Lookup Command
 *
 * Runs the instance lookup and emits either the JSON report file or the
 * human-readable report on stdout.
 *
 * Exit codes:
 *   0 = report produced, or no instance matched
 *   1 = the instance query failed
 */

import type { EC2Client } from '@aws-sdk/client-ec2';

import {
  DEFAULT_REGION,
  LookupError,
  defaultOutputPath,
  logger,
  lookupInstanceDetails,
  renderInstances,
  toReportResult,
  type InstanceRecord,
  type LookupOutcome,
} from '../../lib';

import { writeReport } from './output.js';

export interface LookupCommandOptions {
  serverName: string;
  region?: string;
  /** JSON report path (default: output/{name}_details.json) */
  output?: string;
  /** Print a text report instead of writing JSON */
  human?: boolean;
  client?: EC2Client;
  /** Sink for text report lines (default: stdout) */
  print?: (line: string) => void;
}

function summarize(instances: readonly InstanceRecord[]): void {
  instances.forEach((instance, index) => {
    logger.listItem(
      `Instance ${index + 1}: ${instance.InstanceId ?? 'unknown'} (${instance.State?.Name ?? 'unknown'})`,
    );
  });
}

export async function lookupCommand(options: LookupCommandOptions): Promise<number> {
  const { serverName } = options;
  const print = options.print ?? ((line: string) => console.log(line));

  logger.task(`Searching for EC2 instance: ${serverName}`);
  logger.keyValue('Region', options.region ?? `${DEFAULT_REGION} (default)`);

  let outcome: LookupOutcome;
  try {
    outcome = await lookupInstanceDetails({
      name: serverName,
      region: options.region,
      client: options.client,
    });
  } catch (error) {
    if (error instanceof LookupError) {
      logger.error(`Error retrieving EC2 details: ${error.message}`);
      return 1;
    }
    throw error;
  }

  if (outcome.status === 'not-found') {
    logger.warn(`No EC2 instances found with name: ${serverName}`);
    return 0;
  }

  const { instances, region } = outcome;

  if (instances.length > 1) {
    logger.info(`Found ${instances.length} instances with name: ${serverName}`);
  }

  if (options.human) {
    renderInstances(instances).forEach((line) => print(line));
    return 0;
  }

  const outputPath = options.output ?? defaultOutputPath(serverName);
  writeReport(outputPath, toReportResult(serverName, region, instances));

  logger.success(`EC2 details written to: ${outputPath}`);
  logger.info(`Found ${instances.length} instance(s)`);
  summarize(instances);

  return 0;
}

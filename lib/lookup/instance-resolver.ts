/**
 * @format
 * Instance Resolver
 *
 * Finds every non-terminated instance whose Name tag matches exactly.
 * DescribeInstances groups instances under reservations and pages its
 * results; both are flattened here so callers only ever see one ordered
 * list.
 */

import {
    DescribeInstancesCommand,
    EC2Client,
    type Filter,
    type Instance,
} from '@aws-sdk/client-ec2';

import { ACTIVE_INSTANCE_STATES, DEFAULT_REGION, NAME_TAG_KEY } from '../config/defaults';
import { LookupError } from '../errors';
import logger from '../utilities/logger';

export interface ResolveOptions {
    /** Region to query (default: ap-southeast-2) */
    readonly region?: string;
    /** Client to reuse; one is created for the region otherwise */
    readonly client?: EC2Client;
}

/**
 * Build the DescribeInstances filters for a name lookup
 */
export function buildInstanceFilters(name: string): Filter[] {
    return [
        { Name: `tag:${NAME_TAG_KEY}`, Values: [name] },
        { Name: 'instance-state-name', Values: [...ACTIVE_INSTANCE_STATES] },
    ];
}

/**
 * Resolve a Name tag to the matching instances.
 *
 * An empty result means nothing matched. Any API failure is rethrown as
 * a LookupError; pages already read are discarded.
 */
export async function resolveInstances(name: string, options: ResolveOptions = {}): Promise<Instance[]> {
    const region = options.region ?? DEFAULT_REGION;
    const client = options.client ?? new EC2Client({ region });
    const filters = buildInstanceFilters(name);

    logger.verbose(`DescribeInstances ${NAME_TAG_KEY}=${name} in ${region}`);

    const instances: Instance[] = [];
    let nextToken: string | undefined;

    try {
        do {
            const response = await client.send(
                new DescribeInstancesCommand({
                    Filters: filters,
                    NextToken: nextToken,
                }),
            );

            for (const reservation of response.Reservations ?? []) {
                instances.push(...(reservation.Instances ?? []));
            }

            nextToken = response.NextToken;
        } while (nextToken);
    } catch (error) {
        throw new LookupError(name, region, error);
    }

    logger.debug(`Resolved ${instances.length} instance(s) for ${name}`);
    return instances;
}

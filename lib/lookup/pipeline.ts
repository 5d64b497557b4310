/**
 * @format
 * Lookup Pipeline
 *
 * resolve → collect volume ids → fetch volumes → merge.
 *
 * The two remote calls run strictly in that order: volume ids are only
 * known once the instances are resolved.
 */

import { EC2Client } from '@aws-sdk/client-ec2';

import { DEFAULT_REGION } from '../config/defaults';

import { collectVolumeIds, mergeVolumeDetails } from './enrichment';
import { resolveInstances } from './instance-resolver';
import type { LookupOutcome } from './types';
import { fetchVolumes } from './volume-fetcher';

export interface LookupOptions {
    /** Value of the Name tag to search for */
    readonly name: string;
    readonly region?: string;
    readonly client?: EC2Client;
}

/**
 * Look up instances by name and enrich them with volume metadata.
 *
 * @throws LookupError when the instance query fails
 */
export async function lookupInstanceDetails(options: LookupOptions): Promise<LookupOutcome> {
    const { name } = options;
    const region = options.region ?? DEFAULT_REGION;
    const client = options.client ?? new EC2Client({ region });

    const instances = await resolveInstances(name, { region, client });
    if (instances.length === 0) {
        return { status: 'not-found', name, region };
    }

    const volumes = await fetchVolumes(client, collectVolumeIds(instances));

    return {
        status: 'found',
        name,
        region,
        instances: mergeVolumeDetails(instances, volumes),
    };
}

/**
 * @format
 * Volume Metadata Fetcher
 *
 * Best-effort EBS lookup. Instance data is mandatory, volume data is not:
 * a failed DescribeVolumes call degrades to an empty map instead of
 * aborting the lookup.
 */

import { DescribeVolumesCommand, EC2Client, type Volume } from '@aws-sdk/client-ec2';

import { NOT_APPLICABLE } from '../config/defaults';
import { errorMessage } from '../errors';
import logger from '../utilities/logger';

import type { VolumeMap, VolumeRecord } from './types';

/**
 * Map a provider volume onto a VolumeRecord
 */
export function toVolumeRecord(volume: Volume): VolumeRecord {
    return {
        Size: volume.Size ?? null,
        VolumeType: volume.VolumeType ?? null,
        State: volume.State ?? null,
        Encrypted: volume.Encrypted ?? false,
        Iops: volume.Iops ?? NOT_APPLICABLE,
        Throughput: volume.Throughput ?? NOT_APPLICABLE,
        // Volumes not created from a snapshot report an empty id
        SnapshotId: volume.SnapshotId || NOT_APPLICABLE,
        AvailabilityZone: volume.AvailabilityZone ?? null,
        CreateTime: volume.CreateTime ?? null,
    };
}

/**
 * Fetch metadata for the given volume ids.
 *
 * Queries through a `volume-id` filter rather than explicit `VolumeIds`:
 * EC2 rejects an explicit-id request outright when any one id no longer
 * exists, while a filter simply leaves that id out. Ids missing from the
 * response get no entry.
 */
export async function fetchVolumes(client: EC2Client, volumeIds: Iterable<string>): Promise<VolumeMap> {
    const ids = [...new Set(volumeIds)];
    const volumes = new Map<string, VolumeRecord>();

    if (ids.length === 0) {
        return volumes;
    }

    logger.verbose(`DescribeVolumes ${ids.join(', ')}`);

    let nextToken: string | undefined;

    try {
        do {
            const response = await client.send(
                new DescribeVolumesCommand({
                    Filters: [{ Name: 'volume-id', Values: ids }],
                    NextToken: nextToken,
                }),
            );

            for (const volume of response.Volumes ?? []) {
                if (volume.VolumeId) {
                    volumes.set(volume.VolumeId, toVolumeRecord(volume));
                }
            }

            nextToken = response.NextToken;
        } while (nextToken);
    } catch (error) {
        logger.warn(`Could not retrieve volume details: ${errorMessage(error)}`);
        return new Map();
    }

    if (volumes.size < ids.length) {
        logger.debug(`Volume details resolved for ${volumes.size} of ${ids.length} volume(s)`);
    }

    return volumes;
}

/**
 * @format
 * Enrichment Merger
 *
 * Joins block device mappings against fetched volume metadata. Pure: no
 * I/O, and input instances are never mutated.
 */

import type { Instance, InstanceBlockDeviceMapping } from '@aws-sdk/client-ec2';

import type { AttachmentDetail, InstanceRecord, VolumeMap, VolumeRecord } from './types';

const UNKNOWN = 'unknown';

/** Backing of one block device mapping; a remote mapping may lack its id */
type MappingBacking = { kind: 'ephemeral' } | { kind: 'remote'; volumeId: string | undefined };

function backingOf(mapping: InstanceBlockDeviceMapping): MappingBacking {
    return mapping.Ebs ? { kind: 'remote', volumeId: mapping.Ebs.VolumeId } : { kind: 'ephemeral' };
}

/** Volume id to look up, undefined for instance store or an id-less mapping */
function lookupVolumeId(mapping: InstanceBlockDeviceMapping): string | undefined {
    const backing = backingOf(mapping);
    return backing.kind === 'remote' ? backing.volumeId : undefined;
}

/**
 * Deduplicated remote-backed volume ids across all instances, in
 * first-seen order.
 */
export function collectVolumeIds(instances: readonly Instance[]): Set<string> {
    const ids = new Set<string>();
    for (const instance of instances) {
        for (const mapping of instance.BlockDeviceMappings ?? []) {
            const volumeId = lookupVolumeId(mapping);
            if (volumeId) {
                ids.add(volumeId);
            }
        }
    }
    return ids;
}

/**
 * Attach resolved volumes to each instance under `VolumeDetails`.
 *
 * Volumes missing from the map get no entry; that absence is what the
 * renderer reports as "details unavailable".
 */
export function mergeVolumeDetails(instances: readonly Instance[], volumes: VolumeMap): InstanceRecord[] {
    return instances.map((instance) => {
        const details: Record<string, VolumeRecord> = {};

        for (const mapping of instance.BlockDeviceMappings ?? []) {
            const volumeId = lookupVolumeId(mapping);
            if (!volumeId) continue;

            const volume = volumes.get(volumeId);
            if (volume) {
                details[volumeId] = volume;
            }
        }

        return { ...instance, VolumeDetails: details };
    });
}

/**
 * Classify each attachment of an enriched instance as resolved,
 * unresolved or ephemeral.
 */
export function describeAttachments(instance: InstanceRecord): AttachmentDetail[] {
    return (instance.BlockDeviceMappings ?? []).map((mapping): AttachmentDetail => {
        const deviceName = mapping.DeviceName ?? UNKNOWN;
        const backing = backingOf(mapping);

        if (backing.kind === 'ephemeral') {
            return { kind: 'ephemeral', deviceName };
        }

        const { volumeId } = backing;
        if (!volumeId) {
            return { kind: 'unresolved', deviceName, volumeId: UNKNOWN };
        }

        const volume = Object.prototype.hasOwnProperty.call(instance.VolumeDetails, volumeId)
            ? instance.VolumeDetails[volumeId]
            : undefined;

        return volume
            ? { kind: 'resolved', deviceName, volumeId, volume }
            : { kind: 'unresolved', deviceName, volumeId };
    });
}

/**
 * @format
 * Text Report
 *
 * Human-readable rendering of enriched instances, one line per entry.
 * Lines are returned rather than printed so the CLI decides where they go.
 */

import { DEFAULT_PLATFORM, NOT_APPLICABLE } from '../config/defaults';
import { describeAttachments } from '../lookup/enrichment';
import type { AttachmentDetail, InstanceRecord, VolumeRecord } from '../lookup/types';

const RULE = '='.repeat(50);

function show(value: string | number | boolean | Date | null | undefined): string {
    if (value === undefined || value === null || value === '') return NOT_APPLICABLE;
    if (value instanceof Date) return value.toISOString();
    return String(value);
}

function renderVolume(volumeId: string, deviceName: string, volume: VolumeRecord): string[] {
    const lines = [
        `  ${deviceName}: ${volumeId}`,
        `    Size: ${volume.Size === null ? 'Unknown' : `${volume.Size} GB`}`,
        `    Type: ${show(volume.VolumeType)}`,
        `    State: ${show(volume.State)}`,
        `    Encrypted: ${volume.Encrypted}`,
    ];

    if (volume.Iops !== NOT_APPLICABLE) lines.push(`    IOPS: ${volume.Iops}`);
    if (volume.Throughput !== NOT_APPLICABLE) lines.push(`    Throughput: ${volume.Throughput} MB/s`);
    if (volume.SnapshotId !== NOT_APPLICABLE) lines.push(`    Snapshot: ${volume.SnapshotId}`);

    lines.push(`    Availability Zone: ${show(volume.AvailabilityZone)}`);
    lines.push(`    Created: ${show(volume.CreateTime)}`);
    return lines;
}

function renderAttachment(attachment: AttachmentDetail): string[] {
    switch (attachment.kind) {
        case 'resolved':
            return renderVolume(attachment.volumeId, attachment.deviceName, attachment.volume);
        case 'unresolved':
            return [`  ${attachment.deviceName}: ${attachment.volumeId} (details unavailable)`];
        case 'ephemeral':
            return [`  ${attachment.deviceName}: Instance store volume`];
    }
}

/**
 * Render one instance in fixed section order: identity, network,
 * security groups, tags, storage, placement, key pair.
 */
export function renderInstance(instance: InstanceRecord): string[] {
    const lines: string[] = [
        `Instance ID: ${show(instance.InstanceId)}`,
        `Instance Type: ${show(instance.InstanceType)}`,
        `State: ${show(instance.State?.Name)}`,
        `Launch Time: ${show(instance.LaunchTime)}`,
        `Architecture: ${show(instance.Architecture)}`,
        `Platform: ${instance.Platform ?? DEFAULT_PLATFORM}`,
    ];

    // Network
    lines.push('', 'Network Details:');
    lines.push(`  VPC ID: ${show(instance.VpcId)}`);
    lines.push(`  Subnet ID: ${show(instance.SubnetId)}`);
    lines.push(`  Private IP: ${show(instance.PrivateIpAddress)}`);
    if (instance.PublicIpAddress) lines.push(`  Public IP: ${instance.PublicIpAddress}`);
    lines.push(`  Private DNS: ${show(instance.PrivateDnsName)}`);
    if (instance.PublicDnsName) lines.push(`  Public DNS: ${instance.PublicDnsName}`);

    lines.push('', 'Security Groups:');
    for (const group of instance.SecurityGroups ?? []) {
        lines.push(`  - ${show(group.GroupName)} (${show(group.GroupId)})`);
    }

    lines.push('', 'Tags:');
    const tags = instance.Tags ?? [];
    if (tags.length === 0) {
        lines.push('  No tags found');
    }
    for (const tag of tags) {
        lines.push(`  ${show(tag.Key)}: ${tag.Value ?? ''}`);
    }

    lines.push('', 'Storage:');
    const attachments = describeAttachments(instance);
    if (attachments.length === 0) {
        lines.push('  No block devices');
    }
    for (const attachment of attachments) {
        lines.push(...renderAttachment(attachment));
    }

    lines.push('', `Availability Zone: ${show(instance.Placement?.AvailabilityZone)}`);
    if (instance.KeyName) lines.push(`Key Pair: ${instance.KeyName}`);

    return lines;
}

/**
 * Render all instances; with more than one, each gets a numbered header.
 */
export function renderInstances(instances: readonly InstanceRecord[]): string[] {
    const total = instances.length;

    return instances.flatMap((instance, index) => {
        const header = total > 1 ? ['', RULE, `INSTANCE ${index + 1} of ${total}`, RULE] : [];
        return [...header, ...renderInstance(instance)];
    });
}

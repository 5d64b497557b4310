/**
 * @format
 * Lookup Types
 *
 * Records produced by the instance lookup pipeline. Instances are the
 * provider's own objects passed through unaltered; the pipeline only adds
 * `VolumeDetails`.
 */

import type { Instance } from '@aws-sdk/client-ec2';

import type { NOT_APPLICABLE } from '../config/defaults';

export type NotApplicable = typeof NOT_APPLICABLE;

/**
 * Block storage metadata for one volume.
 *
 * Optional provider fields carry the `N/A` marker. Mandatory fields the
 * provider left out are `null`.
 */
export interface VolumeRecord {
    readonly Size: number | null;
    readonly VolumeType: string | null;
    readonly State: string | null;
    readonly Encrypted: boolean;
    readonly Iops: number | NotApplicable;
    readonly Throughput: number | NotApplicable;
    readonly SnapshotId: string | NotApplicable;
    readonly AvailabilityZone: string | null;
    readonly CreateTime: Date | null;
}

/** Volume metadata keyed by volume id */
export type VolumeMap = ReadonlyMap<string, VolumeRecord>;

/** Provider instance plus the volumes successfully resolved for it */
export type InstanceRecord = Readonly<Instance> & {
    readonly VolumeDetails: Readonly<Record<string, VolumeRecord>>;
};

/**
 * Per-attachment view used by the merger and the text renderer.
 */
export type AttachmentDetail =
    | { readonly kind: 'resolved'; readonly deviceName: string; readonly volumeId: string; readonly volume: VolumeRecord }
    | { readonly kind: 'unresolved'; readonly deviceName: string; readonly volumeId: string }
    | { readonly kind: 'ephemeral'; readonly deviceName: string };

/** Outcome of one lookup; zero matches is an outcome, not an error */
export type LookupOutcome =
    | { readonly status: 'not-found'; readonly name: string; readonly region: string }
    | {
          readonly status: 'found';
          readonly name: string;
          readonly region: string;
          readonly instances: readonly InstanceRecord[];
      };

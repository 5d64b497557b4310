/**
 * @format
 * Lookup Pipeline - Unit Tests
 *
 * Runs resolve → fetch → merge against a mocked EC2 client.
 */

import { DescribeInstancesCommand, DescribeVolumesCommand, EC2Client } from '@aws-sdk/client-ec2';
import { mockClient } from 'aws-sdk-client-mock';
import 'aws-sdk-client-mock-jest';

import { LookupError } from '../../../lib/errors';
import { lookupInstanceDetails } from '../../../lib/lookup/pipeline';
import {
    TEST_REGION,
    createInstance,
    createReservation,
    createVolume,
    ebsMapping,
} from '../../fixtures';

const ec2Mock = mockClient(EC2Client);

describe('Lookup Pipeline', () => {
    const client = new EC2Client({ region: TEST_REGION });

    beforeEach(() => {
        ec2Mock.reset();
    });

    it('should report not-found without fetching volumes', async () => {
        ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

        const outcome = await lookupInstanceDetails({ name: 'web-01', client });

        expect(outcome).toEqual({ status: 'not-found', name: 'web-01', region: 'ap-southeast-2' });
        expect(ec2Mock).not.toHaveReceivedCommand(DescribeVolumesCommand);
    });

    it('should fetch a volume shared by two instances once', async () => {
        ec2Mock.on(DescribeInstancesCommand).resolves({
            Reservations: [
                createReservation(
                    createInstance({ InstanceId: 'i-1', BlockDeviceMappings: [ebsMapping('/dev/xvdf', 'vol-shared')] }),
                    createInstance({ InstanceId: 'i-2', BlockDeviceMappings: [ebsMapping('/dev/xvdf', 'vol-shared')] }),
                ),
            ],
        });
        ec2Mock.on(DescribeVolumesCommand).resolves({ Volumes: [createVolume('vol-shared')] });

        const outcome = await lookupInstanceDetails({ name: 'web-01', client });

        expect(ec2Mock).toHaveReceivedCommandTimes(DescribeVolumesCommand, 1);
        expect(ec2Mock).toHaveReceivedCommandWith(DescribeVolumesCommand, {
            Filters: [{ Name: 'volume-id', Values: ['vol-shared'] }],
        });
        if (outcome.status !== 'found') throw new Error('expected instances');
        expect(outcome.instances[0].VolumeDetails['vol-shared']).toEqual(
            outcome.instances[1].VolumeDetails['vol-shared'],
        );
    });

    it('should enrich two instances named web-01 without cross-contamination', async () => {
        ec2Mock.on(DescribeInstancesCommand).resolves({
            Reservations: [
                createReservation(
                    createInstance({ InstanceId: 'i-1', BlockDeviceMappings: [ebsMapping('/dev/xvda', 'vol-A')] }),
                ),
                createReservation(
                    createInstance({ InstanceId: 'i-2', BlockDeviceMappings: [ebsMapping('/dev/xvda', 'vol-B')] }),
                ),
            ],
        });
        ec2Mock.on(DescribeVolumesCommand).resolves({
            Volumes: [createVolume('vol-A', { Size: 8 }), createVolume('vol-B', { Size: 100 })],
        });

        const outcome = await lookupInstanceDetails({ name: 'web-01', client });

        if (outcome.status !== 'found') throw new Error('expected instances');
        expect(outcome.instances.map((i) => i.InstanceId)).toEqual(['i-1', 'i-2']);
        expect(Object.keys(outcome.instances[0].VolumeDetails)).toEqual(['vol-A']);
        expect(outcome.instances[0].VolumeDetails['vol-A'].Size).toBe(8);
        expect(Object.keys(outcome.instances[1].VolumeDetails)).toEqual(['vol-B']);
        expect(outcome.instances[1].VolumeDetails['vol-B'].Size).toBe(100);
    });

    it('should still return every instance when the volume fetch fails', async () => {
        ec2Mock.on(DescribeInstancesCommand).resolves({
            Reservations: [
                createReservation(createInstance({ InstanceId: 'i-1' }), createInstance({ InstanceId: 'i-2' })),
            ],
        });
        ec2Mock.on(DescribeVolumesCommand).rejects(new Error('RequestLimitExceeded'));

        const outcome = await lookupInstanceDetails({ name: 'web-01', client });

        if (outcome.status !== 'found') throw new Error('expected instances');
        expect(outcome.instances.map((i) => i.InstanceId)).toEqual(['i-1', 'i-2']);
        expect(outcome.instances.map((i) => i.VolumeDetails)).toEqual([{}, {}]);
    });

    it('should carry the requested region into the outcome', async () => {
        ec2Mock.on(DescribeInstancesCommand).resolves({ Reservations: [] });

        const outcome = await lookupInstanceDetails({ name: 'web-01', region: 'us-east-1', client });

        expect(outcome.region).toBe('us-east-1');
    });

    it('should propagate LookupError and skip the volume fetch', async () => {
        ec2Mock.on(DescribeInstancesCommand).rejects(new Error('AuthFailure'));

        await expect(lookupInstanceDetails({ name: 'web-01', client })).rejects.toBeInstanceOf(LookupError);
        expect(ec2Mock).not.toHaveReceivedCommand(DescribeVolumesCommand);
    });
});

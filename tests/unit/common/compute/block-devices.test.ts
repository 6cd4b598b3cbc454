/**
 * @format
 * EBS Block Device Mapping Unit Tests
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';

import { buildBlockDevices, buildFleetBlockDevices } from '../../../../lib/common/compute/constructs/block-devices';
import { OperatingSystem } from '../../../../lib/config/operating-systems';

describe('buildBlockDevices', () => {
    it('should size the root volume to the OS minimum by default', () => {
        const [root] = buildBlockDevices(OperatingSystem.WINDOWS_2022);

        expect(root.deviceName).toBe('/dev/sda1');
        expect(root.volume.ebsDevice).toEqual({
            volumeSize: 30,
            volumeType: ec2.EbsDeviceVolumeType.GP3,
            encrypted: true,
            deleteOnTermination: true,
            iops: 3000,
            throughput: 125,
        });
    });

    it('should apply root overrides', () => {
        const [root] = buildBlockDevices(OperatingSystem.AMAZON_LINUX_2023, { sizeGb: 40, iops: 6000, throughput: 250 });

        expect(root.deviceName).toBe('/dev/xvda');
        expect(root.volume.ebsDevice).toMatchObject({ volumeSize: 40, iops: 6000, throughput: 250 });
    });

    it('should append data volumes in order', () => {
        const devices = buildBlockDevices(OperatingSystem.AMAZON_LINUX_2023, {}, [
            { deviceName: '/dev/sdf', sizeGb: 50, deleteOnTermination: false },
            { deviceName: '/dev/sdg', sizeGb: 100, iops: 4000 },
        ]);

        expect(devices.map((device) => device.deviceName)).toEqual(['/dev/xvda', '/dev/sdf', '/dev/sdg']);
        expect(devices[1].volume.ebsDevice).toMatchObject({ volumeSize: 50, deleteOnTermination: false });
        expect(devices[2].volume.ebsDevice).toMatchObject({ volumeSize: 100, iops: 4000, deleteOnTermination: true });
    });

    it('should reject a root volume below the OS minimum', () => {
        expect(() => buildBlockDevices(OperatingSystem.WINDOWS_2022, { sizeGb: 20 })).toThrow(
            'Invalid volume size: 20 GB. Must be an integer between 30 and 16384',
        );
    });

    it('should reject GP3 settings out of range', () => {
        expect(() => buildBlockDevices(OperatingSystem.UBUNTU_2204, { throughput: 2000 })).toThrow(
            'GP3 throughput must be between 125 and 1000 MiB/s',
        );
    });
});

describe('buildFleetBlockDevices', () => {
    it('should map only the root volume', () => {
        const devices = buildFleetBlockDevices(OperatingSystem.UBUNTU_2204, { sizeGb: 16 });

        expect(devices).toHaveLength(1);
        expect(devices[0].deviceName).toBe('/dev/sda1');
        expect(devices[0].volume.ebsDevice).toMatchObject({
            volumeSize: 16,
            iops: 3000,
            throughput: 125,
            deleteOnTermination: true,
        });
    });

    it('should carry root throughput', () => {
        const [root] = buildFleetBlockDevices(OperatingSystem.AMAZON_LINUX_2023, { throughput: 500 });

        expect(root.volume.ebsDevice).toMatchObject({ volumeSize: 8, throughput: 500 });
    });

    it('should reject throughput out of range', () => {
        expect(() => buildFleetBlockDevices(OperatingSystem.AMAZON_LINUX_2023, { throughput: 99999 })).toThrow(
            'GP3 throughput must be between 125 and 1000 MiB/s',
        );
    });

    it('should enforce the OS minimum', () => {
        expect(() => buildFleetBlockDevices(OperatingSystem.WINDOWS_2022, { sizeGb: 8 })).toThrow(
            'Invalid volume size: 8 GB. Must be an integer between 30 and 16384',
        );
    });
});

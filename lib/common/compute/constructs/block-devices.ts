/**
 * @format
 * EBS Block Device Mappings
 *
 * Root and data volume mappings shared by Ec2InstanceConstruct and
 * LaunchTemplateConstruct. All volumes are encrypted GP3.
 */

import * as autoscaling from 'aws-cdk-lib/aws-autoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';

import { VolumeConfig } from '../../../config/compute';
import { EBS_DEFAULTS } from '../../../config/defaults';
import { OperatingSystem, getOperatingSystemProfile } from '../../../config/operating-systems';
import { assertValid, validateGp3Volume, validateVolumeSize } from '../../../utilities/validation';

/**
 * Root volume settings
 */
export interface RootVolumeOptions {
    /** @default minimum root size of the operating system */
    readonly sizeGb?: number;
    /** @default 3000 */
    readonly iops?: number;
    /** @default 125 */
    readonly throughput?: number;
}

function gp3Volume(sizeGb: number, iops: number, throughput: number, deleteOnTermination: boolean): ec2.BlockDeviceVolume {
    assertValid(validateGp3Volume(iops, throughput));
    return ec2.BlockDeviceVolume.ebs(sizeGb, {
        volumeType: EBS_DEFAULTS.volumeType,
        encrypted: EBS_DEFAULTS.encrypted,
        deleteOnTermination,
        iops,
        throughput,
    });
}

/**
 * Root device first, then one mapping per additional volume.
 *
 * @throws Error when a size is below the OS minimum or GP3 limits are exceeded
 */
export function buildBlockDevices(
    os: OperatingSystem,
    root: RootVolumeOptions = {},
    additionalVolumes: readonly VolumeConfig[] = [],
): ec2.BlockDevice[] {
    const profile = getOperatingSystemProfile(os);
    const rootSize = root.sizeGb ?? profile.minimumRootVolumeGb;
    assertValid(validateVolumeSize(rootSize, profile.minimumRootVolumeGb));

    const devices: ec2.BlockDevice[] = [
        {
            deviceName: profile.rootDeviceName,
            volume: gp3Volume(rootSize, root.iops ?? EBS_DEFAULTS.iops, root.throughput ?? EBS_DEFAULTS.throughput, true),
        },
    ];

    for (const volume of additionalVolumes) {
        assertValid(validateVolumeSize(volume.sizeGb));
        devices.push({
            deviceName: volume.deviceName,
            volume: gp3Volume(
                volume.sizeGb,
                volume.iops ?? EBS_DEFAULTS.iops,
                volume.throughput ?? EBS_DEFAULTS.throughput,
                volume.deleteOnTermination ?? true,
            ),
        });
    }

    return devices;
}

/**
 * Root device mapping for a fleet whose instances are described directly
 * on the Auto Scaling group (no launch template of our own).
 */
export function buildFleetBlockDevices(os: OperatingSystem, root: RootVolumeOptions = {}): autoscaling.BlockDevice[] {
    const profile = getOperatingSystemProfile(os);
    const rootSize = root.sizeGb ?? profile.minimumRootVolumeGb;
    const iops = root.iops ?? EBS_DEFAULTS.iops;
    const throughput = root.throughput ?? EBS_DEFAULTS.throughput;
    assertValid(validateVolumeSize(rootSize, profile.minimumRootVolumeGb));
    assertValid(validateGp3Volume(iops, throughput));

    return [
        {
            deviceName: profile.rootDeviceName,
            volume: autoscaling.BlockDeviceVolume.ebs(rootSize, {
                volumeType: autoscaling.EbsDeviceVolumeType.GP3,
                encrypted: EBS_DEFAULTS.encrypted,
                deleteOnTermination: true,
                iops,
                throughput,
            }),
        },
    ];
}

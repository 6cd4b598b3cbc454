/**
 * @format
 * Operating System Catalogue
 *
 * Supported instance operating systems and the facts every module derives
 * from them: naming code, image family, root device and minimum root size.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';

import { LINUX_ROOT_VOLUME_GB, WINDOWS_ROOT_VOLUME_GB } from './defaults';

/**
 * Supported operating systems.
 */
export enum OperatingSystem {
    AMAZON_LINUX_2023 = 'amazon-linux-2023',
    UBUNTU_2204 = 'ubuntu-22.04',
    WINDOWS_2022 = 'windows-2022',
}

/**
 * Per-OS facts.
 */
export interface OperatingSystemProfile {
    /** Three-letter code used in instance names */
    readonly code: string;
    /** CDK image family */
    readonly osType: ec2.OperatingSystemType;
    /** Root block device name */
    readonly rootDeviceName: string;
    /** Smallest root volume the public image accepts, in GB */
    readonly minimumRootVolumeGb: number;
    /** Package manager used by user data (Linux only) */
    readonly packageManager?: 'dnf' | 'apt-get';
}

export const OPERATING_SYSTEM_PROFILES: Record<OperatingSystem, OperatingSystemProfile> = {
    [OperatingSystem.AMAZON_LINUX_2023]: {
        code: 'amz',
        osType: ec2.OperatingSystemType.LINUX,
        rootDeviceName: '/dev/xvda',
        minimumRootVolumeGb: LINUX_ROOT_VOLUME_GB,
        packageManager: 'dnf',
    },
    [OperatingSystem.UBUNTU_2204]: {
        code: 'ubu',
        osType: ec2.OperatingSystemType.LINUX,
        rootDeviceName: '/dev/sda1',
        minimumRootVolumeGb: LINUX_ROOT_VOLUME_GB,
        packageManager: 'apt-get',
    },
    [OperatingSystem.WINDOWS_2022]: {
        code: 'win',
        osType: ec2.OperatingSystemType.WINDOWS,
        rootDeviceName: '/dev/sda1',
        minimumRootVolumeGb: WINDOWS_ROOT_VOLUME_GB,
    },
};

/**
 * Look up the profile of an operating system.
 */
export function getOperatingSystemProfile(os: OperatingSystem): OperatingSystemProfile {
    return OPERATING_SYSTEM_PROFILES[os];
}

export function isWindows(os: OperatingSystem): boolean {
    return OPERATING_SYSTEM_PROFILES[os].osType === ec2.OperatingSystemType.WINDOWS;
}

/**
 * Check if a string names a supported operating system
 */
export function isValidOperatingSystem(value: string): value is OperatingSystem {
    const names: string[] = Object.values(OperatingSystem);
    return names.includes(value);
}

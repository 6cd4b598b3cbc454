/**
 * @format
 * Machine Image Resolution
 *
 * Turns a declarative image choice into an `ec2.IMachineImage`:
 * - latest: newest public image for the operating system
 * - ami:    a pinned AMI id
 * - ssm:    an AMI id published to an SSM parameter (e.g. by a golden AMI pipeline)
 *
 * Every variant carries the operating system so user data, root device
 * name and minimum root size stay consistent with the image.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';

import { Construct } from 'constructs';

import { OperatingSystem, getOperatingSystemProfile } from '../../../config/operating-systems';
import { assertValid, validateAmiId } from '../../../utilities/validation';

/** Canonical's public parameter for the current Ubuntu 22.04 amd64 image */
export const UBUNTU_2204_SSM_PARAMETER =
    '/aws/service/canonical/ubuntu/server/22.04/stable/current/amd64/hvm/ebs-gp2/ami-id';

export type MachineImageSpec =
    | { readonly kind: 'latest'; readonly os: OperatingSystem }
    | { readonly kind: 'ami'; readonly os: OperatingSystem; readonly amiId: string }
    | { readonly kind: 'ssm'; readonly os: OperatingSystem; readonly parameterName: string };

/**
 * A fixed AMI id that works in any region it exists in.
 */
export class PinnedMachineImage implements ec2.IMachineImage {
    constructor(
        private readonly amiId: string,
        private readonly osType: ec2.OperatingSystemType,
    ) {
        assertValid(validateAmiId(amiId));
    }

    getImage(_scope: Construct): ec2.MachineImageConfig {
        return {
            imageId: this.amiId,
            osType: this.osType,
            userData: ec2.UserData.forOperatingSystem(this.osType),
        };
    }
}

/**
 * Resolve an image spec into a CDK machine image.
 *
 * @throws Error when a pinned AMI id is malformed
 *
 * @example
 * resolveMachineImage({ kind: 'latest', os: OperatingSystem.UBUNTU_2204 })
 * resolveMachineImage({ kind: 'ami', os: OperatingSystem.AMAZON_LINUX_2023, amiId: 'ami-0abc1234' })
 */
export function resolveMachineImage(spec: MachineImageSpec): ec2.IMachineImage {
    const osType = osTypeOf(spec.os);

    switch (spec.kind) {
        case 'ami':
            return new PinnedMachineImage(spec.amiId, osType);
        case 'ssm':
            return ec2.MachineImage.fromSsmParameter(spec.parameterName, { os: osType });
        case 'latest':
            switch (spec.os) {
                case OperatingSystem.AMAZON_LINUX_2023:
                    return ec2.MachineImage.latestAmazonLinux2023();
                case OperatingSystem.UBUNTU_2204:
                    return ec2.MachineImage.fromSsmParameter(UBUNTU_2204_SSM_PARAMETER, { os: osType });
                case OperatingSystem.WINDOWS_2022:
                    return ec2.MachineImage.latestWindows(ec2.WindowsVersion.WINDOWS_SERVER_2022_ENGLISH_FULL_BASE);
            }
    }
}

/**
 * Image spec from an optional pinned AMI id.
 */
export function machineImageSpec(os: OperatingSystem, amiId?: string): MachineImageSpec {
    return amiId ? { kind: 'ami', os, amiId } : { kind: 'latest', os };
}

export function osTypeOf(os: OperatingSystem): ec2.OperatingSystemType {
    return getOperatingSystemProfile(os).osType;
}

export function rootDeviceName(os: OperatingSystem): string {
    return getOperatingSystemProfile(os).rootDeviceName;
}

export function minimumRootVolumeGb(os: OperatingSystem): number {
    return getOperatingSystemProfile(os).minimumRootVolumeGb;
}

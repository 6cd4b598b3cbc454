/**
 * @format
 * EC2 Instance Stack
 *
 * Standalone EC2 instances built from the instance project configuration.
 * Consumes the security group, role and log group of ComputeBaseStack.
 *
 * Instances are named `{provider}-{os}-{env}-{purpose}-{NN}` and spread
 * round-robin across the VPC's availability zones.
 *
 * @example
 * ```typescript
 * new Ec2InstanceStack(app, 'Ec2Instance-Compute-production', {
 *     env: cdkEnvironment(Environment.PRODUCTION),
 *     targetEnvironment: Environment.PRODUCTION,
 *     config: getInstanceConfig(Environment.PRODUCTION),
 *     vpc: baseStack.vpc,
 *     securityGroup: baseStack.securityGroup,
 *     role: baseStack.role,
 *     logGroup: baseStack.logGroup,
 *     namePrefix: 'instance-production',
 * });
 * ```
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { UserDataBuilder } from '../../common/compute/builders/user-data-builder';
import { Ec2InstanceConstruct } from '../../common/compute/constructs/ec2-instance';
import { machineImageSpec, resolveMachineImage } from '../../common/compute/constructs/machine-image';
import { EBS_DEFAULTS } from '../../config/defaults';
import { Environment } from '../../config/environments';
import { InstanceConfig } from '../../config/instance/configurations';
import { getOperatingSystemProfile } from '../../config/operating-systems';
import { instanceName } from '../../utilities/naming';

import { subnetSelectionFor } from './base-stack';

// =============================================================================
// PROPS
// =============================================================================

export interface Ec2InstanceStackProps extends cdk.StackProps {
    readonly targetEnvironment: Environment;
    readonly config: InstanceConfig;
    readonly vpc: ec2.IVpc;
    readonly securityGroup: ec2.ISecurityGroup;
    /** Role shared by every instance */
    readonly role: iam.IRole;
    /** Destination of forwarded logs; the role must already have write access */
    readonly logGroup: logs.ILogGroup;
    /** @default 'ec2' */
    readonly namePrefix?: string;
}

// =============================================================================
// STACK
// =============================================================================

export class Ec2InstanceStack extends cdk.Stack {
    /** Instances in index order */
    public readonly instances: Ec2InstanceConstruct[] = [];

    constructor(scope: Construct, id: string, props: Ec2InstanceStackProps) {
        super(scope, id, props);

        const { config, targetEnvironment } = props;
        const namePrefix = props.namePrefix ?? 'ec2';
        const profile = getOperatingSystemProfile(config.os);
        const machineImage = resolveMachineImage(machineImageSpec(config.os, config.amiId));
        const imageId = machineImage.getImage(this).imageId;
        const zones = props.vpc.availabilityZones;
        const isPublic = config.network.subnetType === 'public';
        const forwardLogs = config.forwardLogs && profile.packageManager !== undefined;
        const usedZones = zones.slice(0, Math.min(config.instanceCount, zones.length));

        for (let i = 0; i < config.instanceCount; i++) {
            const index = i + 1;
            const name = instanceName({
                os: config.os,
                environment: targetEnvironment,
                purpose: config.purpose,
                index,
            });
            const suffix = String(index).padStart(2, '0');

            // =================================================================
            // User Data (Linux only)
            // =================================================================
            let userData: ec2.UserData | undefined;
            if (forwardLogs && profile.packageManager) {
                userData = ec2.UserData.forLinux();
                new UserDataBuilder(userData, { packageManager: profile.packageManager })
                    .installCloudWatchAgent({ logGroupName: props.logGroup.logGroupName })
                    .addCompletionMarker();
            }

            const instance = new Ec2InstanceConstruct(this, `Instance${suffix}`, {
                vpc: props.vpc,
                securityGroup: props.securityGroup,
                os: config.os,
                machineImage,
                instanceType: new ec2.InstanceType(config.instanceType),
                instanceName: name,
                role: props.role,
                keyPairName: config.keyPairName,
                rootVolume: { sizeGb: config.rootVolumeSizeGb },
                additionalVolumes: config.additionalVolumes,
                detailedMonitoring: config.detailedMonitoring,
                userData,
                namePrefix,
                subnetSelection: subnetSelectionFor(config.network.subnetType),
                availabilityZone: zones.length > 0 ? zones[i % zones.length] : undefined,
                // false keeps the subnet default (the default VPC maps public IPs)
                associatePublicIpAddress: isPublic && config.associatePublicIp ? true : undefined,
                terminationProtection: config.terminationProtection,
                autoRecovery: config.autoRecovery,
                logGroup: props.logGroup,
            });
            this.instances.push(instance);

            // =================================================================
            // Outputs
            // =================================================================
            new cdk.CfnOutput(this, `Instance${suffix}Id`, {
                value: instance.instance.instanceId,
                description: `${name} instance ID`,
            });

            new cdk.CfnOutput(this, `Instance${suffix}PrivateIp`, {
                value: instance.instance.instancePrivateIp,
                description: `${name} private IP address`,
            });

            if (isPublic && config.associatePublicIp) {
                new cdk.CfnOutput(this, `Instance${suffix}PublicIp`, {
                    value: instance.instance.instancePublicIp,
                    description: `${name} public IP address`,
                });
            }

            new cdk.CfnOutput(this, `Instance${suffix}Type`, {
                value: config.instanceType,
                description: `${name} instance type`,
            });

            new cdk.CfnOutput(this, `Instance${suffix}AmiId`, {
                value: imageId,
                description: `${name} AMI ID`,
            });
        }

        new cdk.CfnOutput(this, 'TerminationProtection', {
            value: String(config.terminationProtection),
            description: 'Whether API termination is disabled',
        });

        new cdk.CfnOutput(this, 'AutoRecovery', {
            value: String(config.autoRecovery),
            description: 'Whether instances recover on system status check failure',
        });

        new cdk.CfnOutput(this, 'RootVolume', {
            value: `${config.rootVolumeSizeGb ?? profile.minimumRootVolumeGb} GiB ${EBS_DEFAULTS.volumeType}`,
            description: 'Root volume size and type',
        });

        new cdk.CfnOutput(this, 'DetailedMonitoring', {
            value: String(config.detailedMonitoring),
            description: 'Whether 1-minute CloudWatch metrics are enabled',
        });

        // Windows images carry no agent install in user data
        new cdk.CfnOutput(this, 'LogForwarding', {
            value: String(forwardLogs),
            description: 'Whether the CloudWatch agent forwards instance logs',
        });

        new cdk.CfnOutput(this, 'AvailabilityZones', {
            value: usedZones.length > 0 ? usedZones.join(', ') : 'subnet default',
            description: 'Availability zones the instances are placed in',
        });

        cdk.Tags.of(this).add('Stack', 'Ec2Instance');
        cdk.Tags.of(this).add('Layer', 'Compute');
    }
}

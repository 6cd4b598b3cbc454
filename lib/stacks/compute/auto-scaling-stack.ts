/**
 * @format
 * Auto Scaling Stack
 *
 * Auto Scaling fleet built from the autoscaling project configuration.
 * Consumes the security group, instance profile and log group of
 * ComputeBaseStack.
 *
 * Blueprint Pattern Flow:
 * 1. ComputeBaseStack creates the security group, role and instance profile
 * 2. This stack creates LaunchTemplateConstruct (source 'launchTemplate')
 *    or describes the instances directly (source 'instance')
 * 3. AutoScalingGroupConstruct, with a mixed instances policy when spot is set
 * 4. User data is completed after the group exists so cfn-signal can
 *    reference the group's logical id
 */

import * as autoscaling from 'aws-cdk-lib/aws-autoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { UserDataBuilder } from '../../common/compute/builders/user-data-builder';
import {
    AutoScalingGroupConstruct,
    FleetInstanceSource,
    SpotDistribution,
} from '../../common/compute/constructs/auto-scaling-group';
import { buildFleetBlockDevices } from '../../common/compute/constructs/block-devices';
import { LaunchTemplateConstruct } from '../../common/compute/constructs/launch-template';
import { machineImageSpec, resolveMachineImage } from '../../common/compute/constructs/machine-image';
import { AutoScalingConfig } from '../../config/autoscaling/configurations';
import { SpotAllocation, SpotConfig } from '../../config/compute';
import { Environment } from '../../config/environments';
import { getOperatingSystemProfile } from '../../config/operating-systems';
import { instanceName } from '../../utilities/naming';

import { subnetSelectionFor } from './base-stack';

const SPOT_ALLOCATION_STRATEGIES: Record<SpotAllocation, autoscaling.SpotAllocationStrategy> = {
    'lowest-price': autoscaling.SpotAllocationStrategy.LOWEST_PRICE,
    'capacity-optimized': autoscaling.SpotAllocationStrategy.CAPACITY_OPTIMIZED,
    'price-capacity-optimized': autoscaling.SpotAllocationStrategy.PRICE_CAPACITY_OPTIMIZED,
};

// =============================================================================
// PROPS
// =============================================================================

export interface AutoScalingStackProps extends cdk.StackProps {
    readonly targetEnvironment: Environment;
    readonly config: AutoScalingConfig;
    readonly vpc: ec2.IVpc;
    readonly securityGroup: ec2.ISecurityGroup;
    /** Instance profile for launch template fleets */
    readonly instanceProfile: iam.IInstanceProfile;
    /** Role for fleets described directly on the group */
    readonly role: iam.IRole;
    /** Destination of forwarded logs; the role must already have write access */
    readonly logGroup: logs.ILogGroup;
    /** @default 'ec2' */
    readonly namePrefix?: string;
}

// =============================================================================
// STACK
// =============================================================================

export class AutoScalingStack extends cdk.Stack {
    public readonly autoScalingGroup: AutoScalingGroupConstruct;

    /** Present for source 'launchTemplate' */
    public readonly launchTemplate?: LaunchTemplateConstruct;

    /** Value of the Name tag carried by fleet instances */
    public readonly instanceName: string;

    constructor(scope: Construct, id: string, props: AutoScalingStackProps) {
        super(scope, id, props);

        const { config, targetEnvironment } = props;
        const namePrefix = props.namePrefix ?? 'ec2';
        const profile = getOperatingSystemProfile(config.os);
        const machineImage = resolveMachineImage(machineImageSpec(config.os, config.amiId));
        const instanceType = new ec2.InstanceType(config.instanceType);

        this.instanceName = instanceName({
            os: config.os,
            environment: targetEnvironment,
            purpose: config.purpose,
        });

        // Commands are appended after the group exists
        const needsUserData = profile.packageManager !== undefined && (config.forwardLogs || config.useSignals);
        const userData = needsUserData ? ec2.UserData.forLinux() : undefined;

        // =====================================================================
        // Instance Source
        // =====================================================================
        let source: FleetInstanceSource;
        if (config.source === 'launchTemplate') {
            this.launchTemplate = new LaunchTemplateConstruct(this, 'LaunchTemplate', {
                securityGroup: props.securityGroup,
                os: config.os,
                machineImage,
                instanceType,
                rootVolume: { sizeGb: config.rootVolumeSizeGb },
                keyPairName: config.keyPairName,
                detailedMonitoring: config.detailedMonitoring,
                userData,
                instanceProfile: props.instanceProfile,
                logGroup: props.logGroup,
                namePrefix,
            });
            source = { kind: 'launchTemplate', launchTemplate: this.launchTemplate.launchTemplate };
        } else {
            source = {
                kind: 'instance',
                instanceType,
                machineImage,
                securityGroup: props.securityGroup,
                role: props.role,
                userData,
                blockDevices: buildFleetBlockDevices(config.os, { sizeGb: config.rootVolumeSizeGb }),
                keyPairName: config.keyPairName,
                detailedMonitoring: config.detailedMonitoring,
            };
        }

        // =====================================================================
        // Auto Scaling Group
        // =====================================================================
        this.autoScalingGroup = new AutoScalingGroupConstruct(this, 'AutoScalingGroup', {
            vpc: props.vpc,
            source,
            minCapacity: config.minCapacity,
            maxCapacity: config.maxCapacity,
            desiredCapacity: config.desiredCapacity,
            scalingPolicy: config.scaling,
            disableScalingPolicy: config.scaling === undefined,
            healthCheckGracePeriodSeconds: config.healthCheckGracePeriodSeconds,
            spot: config.spot ? spotDistribution(config.spot, instanceType) : undefined,
            namePrefix,
            subnetSelection: subnetSelectionFor(config.network.subnetType),
            useSignals: config.useSignals,
            enableTerminationLifecycleHook: config.enableTerminationLifecycleHook,
        });

        cdk.Tags.of(this.autoScalingGroup.autoScalingGroup).add('Name', this.instanceName, {
            applyToLaunchedInstances: true,
        });

        // =====================================================================
        // User Data
        // =====================================================================
        if (userData && profile.packageManager) {
            const builder = new UserDataBuilder(userData, { packageManager: profile.packageManager });
            if (config.forwardLogs) {
                builder.installCloudWatchAgent({ logGroupName: props.logGroup.logGroupName });
            }
            if (config.useSignals) {
                builder.sendCfnSignal({
                    stackName: this.stackName,
                    resourceLogicalId: this.autoScalingGroup.logicalId,
                    region: this.region,
                });
            }
            builder.addCompletionMarker();
        }

        cdk.Tags.of(this).add('Stack', 'AutoScaling');
        cdk.Tags.of(this).add('Layer', 'Compute');

        // =====================================================================
        // Stack Outputs
        // =====================================================================
        new cdk.CfnOutput(this, 'AutoScalingGroupName', {
            value: this.autoScalingGroup.autoScalingGroup.autoScalingGroupName,
            description: 'Auto Scaling group name',
        });

        if (this.launchTemplate) {
            new cdk.CfnOutput(this, 'LaunchTemplateId', {
                value: this.launchTemplate.launchTemplate.launchTemplateId ?? '',
                description: 'Launch template ID',
            });
        }

        new cdk.CfnOutput(this, 'NotificationTopicArn', {
            value: this.autoScalingGroup.notificationTopic.topicArn,
            description: 'SNS topic for scaling notifications',
        });

        new cdk.CfnOutput(this, 'SpotEnabled', {
            value: String(config.spot !== undefined),
            description: 'Whether the fleet mixes in spot capacity',
        });

        if (config.spot) {
            new cdk.CfnOutput(this, 'OnDemandBaseCapacity', {
                value: String(config.spot.onDemandBaseCapacity),
                description: 'Instances that always run on-demand when spot capacity is reclaimed',
            });
        }
    }
}

/**
 * Spot distribution from configuration. The configured instance type
 * takes priority; overrides follow in order.
 */
export function spotDistribution(spot: SpotConfig, primary: ec2.InstanceType): SpotDistribution {
    return {
        onDemandBaseCapacity: spot.onDemandBaseCapacity,
        onDemandPercentageAboveBase: spot.onDemandPercentageAboveBase,
        allocationStrategy: SPOT_ALLOCATION_STRATEGIES[spot.allocationStrategy],
        instanceTypes: [primary, ...spot.instanceTypeOverrides.map((type) => new ec2.InstanceType(type))],
        maxPrice: spot.maxPrice,
    };
}

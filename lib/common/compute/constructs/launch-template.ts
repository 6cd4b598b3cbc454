/**
 * @format
 * Launch Template Construct
 *
 * Reusable Launch Template construct: a pure blueprint for launch template creation.
 * ONLY accepts SecurityGroup from the stack. No internal security group creation.
 *
 * Features:
 * - IMDSv2 required
 * - Encrypted GP3 root and data volumes with configurable IOPS/throughput
 * - Instance profile, role (created or supplied) and key pair
 * - CloudWatch log group for instance logs
 * - Optional spot market options for single-type fleets
 *
 * Blueprint Pattern Flow:
 * 1. Stack creates InstanceSecurityGroupConstruct → securityGroup
 * 2. Stack creates LaunchTemplateConstruct (with securityGroup) → launchTemplate
 * 3. Stack creates AutoScalingGroupConstruct (with launchTemplate) → autoScalingGroup
 *
 * Tag strategy:
 * Only `Component: LaunchTemplate` is applied here. Organizational tags
 * (Environment, Project, Owner, ManagedBy) come from TaggingAspect at app level.
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { VolumeConfig } from '../../../config/compute';
import { DEFAULT_INSTANCE_TYPE, INSTANCE_DEFAULTS } from '../../../config/defaults';
import { OperatingSystem } from '../../../config/operating-systems';
import { InstanceRoleConstruct } from '../../iam/instance-role';

import { RootVolumeOptions, buildBlockDevices } from './block-devices';
import { resolveMachineImage } from './machine-image';

/**
 * Spot request settings carried by the launch template itself.
 * Not compatible with a mixed instances policy on the group.
 */
export interface LaunchTemplateSpotOptions {
    /** Maximum hourly price in USD @default on-demand price */
    readonly maxPrice?: number;
}

/**
 * Props for LaunchTemplateConstruct
 */
export interface LaunchTemplateConstructProps {
    /** Security group for the instances (REQUIRED) */
    readonly securityGroup: ec2.ISecurityGroup;

    /** Operating system of the image */
    readonly os: OperatingSystem;

    /** @default latest public image for `os` */
    readonly machineImage?: ec2.IMachineImage;

    /** @default t3.micro */
    readonly instanceType?: ec2.InstanceType;

    /** Root volume settings @default OS minimum size, GP3 baseline */
    readonly rootVolume?: RootVolumeOptions;

    /** Additional EBS data volumes @default [] */
    readonly additionalVolumes?: readonly VolumeConfig[];

    /** SSH key pair name @default undefined */
    readonly keyPairName?: string;

    /** Enable detailed CloudWatch monitoring @default true */
    readonly detailedMonitoring?: boolean;

    /** User data to run on instance launch @default the image's default user data */
    readonly userData?: ec2.UserData;

    /**
     * Instance profile to launch with. Its role becomes `instanceRole`.
     * Mutually exclusive with `role`.
     */
    readonly instanceProfile?: iam.IInstanceProfile;

    /**
     * Existing IAM role to attach.
     * @default creates a role with Session Manager and CloudWatch agent policies
     */
    readonly role?: iam.IRole;

    /**
     * Existing log group. The caller grants write access.
     * @default a log group named `/ec2/{namePrefix}/instances`
     */
    readonly logGroup?: logs.ILogGroup;

    /** KMS key for log group encryption @default undefined (AWS-managed key) */
    readonly logGroupKmsKey?: kms.IKey;

    /** Log retention period @default ONE_MONTH */
    readonly logRetention?: logs.RetentionDays;

    /** Request spot capacity for every launch @default on-demand */
    readonly spotOptions?: LaunchTemplateSpotOptions;

    /**
     * Name prefix for resources. Should be environment-aware
     * (e.g. 'autoscaling-development').
     * @default 'ec2'
     */
    readonly namePrefix?: string;
}

/**
 * Reusable Launch Template construct for EC2 fleets.
 *
 * @example
 * ```typescript
 * const lt = new LaunchTemplateConstruct(this, 'LT', {
 *     securityGroup: sg.securityGroup,
 *     os: OperatingSystem.UBUNTU_2204,
 *     instanceType: new ec2.InstanceType('t3.small'),
 *     namePrefix: 'autoscaling-staging',
 * });
 * ```
 */
export class LaunchTemplateConstruct extends Construct {
    /** The Launch Template */
    public readonly launchTemplate: ec2.LaunchTemplate;

    /** IAM role attached to instances */
    public readonly instanceRole: iam.IRole;

    /** CloudWatch log group for instance logs */
    public readonly logGroup: logs.ILogGroup;

    constructor(scope: Construct, id: string, props: LaunchTemplateConstructProps) {
        super(scope, id);

        const namePrefix = props.namePrefix ?? 'ec2';

        if (props.instanceProfile && props.role) {
            throw new Error('Launch template accepts either instanceProfile or role, not both');
        }
        if (props.instanceProfile && !props.instanceProfile.role) {
            throw new Error('Launch template instanceProfile must carry a role');
        }

        // =================================================================
        // CLOUDWATCH LOG GROUP
        // =================================================================
        this.logGroup = props.logGroup ?? new logs.LogGroup(this, 'LogGroup', {
            logGroupName: `/ec2/${namePrefix}/instances`,
            retention: props.logRetention ?? INSTANCE_DEFAULTS.logRetention,
            encryptionKey: props.logGroupKmsKey,
            removalPolicy: cdk.RemovalPolicy.DESTROY,
        });

        // =================================================================
        // IAM ROLE
        // =================================================================
        this.instanceRole = props.instanceProfile?.role
            ?? props.role
            ?? new InstanceRoleConstruct(this, 'InstanceRole', { namePrefix }).role;

        if (!props.logGroup) {
            this.logGroup.grantWrite(this.instanceRole);
        }

        // =================================================================
        // LAUNCH TEMPLATE
        // =================================================================
        this.launchTemplate = new ec2.LaunchTemplate(this, 'LaunchTemplate', {
            launchTemplateName: `${namePrefix}-lt`,
            instanceType: props.instanceType ?? new ec2.InstanceType(DEFAULT_INSTANCE_TYPE),
            machineImage: props.machineImage ?? resolveMachineImage({ kind: 'latest', os: props.os }),
            securityGroup: props.securityGroup,
            ...(props.instanceProfile
                ? { instanceProfile: props.instanceProfile }
                : { role: this.instanceRole }),
            keyPair: props.keyPairName
                ? ec2.KeyPair.fromKeyPairName(this, 'KeyPair', props.keyPairName)
                : undefined,
            blockDevices: buildBlockDevices(props.os, props.rootVolume, props.additionalVolumes),
            detailedMonitoring: props.detailedMonitoring ?? INSTANCE_DEFAULTS.detailedMonitoring,
            requireImdsv2: true,
            // undefined falls back to the image's default user data
            userData: props.userData,
            spotOptions: props.spotOptions
                ? {
                    requestType: ec2.SpotRequestType.ONE_TIME,
                    maxPrice: props.spotOptions.maxPrice,
                }
                : undefined,
        });

        cdk.Tags.of(this.launchTemplate).add('Component', 'LaunchTemplate');
    }

    // =========================================================================
    // GRANT HELPERS
    // =========================================================================

    /**
     * Add an IAM policy statement to the instance role.
     * Works on both created and imported roles.
     */
    addToRolePolicy(statement: iam.PolicyStatement): void {
        this.instanceRole.addToPrincipalPolicy(statement);
    }
}

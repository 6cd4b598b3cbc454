/**
 * @format
 * EC2 Instance Construct
 *
 * Reusable EC2 instance construct with CloudWatch logs, IMDSv2,
 * encrypted volumes and optional auto-recovery.
 *
 * Design decisions:
 * - Default subnet: PRIVATE_WITH_EGRESS (consumers opt into PUBLIC)
 * - Role: pass one from InstanceRoleConstruct, or one is created with
 *   Session Manager and CloudWatch agent policies
 * - namePrefix should include the environment (e.g. 'instance-development')
 *   to prevent log group collisions in single-account multi-env setups
 * - Root device name and minimum size follow the operating system
 */

import * as cloudwatch from 'aws-cdk-lib/aws-cloudwatch';
import * as cw_actions from 'aws-cdk-lib/aws-cloudwatch-actions';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { VolumeConfig } from '../../../config/compute';
import { DEFAULT_INSTANCE_TYPE, INSTANCE_DEFAULTS } from '../../../config/defaults';
import { OperatingSystem, getOperatingSystemProfile } from '../../../config/operating-systems';
import { assertValid, validateInstanceThroughput } from '../../../utilities/validation';
import { InstanceRoleConstruct } from '../../iam/instance-role';

import { RootVolumeOptions, buildBlockDevices } from './block-devices';
import { resolveMachineImage } from './machine-image';

/**
 * Props for Ec2InstanceConstruct
 */
export interface Ec2InstanceConstructProps {
    /** The VPC where the EC2 instance will be launched */
    readonly vpc: ec2.IVpc;

    /** Security group for the instance */
    readonly securityGroup: ec2.ISecurityGroup;

    /** Operating system of the image */
    readonly os: OperatingSystem;

    /** @default latest public image for `os` */
    readonly machineImage?: ec2.IMachineImage;

    /** @default t3.micro */
    readonly instanceType?: ec2.InstanceType;

    /**
     * Instance name (Name tag), e.g. 'aws-amz-prd-web-01'.
     * @default `${namePrefix}-instance`
     */
    readonly instanceName?: string;

    /**
     * Instance role. Must be assumable by ec2.amazonaws.com.
     * @default a role with AmazonSSMManagedInstanceCore and CloudWatchAgentServerPolicy
     */
    readonly role?: iam.IRole;

    /** SSH key pair name @default undefined (Session Manager only) */
    readonly keyPairName?: string;

    /**
     * Root volume settings. Throughput stays at the GP3 baseline; use
     * LaunchTemplateConstruct for more.
     * @default OS minimum size, GP3 baseline
     */
    readonly rootVolume?: RootVolumeOptions;

    /** Additional EBS data volumes, baseline throughput only @default [] */
    readonly additionalVolumes?: readonly VolumeConfig[];

    /** Enable detailed CloudWatch monitoring @default true */
    readonly detailedMonitoring?: boolean;

    /** User data script @default the image's default user data */
    readonly userData?: ec2.UserData;

    /**
     * Name prefix for resources (should include environment).
     * @default 'ec2'
     */
    readonly namePrefix?: string;

    /** @default PRIVATE_WITH_EGRESS subnets */
    readonly subnetSelection?: ec2.SubnetSelection;

    /** Pin the instance to one availability zone of the selected subnets */
    readonly availabilityZone?: string;

    /**
     * Associate a public IP address. Only effective in a public subnet.
     * @default undefined (subnet default applies)
     */
    readonly associatePublicIpAddress?: boolean;

    /** Block termination through the API and console @default false */
    readonly terminationProtection?: boolean;

    /**
     * Recover the instance onto new hardware when the system status
     * check fails.
     * @default false
     */
    readonly autoRecovery?: boolean;

    /**
     * Existing log group. The caller grants write access; pass one together
     * with a role owned by another stack.
     * @default a log group named `/ec2/{namePrefix}/{instanceName}`
     */
    readonly logGroup?: logs.ILogGroup;

    /** @default ONE_MONTH */
    readonly logRetention?: logs.RetentionDays;

    /** KMS key for CloudWatch log group encryption @default AWS-managed */
    readonly logGroupEncryptionKey?: kms.IKey;

    /** Removal policy for the log group @default DESTROY */
    readonly removalPolicy?: cdk.RemovalPolicy;
}

/**
 * Reusable EC2 instance construct.
 *
 * Features:
 * - CloudWatch log group with write grant for the instance role
 * - Encrypted GP3 root volume and optional data volumes
 * - IMDSv2 required
 * - Detailed monitoring enabled by default
 * - Optional termination protection and auto-recovery alarm
 *
 * @example
 * ```typescript
 * const web = new Ec2InstanceConstruct(this, 'Web01', {
 *     vpc,
 *     securityGroup,
 *     os: OperatingSystem.AMAZON_LINUX_2023,
 *     instanceName: 'aws-amz-prd-web-01',
 *     namePrefix: 'instance-production',
 *     autoRecovery: true,
 * });
 * ```
 */
export class Ec2InstanceConstruct extends Construct {
    /** The EC2 instance */
    public readonly instance: ec2.Instance;

    /** IAM role attached to the instance */
    public readonly instanceRole: iam.IRole;

    /** CloudWatch log group for instance logs */
    public readonly logGroup: logs.ILogGroup;

    /** Auto-recovery alarm (when enabled) */
    public readonly recoveryAlarm?: cloudwatch.Alarm;

    /** Value of the Name tag */
    public readonly instanceName: string;

    constructor(scope: Construct, id: string, props: Ec2InstanceConstructProps) {
        super(scope, id);

        const namePrefix = props.namePrefix ?? 'ec2';
        this.instanceName = props.instanceName ?? `${namePrefix}-instance`;

        // The instance block device mapping has no throughput property
        const rootDevice = getOperatingSystemProfile(props.os).rootDeviceName;
        assertValid(validateInstanceThroughput(rootDevice, props.rootVolume?.throughput));
        for (const volume of props.additionalVolumes ?? []) {
            assertValid(validateInstanceThroughput(volume.deviceName, volume.throughput));
        }

        // =================================================================
        // CloudWatch Log Group
        // =================================================================
        this.logGroup = props.logGroup ?? new logs.LogGroup(this, 'LogGroup', {
            logGroupName: `/ec2/${namePrefix}/${this.instanceName}`,
            retention: props.logRetention ?? INSTANCE_DEFAULTS.logRetention,
            removalPolicy: props.removalPolicy ?? cdk.RemovalPolicy.DESTROY,
            encryptionKey: props.logGroupEncryptionKey,
        });

        // =================================================================
        // IAM Role
        // =================================================================
        this.instanceRole = props.role ?? new InstanceRoleConstruct(this, 'InstanceRole', { namePrefix }).role;
        if (!props.logGroup) {
            this.logGroup.grantWrite(this.instanceRole);
        }

        // =================================================================
        // EC2 Instance
        // =================================================================
        this.instance = new ec2.Instance(this, 'Instance', {
            vpc: props.vpc,
            instanceType: props.instanceType ?? new ec2.InstanceType(DEFAULT_INSTANCE_TYPE),
            machineImage: props.machineImage ?? resolveMachineImage({ kind: 'latest', os: props.os }),
            securityGroup: props.securityGroup,
            role: this.instanceRole,
            vpcSubnets: props.subnetSelection ?? {
                subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
            },
            availabilityZone: props.availabilityZone,
            associatePublicIpAddress: props.associatePublicIpAddress,
            keyPair: props.keyPairName
                ? ec2.KeyPair.fromKeyPairName(this, 'KeyPair', props.keyPairName)
                : undefined,
            blockDevices: buildBlockDevices(props.os, props.rootVolume, props.additionalVolumes),
            detailedMonitoring: props.detailedMonitoring ?? INSTANCE_DEFAULTS.detailedMonitoring,
            requireImdsv2: true,
            instanceName: this.instanceName,
            userData: props.userData,
        });

        if (props.terminationProtection) {
            this.instance.instance.disableApiTermination = true;
        }

        // =================================================================
        // Auto-recovery
        // =================================================================
        if (props.autoRecovery) {
            this.recoveryAlarm = new cloudwatch.Alarm(this, 'RecoveryAlarm', {
                alarmName: `${this.instanceName}-auto-recovery`,
                alarmDescription: `Recover ${this.instanceName} when the system status check fails`,
                metric: new cloudwatch.Metric({
                    namespace: 'AWS/EC2',
                    metricName: 'StatusCheckFailed_System',
                    dimensionsMap: { InstanceId: this.instance.instanceId },
                    statistic: cloudwatch.Stats.MAXIMUM,
                    period: cdk.Duration.minutes(1),
                }),
                threshold: 1,
                comparisonOperator: cloudwatch.ComparisonOperator.GREATER_THAN_OR_EQUAL_TO_THRESHOLD,
                evaluationPeriods: INSTANCE_DEFAULTS.recoveryEvaluationPeriods,
                treatMissingData: cloudwatch.TreatMissingData.MISSING,
            });
            this.recoveryAlarm.addAlarmAction(new cw_actions.Ec2Action(cw_actions.Ec2InstanceAction.RECOVER));
        }

        cdk.Tags.of(this).add('Component', 'Ec2Instance');
    }

    // =====================================================================
    // Grant Helpers
    // =====================================================================

    /**
     * Add an IAM policy statement to the instance role.
     */
    addToRolePolicy(statement: iam.PolicyStatement): void {
        this.instanceRole.addToPrincipalPolicy(statement);
    }
}

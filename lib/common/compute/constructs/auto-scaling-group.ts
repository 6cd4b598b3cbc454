/**
 * @format
 * Auto Scaling Group Construct
 *
 * Reusable Auto Scaling Group construct: a blueprint for ASG creation.
 * Instances are described by one of two sources:
 * - launchTemplate: a LaunchTemplateConstruct (or any ILaunchTemplate) from the stack
 * - instance: instance type, image and role given to the group directly
 *
 * Features:
 * - Capacity validation (min <= desired <= max)
 * - CPU-based target tracking scaling policy
 * - Rolling update policy for safe deployments
 * - Health check grace period configuration
 * - SNS notification topic for scaling events (exposed for subscription)
 * - Optional termination lifecycle hook
 * - Optional spot distribution with on-demand base capacity (launch template source only)
 *
 * Naming convention:
 * The `namePrefix` prop is expected to be environment-aware (e.g.
 * 'autoscaling-development'). It is used in the ASG name, SNS topic name,
 * and lifecycle hook name to prevent collisions across environments.
 *
 * Tag strategy:
 * Only `Component: AutoScalingGroup` is applied here. Organizational tags
 * (Environment, Project, Owner, ManagedBy) come from TaggingAspect at app level.
 */

import * as autoscaling from 'aws-cdk-lib/aws-autoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { AUTO_SCALING_DEFAULTS } from '../../../config/defaults';
import { assertValid, validateCapacity } from '../../../utilities/validation';

/**
 * Scaling policy configuration
 */
export interface ScalingPolicyConfiguration {
    /** Target CPU utilization percentage @default 70 */
    readonly targetCpuUtilization?: number;
    /** Cooldown period in seconds @default 300 */
    readonly cooldownSeconds?: number;
    /** Estimated instance warmup time in seconds @default 300 */
    readonly estimatedInstanceWarmupSeconds?: number;
}

/**
 * Rolling update configuration
 */
export interface RollingUpdateConfiguration {
    /** Maximum batch size for updates @default 1 */
    readonly maxBatchSize?: number;
    /** Minimum instances to keep in service @default minCapacity */
    readonly minInstancesInService?: number;
    /** Pause time between batches @default signals timeout, or 5 minutes without signals */
    readonly pauseTimeMinutes?: number;
}

/**
 * Instances described by a launch template.
 */
export interface LaunchTemplateSource {
    readonly kind: 'launchTemplate';
    readonly launchTemplate: ec2.ILaunchTemplate;
}

/**
 * Instances described directly on the group.
 */
export interface DirectInstanceSource {
    readonly kind: 'instance';
    readonly instanceType: ec2.InstanceType;
    readonly machineImage: ec2.IMachineImage;
    readonly securityGroup?: ec2.ISecurityGroup;
    readonly role?: iam.IRole;
    readonly userData?: ec2.UserData;
    readonly blockDevices?: autoscaling.BlockDevice[];
    readonly keyPairName?: string;
    /** @default true */
    readonly detailedMonitoring?: boolean;
    readonly associatePublicIpAddress?: boolean;
}

export type FleetInstanceSource = LaunchTemplateSource | DirectInstanceSource;

/**
 * Spot distribution. On-demand base capacity is the fallback that stays
 * up when spot capacity is reclaimed.
 */
export interface SpotDistribution {
    /** @default 0 */
    readonly onDemandBaseCapacity?: number;
    /** Percentage of capacity above the base that is on-demand @default 0 */
    readonly onDemandPercentageAboveBase?: number;
    /** @default PRICE_CAPACITY_OPTIMIZED */
    readonly allocationStrategy?: autoscaling.SpotAllocationStrategy;
    /**
     * Instance types the fleet may launch, in priority order.
     * The first entry is normally the launch template's own type.
     */
    readonly instanceTypes: ec2.InstanceType[];
    /** Maximum hourly spot price in USD @default on-demand price */
    readonly maxPrice?: string;
    /** Replace spot instances at elevated interruption risk @default true */
    readonly capacityRebalance?: boolean;
}

/**
 * Props for AutoScalingGroupConstruct
 */
export interface AutoScalingGroupConstructProps {
    /** The VPC where the ASG will be launched */
    readonly vpc: ec2.IVpc;

    /** How instances are described */
    readonly source: FleetInstanceSource;

    /** Minimum capacity @default 1 */
    readonly minCapacity?: number;

    /** Maximum capacity @default 2 */
    readonly maxCapacity?: number;

    /**
     * Desired capacity.
     * CAUTION: Setting this resets the ASG size on every deployment.
     * Leave undefined to let AWS use minCapacity and preserve manual scaling decisions.
     */
    readonly desiredCapacity?: number;

    /** Scaling policy configuration */
    readonly scalingPolicy?: ScalingPolicyConfiguration;

    /** Disable scaling policy @default false */
    readonly disableScalingPolicy?: boolean;

    /** Rolling update configuration */
    readonly rollingUpdate?: RollingUpdateConfiguration;

    /** Health check grace period in seconds @default 300 */
    readonly healthCheckGracePeriodSeconds?: number;

    /** Spot distribution @default on-demand only */
    readonly spot?: SpotDistribution;

    /**
     * Name prefix for resources. Expected to be environment-aware.
     * @default 'ec2'
     */
    readonly namePrefix?: string;

    /** @default PRIVATE_WITH_EGRESS */
    readonly subnetSelection?: ec2.SubnetSelection;

    /** Whether to wait for cfn-signal from new instances @default true */
    readonly useSignals?: boolean;

    /** Signals timeout in minutes @default 10 */
    readonly signalsTimeoutMinutes?: number;

    /** Protect new instances from scale-in @default false */
    readonly newInstancesProtectedFromScaleIn?: boolean;

    /**
     * Pause termination so instance state can be drained or detached.
     * @default false
     */
    readonly enableTerminationLifecycleHook?: boolean;

    /** Termination lifecycle hook timeout in seconds @default 300 */
    readonly terminationLifecycleHookTimeoutSeconds?: number;
}

/**
 * Reusable Auto Scaling Group construct.
 *
 * @example
 * ```typescript
 * const asg = new AutoScalingGroupConstruct(this, 'ASG', {
 *     vpc,
 *     source: { kind: 'launchTemplate', launchTemplate: lt.launchTemplate },
 *     minCapacity: 2,
 *     maxCapacity: 6,
 *     namePrefix: 'autoscaling-production',
 *     spot: {
 *         onDemandBaseCapacity: 2,
 *         onDemandPercentageAboveBase: 50,
 *         instanceTypes: [new ec2.InstanceType('t3.medium'), new ec2.InstanceType('t3a.medium')],
 *     },
 * });
 * ```
 */
export class AutoScalingGroupConstruct extends Construct {
    /** The Auto Scaling Group */
    public readonly autoScalingGroup: autoscaling.AutoScalingGroup;

    /**
     * SNS topic for ASG scaling notifications.
     * Exposed so consuming stacks can add subscriptions.
     */
    public readonly notificationTopic: sns.Topic;

    /** Termination lifecycle hook (when enabled) */
    public readonly terminationHook?: autoscaling.LifecycleHook;

    constructor(scope: Construct, id: string, props: AutoScalingGroupConstructProps) {
        super(scope, id);

        const namePrefix = props.namePrefix ?? 'ec2';
        const minCapacity = props.minCapacity ?? AUTO_SCALING_DEFAULTS.minCapacity;
        const maxCapacity = props.maxCapacity ?? AUTO_SCALING_DEFAULTS.maxCapacity;
        // desiredCapacity is intentionally NOT defaulted; setting it resets the ASG on every deploy
        const desiredCapacity = props.desiredCapacity;
        const useSignals = props.useSignals ?? true;

        // =================================================================
        // INPUT VALIDATION
        // =================================================================
        assertValid(validateCapacity(minCapacity, maxCapacity, desiredCapacity));

        if (props.spot && props.source.kind !== 'launchTemplate') {
            throw new Error('Spot distribution requires a launch template source');
        }
        if (props.spot) {
            validateSpotDistribution(props.spot, maxCapacity);
        }

        const rollingUpdate = props.rollingUpdate ?? {};
        const maxBatchSize = rollingUpdate.maxBatchSize ?? 1;
        const minInstancesInService = rollingUpdate.minInstancesInService ?? minCapacity;
        // CloudFormation waits PauseTime for signals during rolling updates
        const signalsTimeoutMinutes = props.signalsTimeoutMinutes ?? AUTO_SCALING_DEFAULTS.signalsTimeoutMinutes;
        const pauseTimeMinutes = rollingUpdate.pauseTimeMinutes ?? (useSignals ? signalsTimeoutMinutes : 5);

        // =================================================================
        // SNS Topic for Scaling Notifications (AwsSolutions-AS3)
        // =================================================================
        this.notificationTopic = new sns.Topic(this, 'ScalingNotifications', {
            topicName: `${namePrefix}-asg-scaling-notifications`,
            displayName: `${namePrefix} ASG Scaling Notifications`,
            enforceSSL: true,
            masterKey: kms.Alias.fromAliasName(this, 'SnsEncryptionKey', 'alias/aws/sns'),
        });

        // =================================================================
        // AUTO SCALING GROUP
        // =================================================================
        this.autoScalingGroup = new autoscaling.AutoScalingGroup(this, 'AutoScalingGroup', {
            autoScalingGroupName: `${namePrefix}-asg`,
            vpc: props.vpc,
            ...this.sourceProps(props.source, props.spot),
            minCapacity,
            maxCapacity,
            ...(desiredCapacity !== undefined && { desiredCapacity }),
            vpcSubnets: props.subnetSelection ?? {
                subnetType: ec2.SubnetType.PRIVATE_WITH_EGRESS,
            },
            healthChecks: autoscaling.HealthChecks.ec2({
                gracePeriod: cdk.Duration.seconds(
                    props.healthCheckGracePeriodSeconds ?? AUTO_SCALING_DEFAULTS.healthCheckGracePeriodSeconds,
                ),
            }),
            updatePolicy: autoscaling.UpdatePolicy.rollingUpdate({
                maxBatchSize,
                minInstancesInService,
                pauseTime: cdk.Duration.minutes(pauseTimeMinutes),
            }),
            signals: useSignals
                ? autoscaling.Signals.waitForMinCapacity({
                    timeout: cdk.Duration.minutes(signalsTimeoutMinutes),
                })
                : undefined,
            newInstancesProtectedFromScaleIn: props.newInstancesProtectedFromScaleIn ?? false,
            notifications: [
                {
                    topic: this.notificationTopic,
                    scalingEvents: autoscaling.ScalingEvents.ALL,
                },
            ],
        });

        if (!props.disableScalingPolicy) {
            this.configureScalingPolicy(props.scalingPolicy);
        }

        // =================================================================
        // Termination Lifecycle Hook
        //
        // CONTINUE: if nothing completes the action within the timeout,
        // the instance terminates anyway.
        // =================================================================
        if (props.enableTerminationLifecycleHook) {
            this.terminationHook = this.autoScalingGroup.addLifecycleHook('TerminationHook', {
                lifecycleHookName: `${namePrefix}-termination-hook`,
                lifecycleTransition: autoscaling.LifecycleTransition.INSTANCE_TERMINATING,
                heartbeatTimeout: cdk.Duration.seconds(
                    props.terminationLifecycleHookTimeoutSeconds ?? 300,
                ),
                defaultResult: autoscaling.DefaultResult.CONTINUE,
            });
        }

        cdk.Tags.of(this.autoScalingGroup).add('Component', 'AutoScalingGroup');
    }

    /**
     * Logical id of the group, for cfn-signal in user data.
     */
    get logicalId(): string {
        const cfnGroup = this.autoScalingGroup.node.defaultChild;
        if (!(cfnGroup instanceof cdk.CfnResource)) {
            throw new Error('Auto Scaling group has no CloudFormation resource');
        }
        return cdk.Stack.of(this).getLogicalId(cfnGroup);
    }

    /**
     * Group props that describe the instances.
     * A mixed instances policy replaces the plain launch template reference.
     */
    private sourceProps(
        source: FleetInstanceSource,
        spot?: SpotDistribution,
    ): Partial<autoscaling.AutoScalingGroupProps> {
        if (source.kind === 'instance') {
            return {
                instanceType: source.instanceType,
                machineImage: source.machineImage,
                securityGroup: source.securityGroup,
                role: source.role,
                userData: source.userData,
                blockDevices: source.blockDevices,
                keyPair: source.keyPairName
                    ? ec2.KeyPair.fromKeyPairName(this, 'KeyPair', source.keyPairName)
                    : undefined,
                instanceMonitoring: (source.detailedMonitoring ?? true)
                    ? autoscaling.Monitoring.DETAILED
                    : autoscaling.Monitoring.BASIC,
                associatePublicIpAddress: source.associatePublicIpAddress,
                requireImdsv2: true,
            };
        }

        if (!spot) {
            return { launchTemplate: source.launchTemplate };
        }

        return {
            mixedInstancesPolicy: {
                launchTemplate: source.launchTemplate,
                instancesDistribution: {
                    onDemandAllocationStrategy: autoscaling.OnDemandAllocationStrategy.PRIORITIZED,
                    onDemandBaseCapacity: spot.onDemandBaseCapacity ?? 0,
                    onDemandPercentageAboveBaseCapacity: spot.onDemandPercentageAboveBase ?? 0,
                    spotAllocationStrategy:
                        spot.allocationStrategy ?? autoscaling.SpotAllocationStrategy.PRICE_CAPACITY_OPTIMIZED,
                    spotMaxPrice: spot.maxPrice,
                },
                launchTemplateOverrides: spot.instanceTypes.map((instanceType) => ({ instanceType })),
            },
            capacityRebalance: spot.capacityRebalance ?? true,
        };
    }

    /**
     * Configures target tracking scaling policy based on CPU utilization
     */
    private configureScalingPolicy(config?: ScalingPolicyConfiguration): void {
        const targetCpu = config?.targetCpuUtilization ?? AUTO_SCALING_DEFAULTS.targetCpuUtilization;
        const cooldown = config?.cooldownSeconds ?? 300;
        const warmup = config?.estimatedInstanceWarmupSeconds ?? 300;

        this.autoScalingGroup.scaleOnCpuUtilization('CpuScalingPolicy', {
            targetUtilizationPercent: targetCpu,
            cooldown: cdk.Duration.seconds(cooldown),
            estimatedInstanceWarmup: cdk.Duration.seconds(warmup),
        });
    }
}

function validateSpotDistribution(spot: SpotDistribution, maxCapacity: number): void {
    const base = spot.onDemandBaseCapacity ?? 0;
    const percentage = spot.onDemandPercentageAboveBase ?? 0;

    if (!Number.isInteger(base) || base < 0 || base > maxCapacity) {
        throw new Error(
            `Spot onDemandBaseCapacity (${base}) must be an integer between 0 and maxCapacity (${maxCapacity})`,
        );
    }
    if (percentage < 0 || percentage > 100) {
        throw new Error(`Spot onDemandPercentageAboveBase (${percentage}) must be 0-100`);
    }
    if (spot.instanceTypes.length === 0) {
        throw new Error('Spot distribution needs at least one instance type');
    }
}

/**
 * @format
 * Auto Scaling Group Construct Unit Tests
 */

import { Template } from 'aws-cdk-lib/assertions';
import * as autoscaling from 'aws-cdk-lib/aws-autoscaling';
import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import {
    AutoScalingGroupConstruct,
    AutoScalingGroupConstructProps,
    FleetInstanceSource,
} from '../../../../lib/common/compute/constructs/auto-scaling-group';
import { LaunchTemplateConstruct } from '../../../../lib/common/compute/constructs/launch-template';
import { OperatingSystem } from '../../../../lib/config/operating-systems';
import { Match, TEST_ENV, createMockVpcWithSg, createTestApp } from '../../../fixtures';

interface Setup {
    readonly stack: cdk.Stack;
    readonly vpc: ec2.IVpc;
    readonly securityGroup: ec2.ISecurityGroup;
    readonly launchTemplateSource: FleetInstanceSource;
}

function setup(): Setup {
    const stack = new cdk.Stack(createTestApp(), 'TestStack', { env: TEST_ENV });
    const { vpc, securityGroup } = createMockVpcWithSg(stack);
    const lt = new LaunchTemplateConstruct(stack, 'LaunchTemplate', {
        securityGroup,
        os: OperatingSystem.AMAZON_LINUX_2023,
    });
    return { stack, vpc, securityGroup, launchTemplateSource: { kind: 'launchTemplate', launchTemplate: lt.launchTemplate } };
}

function build(props: Partial<AutoScalingGroupConstructProps> = {}): {
    construct: AutoScalingGroupConstruct;
    template: Template;
    stack: cdk.Stack;
} {
    const { stack, vpc, launchTemplateSource } = setup();
    const construct = new AutoScalingGroupConstruct(stack, 'Fleet', { vpc, source: launchTemplateSource, ...props });
    return { construct, template: Template.fromStack(stack), stack };
}

describe('AutoScalingGroupConstruct', () => {
    describe('defaults', () => {
        const { construct, template } = build();

        it('should size the group 1-2 without a desired capacity', () => {
            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                AutoScalingGroupName: 'ec2-asg',
                MinSize: '1',
                MaxSize: '2',
                DesiredCapacity: Match.absent(),
                HealthCheckType: 'EC2',
                HealthCheckGracePeriod: 300,
            });
        });

        it('should wait for signals and roll one instance at a time', () => {
            template.hasResource('AWS::AutoScaling::AutoScalingGroup', {
                CreationPolicy: { ResourceSignal: { Count: 1, Timeout: 'PT10M' } },
                UpdatePolicy: {
                    AutoScalingRollingUpdate: Match.objectLike({
                        MaxBatchSize: 1,
                        MinInstancesInService: 1,
                        PauseTime: 'PT10M',
                        WaitOnResourceSignals: true,
                    }),
                },
            });
        });

        it('should track 70% CPU', () => {
            template.hasResourceProperties('AWS::AutoScaling::ScalingPolicy', {
                PolicyType: 'TargetTrackingScaling',
                EstimatedInstanceWarmup: 300,
                TargetTrackingConfiguration: {
                    PredefinedMetricSpecification: { PredefinedMetricType: 'ASGAverageCPUUtilization' },
                    TargetValue: 70,
                },
            });
        });

        it('should notify an SNS topic of scaling events', () => {
            template.hasResourceProperties('AWS::SNS::Topic', {
                TopicName: 'ec2-asg-scaling-notifications',
                DisplayName: 'ec2 ASG Scaling Notifications',
            });
            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                NotificationConfigurations: [
                    Match.objectLike({ TopicARN: { Ref: Match.stringLikeRegexp('^FleetScalingNotifications') } }),
                ],
            });
        });

        it('should reference the launch template', () => {
            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                LaunchTemplate: Match.objectLike({ LaunchTemplateId: Match.anyValue() }),
                MixedInstancesPolicy: Match.absent(),
            });
        });

        it('should expose the logical id of the group', () => {
            const groups = template.findResources('AWS::AutoScaling::AutoScalingGroup');
            expect(Object.keys(groups)).toEqual([construct.logicalId]);
            expect(construct.logicalId).toMatch(/^FleetAutoScalingGroup/);
        });

        it('should not add a lifecycle hook', () => {
            expect(construct.terminationHook).toBeUndefined();
            template.resourceCountIs('AWS::AutoScaling::LifecycleHook', 0);
        });
    });

    describe('options', () => {
        it('should set desired capacity and prefix names', () => {
            const { template } = build({ minCapacity: 2, maxCapacity: 6, desiredCapacity: 3, namePrefix: 'autoscaling-production' });

            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                AutoScalingGroupName: 'autoscaling-production-asg',
                MinSize: '2',
                MaxSize: '6',
                DesiredCapacity: '3',
            });
        });

        it('should skip signals and pause five minutes when signals are off', () => {
            const { template } = build({ useSignals: false });
            const [group] = Object.values(template.findResources('AWS::AutoScaling::AutoScalingGroup'));

            expect(group.CreationPolicy).toBeUndefined();
            expect(group.UpdatePolicy.AutoScalingRollingUpdate.PauseTime).toBe('PT5M');
        });

        it('should omit the scaling policy when disabled', () => {
            const { template } = build({ disableScalingPolicy: true });
            template.resourceCountIs('AWS::AutoScaling::ScalingPolicy', 0);
        });

        it('should apply a custom CPU target', () => {
            const { template } = build({ scalingPolicy: { targetCpuUtilization: 55, estimatedInstanceWarmupSeconds: 120 } });

            template.hasResourceProperties('AWS::AutoScaling::ScalingPolicy', {
                EstimatedInstanceWarmup: 120,
                TargetTrackingConfiguration: Match.objectLike({ TargetValue: 55 }),
            });
        });

        it('should pause terminations with a lifecycle hook', () => {
            const { construct, template } = build({ enableTerminationLifecycleHook: true });

            expect(construct.terminationHook).toBeDefined();
            template.hasResourceProperties('AWS::AutoScaling::LifecycleHook', {
                LifecycleHookName: 'ec2-termination-hook',
                LifecycleTransition: 'autoscaling:EC2_INSTANCE_TERMINATING',
                HeartbeatTimeout: 300,
                DefaultResult: 'CONTINUE',
            });
        });

        it('should reject invalid capacity', () => {
            expect(() => build({ minCapacity: 3, maxCapacity: 2 })).toThrow(
                'ASG capacity invalid: minCapacity (3) cannot exceed maxCapacity (2)',
            );
        });
    });

    describe('spot distribution', () => {
        const spot = {
            onDemandBaseCapacity: 1,
            onDemandPercentageAboveBase: 25,
            allocationStrategy: autoscaling.SpotAllocationStrategy.CAPACITY_OPTIMIZED,
            instanceTypes: [new ec2.InstanceType('t3.micro'), new ec2.InstanceType('t3a.micro')],
        };

        it('should use a prioritized mixed instances policy with capacity rebalance', () => {
            const { template } = build({ maxCapacity: 4, spot });

            template.hasResourceProperties('AWS::AutoScaling::AutoScalingGroup', {
                CapacityRebalance: true,
                LaunchTemplate: Match.absent(),
                MixedInstancesPolicy: {
                    InstancesDistribution: {
                        OnDemandAllocationStrategy: 'prioritized',
                        OnDemandBaseCapacity: 1,
                        OnDemandPercentageAboveBaseCapacity: 25,
                        SpotAllocationStrategy: 'capacity-optimized',
                    },
                    LaunchTemplate: {
                        LaunchTemplateSpecification: Match.anyValue(),
                        Overrides: [{ InstanceType: 't3.micro' }, { InstanceType: 't3a.micro' }],
                    },
                },
            });
        });

        it('should require a launch template source', () => {
            const { stack, vpc } = setup();
            const source: FleetInstanceSource = {
                kind: 'instance',
                instanceType: new ec2.InstanceType('t3.micro'),
                machineImage: ec2.MachineImage.latestAmazonLinux2023(),
            };

            expect(() => new AutoScalingGroupConstruct(stack, 'Fleet', { vpc, source, spot })).toThrow(
                'Spot distribution requires a launch template source',
            );
        });

        it('should reject a base above maxCapacity', () => {
            expect(() => build({ maxCapacity: 2, spot: { ...spot, onDemandBaseCapacity: 3 } })).toThrow(
                'Spot onDemandBaseCapacity (3) must be an integer between 0 and maxCapacity (2)',
            );
        });

        it('should require instance types', () => {
            expect(() => build({ spot: { ...spot, instanceTypes: [] } })).toThrow(
                'Spot distribution needs at least one instance type',
            );
        });
    });

    describe('direct instance source', () => {
        it('should generate a launch template from the group props', () => {
            const { stack, vpc, securityGroup } = setup();
            new AutoScalingGroupConstruct(stack, 'Fleet', {
                vpc,
                useSignals: false,
                source: {
                    kind: 'instance',
                    instanceType: new ec2.InstanceType('t3.small'),
                    machineImage: ec2.MachineImage.latestAmazonLinux2023(),
                    securityGroup,
                },
            });
            const template = Template.fromStack(stack);

            template.resourceCountIs('AWS::EC2::LaunchTemplate', 2);
            template.hasResourceProperties('AWS::EC2::LaunchTemplate', {
                LaunchTemplateData: Match.objectLike({ InstanceType: 't3.small' }),
            });
        });
    });
});

/**
 * @format
 * Instance Role Construct Unit Tests
 */

import { Template } from 'aws-cdk-lib/assertions';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as cdk from 'aws-cdk-lib/core';

import {
    CLOUDWATCH_AGENT_POLICY,
    InstanceRoleConstruct,
    SSM_MANAGED_POLICY,
} from '../../../../lib/common/iam/instance-role';
import { Match, TEST_ENV, createMockRole, createTestApp } from '../../../fixtures';

function managedPolicyArn(name: string): Record<string, unknown> {
    return {
        'Fn::Join': ['', ['arn:', { Ref: 'AWS::Partition' }, `:iam::aws:policy/${name}`]],
    };
}

describe('InstanceRoleConstruct', () => {
    let stack: cdk.Stack;

    beforeEach(() => {
        stack = new cdk.Stack(createTestApp(), 'TestStack', { env: TEST_ENV });
    });

    it('should create an EC2-assumable role with SSM and CloudWatch agent policies', () => {
        const construct = new InstanceRoleConstruct(stack, 'Role', { namePrefix: 'instance-production' });
        const template = Template.fromStack(stack);

        expect(construct.managedPolicyNames).toEqual([SSM_MANAGED_POLICY, CLOUDWATCH_AGENT_POLICY]);
        template.hasResourceProperties('AWS::IAM::Role', {
            AssumeRolePolicyDocument: {
                Statement: [
                    Match.objectLike({
                        Action: 'sts:AssumeRole',
                        Principal: { Service: 'ec2.amazonaws.com' },
                    }),
                ],
            },
            Description: 'IAM role for instance-production EC2 instances',
            ManagedPolicyArns: [
                managedPolicyArn('AmazonSSMManagedInstanceCore'),
                managedPolicyArn('CloudWatchAgentServerPolicy'),
            ],
        });
    });

    it('should leave out the CloudWatch agent policy when disabled', () => {
        const construct = new InstanceRoleConstruct(stack, 'Role', {
            enableCloudWatchAgent: false,
            additionalManagedPolicyNames: ['AmazonS3ReadOnlyAccess'],
        });

        expect(construct.managedPolicyNames).toEqual(['AmazonSSMManagedInstanceCore', 'AmazonS3ReadOnlyAccess']);
    });

    it('should create an instance profile on request', () => {
        const construct = new InstanceRoleConstruct(stack, 'Role', { createInstanceProfile: true });
        const template = Template.fromStack(stack);

        expect(construct.instanceProfile).toBeDefined();
        template.resourceCountIs('AWS::IAM::InstanceProfile', 1);
    });

    it('should not create an instance profile by default', () => {
        const construct = new InstanceRoleConstruct(stack, 'Role');

        expect(construct.instanceProfile).toBeUndefined();
        Template.fromStack(stack).resourceCountIs('AWS::IAM::InstanceProfile', 0);
    });

    it('should wrap an existing role without creating another', () => {
        const existing = createMockRole(stack);
        const construct = new InstanceRoleConstruct(stack, 'Role', {
            existingRole: existing,
            inlineStatements: [new iam.PolicyStatement({ actions: ['s3:GetObject'], resources: ['*'] })],
        });
        const template = Template.fromStack(stack);

        expect(construct.role).toBe(existing);
        expect(construct.managedPolicyNames).toEqual([]);
        template.resourceCountIs('AWS::IAM::Role', 1);
        template.hasResourceProperties('AWS::IAM::Policy', {
            PolicyDocument: {
                Statement: [Match.objectLike({ Action: 's3:GetObject', Effect: 'Allow', Resource: '*' })],
            },
        });
    });

    it('should grant SSM parameter reads under a path', () => {
        const construct = new InstanceRoleConstruct(stack, 'Role');
        construct.grantSsmParameterRead('/instance/production/*');

        Template.fromStack(stack).hasResourceProperties('AWS::IAM::Policy', {
            PolicyDocument: {
                Statement: [
                    Match.objectLike({
                        Sid: 'SsmParameterReadInstanceProduction',
                        Action: ['ssm:GetParameter', 'ssm:GetParameters', 'ssm:GetParametersByPath'],
                        Resource: {
                            'Fn::Join': [
                                '',
                                ['arn:', { Ref: 'AWS::Partition' }, ':ssm:us-east-1:123456789012:parameter/instance/production/*'],
                            ],
                        },
                    }),
                ],
            },
        });
    });

    it('should give each granted path its own statement Sid', () => {
        const construct = new InstanceRoleConstruct(stack, 'Role');
        construct.grantSsmParameterRead('/instance/production/*');
        construct.grantSsmParameterRead('/shared/app-config');

        const policies = Object.values(Template.fromStack(stack).findResources('AWS::IAM::Policy'));
        expect(policies).toHaveLength(1);
        const statements: Array<{ Sid?: string }> = policies[0].Properties.PolicyDocument.Statement;
        expect(statements.map((statement) => statement.Sid)).toEqual([
            'SsmParameterReadInstanceProduction',
            'SsmParameterReadSharedAppConfig',
        ]);
    });

    it('should tag the component', () => {
        new InstanceRoleConstruct(stack, 'Role');

        Template.fromStack(stack).hasResourceProperties('AWS::IAM::Role', {
            Tags: Match.arrayWith([Match.objectLike({ Key: 'Component', Value: 'InstanceRole' })]),
        });
    });
});

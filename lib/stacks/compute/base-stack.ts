/**
 * @format
 * Compute Base Stack: Long-Lived Infrastructure
 *
 * Shared, rarely-changing resources for EC2 instances and fleets.
 * Decoupled from the compute layer so AMI, instance type or user data
 * changes do NOT trigger a CloudFormation update on these resources.
 *
 * Resources Created:
 *   - VPC Lookup (by id, by Name tag, or the account's default VPC)
 *   - Security Group (application ingress + optional SSH/RDP from trusted CIDRs)
 *   - IAM Role + Instance Profile (Session Manager, CloudWatch agent)
 *   - CloudWatch Log Group (forwarded instance logs)
 *
 * @example
 * ```typescript
 * const baseStack = new ComputeBaseStack(app, 'Ec2Instance-Base-development', {
 *     env: cdkEnvironment(Environment.DEVELOPMENT),
 *     targetEnvironment: Environment.DEVELOPMENT,
 *     os: OperatingSystem.AMAZON_LINUX_2023,
 *     network: config.network,
 *     access: config.access,
 *     namePrefix: 'instance-development',
 *     logRetentionDays: 7,
 * });
 * ```
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

import { InstanceRoleConstruct } from '../../common/iam/instance-role';
import { InstanceSecurityGroupConstruct, RemoteAccessProtocol } from '../../common/security/security-group';
import { AccessConfig, NetworkConfig } from '../../config/compute';
import { Environment, environmentRemovalPolicy } from '../../config/environments';
import { OperatingSystem, isWindows } from '../../config/operating-systems';
import { toRetentionDays } from '../../utilities/validation';

// =============================================================================
// PROPS
// =============================================================================

/**
 * Props for ComputeBaseStack
 */
export interface ComputeBaseStackProps extends cdk.StackProps {
    /** Target deployment environment */
    readonly targetEnvironment: Environment;

    /** Operating system; selects SSH or RDP for remote access */
    readonly os: OperatingSystem;

    /** VPC placement */
    readonly network: NetworkConfig;

    /** Ingress, remote access and egress settings */
    readonly access: AccessConfig;

    /**
     * VPC to use instead of a lookup (tests, or a VPC created in the same app).
     * @default looked up from `network`
     */
    readonly vpc?: ec2.IVpc;

    /** Name prefix for resources @default 'ec2' */
    readonly namePrefix?: string;

    /** Retention of the shared log group in days @default 30 */
    readonly logRetentionDays?: number;

    /** Attach CloudWatchAgentServerPolicy to the role @default true */
    readonly enableCloudWatchAgent?: boolean;
}

// =============================================================================
// STACK
// =============================================================================

/**
 * Compute Base Stack.
 *
 * Owns the network lookup, security group, instance role and log group
 * consumed by Ec2InstanceStack and AutoScalingStack.
 */
export class ComputeBaseStack extends cdk.Stack {
    /** The resolved VPC */
    public readonly vpc: ec2.IVpc;

    /** Security group construct for instances */
    public readonly securityGroupConstruct: InstanceSecurityGroupConstruct;

    /** Security group for instances */
    public readonly securityGroup: ec2.ISecurityGroup;

    /** Instance IAM role */
    public readonly role: iam.IRole;

    /** Instance profile wrapping `role` */
    public readonly instanceProfile: iam.InstanceProfile;

    /** Log group the CloudWatch agent forwards to */
    public readonly logGroup: logs.LogGroup;

    constructor(scope: Construct, id: string, props: ComputeBaseStackProps) {
        super(scope, id, props);

        const namePrefix = props.namePrefix ?? 'ec2';

        // =====================================================================
        // VPC Lookup
        // =====================================================================
        this.vpc = props.vpc ?? lookupVpc(this, props.network);

        // =====================================================================
        // Security Group
        // =====================================================================
        const remoteAccess: RemoteAccessProtocol | undefined = props.access.allowRemoteAccess
            ? (isWindows(props.os) ? 'rdp' : 'ssh')
            : undefined;

        this.securityGroupConstruct = new InstanceSecurityGroupConstruct(this, 'SecurityGroup', {
            vpc: this.vpc,
            namePrefix,
            description: `Security group for ${namePrefix} instances`,
            ingressRules: props.access.ingressRules,
            remoteAccess,
            trustedCidrs: props.access.trustedCidrs,
            restrictEgress: props.access.restrictEgress,
        });
        this.securityGroup = this.securityGroupConstruct.securityGroup;

        // =====================================================================
        // IAM Role + Instance Profile
        // =====================================================================
        const roleConstruct = new InstanceRoleConstruct(this, 'InstanceRole', {
            namePrefix,
            enableCloudWatchAgent: props.enableCloudWatchAgent ?? true,
            createInstanceProfile: true,
        });
        this.role = roleConstruct.role;
        if (!roleConstruct.instanceProfile) {
            throw new Error('Instance role construct did not create an instance profile');
        }
        this.instanceProfile = roleConstruct.instanceProfile;

        // =====================================================================
        // CloudWatch Log Group
        // =====================================================================
        this.logGroup = new logs.LogGroup(this, 'LogGroup', {
            logGroupName: `/ec2/${namePrefix}`,
            retention: toRetentionDays(props.logRetentionDays ?? 30),
            removalPolicy: environmentRemovalPolicy(props.targetEnvironment),
        });
        this.logGroup.grantWrite(this.role);

        cdk.Tags.of(this).add('Stack', 'ComputeBase');
        cdk.Tags.of(this).add('Layer', 'Base');

        // =====================================================================
        // Stack Outputs
        // =====================================================================
        new cdk.CfnOutput(this, 'VpcId', {
            value: this.vpc.vpcId,
            description: 'VPC ID',
        });

        new cdk.CfnOutput(this, 'SecurityGroupId', {
            value: this.securityGroup.securityGroupId,
            description: 'Instance security group ID',
        });

        new cdk.CfnOutput(this, 'InstanceRoleName', {
            value: this.role.roleName,
            description: 'Instance IAM role name',
        });

        new cdk.CfnOutput(this, 'InstanceRoleArn', {
            value: this.role.roleArn,
            description: 'Instance IAM role ARN',
        });

        new cdk.CfnOutput(this, 'InstanceProfileName', {
            value: this.instanceProfile.instanceProfileName,
            description: 'Instance profile name',
        });

        new cdk.CfnOutput(this, 'LogGroupName', {
            value: this.logGroup.logGroupName,
            description: 'CloudWatch log group for forwarded instance logs',
        });

        new cdk.CfnOutput(this, 'LogRetentionDays', {
            value: String(props.logRetentionDays ?? 30),
            description: 'Log group retention in days',
        });

        const ingress = this.securityGroupConstruct.ingressRules;
        new cdk.CfnOutput(this, 'IngressRules', {
            value: ingress.length > 0
                ? ingress.map((rule) => `${rule.protocol}/${rule.ports} from ${rule.source}`).join('; ')
                : 'none',
            description: 'Instance security group ingress rules',
        });

        new cdk.CfnOutput(this, 'ManagedPolicies', {
            value: roleConstruct.managedPolicyNames.join(', '),
            description: 'AWS-managed policies attached to the instance role',
        });
    }
}

/**
 * Look up a VPC by id, then by Name tag, then fall back to the default VPC.
 */
function lookupVpc(scope: Construct, network: NetworkConfig): ec2.IVpc {
    if (network.vpcId) {
        return ec2.Vpc.fromLookup(scope, 'Vpc', { vpcId: network.vpcId });
    }
    if (network.vpcName) {
        return ec2.Vpc.fromLookup(scope, 'Vpc', { vpcName: network.vpcName });
    }
    return ec2.Vpc.fromLookup(scope, 'Vpc', { isDefault: true });
}

/**
 * Subnet selection for a configured subnet tier.
 */
export function subnetSelectionFor(subnetType: NetworkConfig['subnetType']): ec2.SubnetSelection {
    return {
        subnetType: subnetType === 'public' ? ec2.SubnetType.PUBLIC : ec2.SubnetType.PRIVATE_WITH_EGRESS,
    };
}

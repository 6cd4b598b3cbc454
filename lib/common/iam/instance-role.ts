/**
 * @format
 * Instance Role Construct
 *
 * EC2-assumable IAM role (or a wrapped existing role) with an optional
 * instance profile. Session Manager access is always granted so instances
 * can be reached without opening a management port.
 *
 * No explicit roleName: CDK auto-generates unique names, which avoids
 * global IAM collisions when several environments share an account.
 */

import * as iam from 'aws-cdk-lib/aws-iam';
import * as cdk from 'aws-cdk-lib/core';

import { Construct } from 'constructs';

export const SSM_MANAGED_POLICY = 'AmazonSSMManagedInstanceCore';
export const CLOUDWATCH_AGENT_POLICY = 'CloudWatchAgentServerPolicy';

/**
 * Props for InstanceRoleConstruct
 */
export interface InstanceRoleConstructProps {
    /**
     * Existing role to use instead of creating one.
     * Managed policies are not attached to an existing role; inline
     * statements and grants are.
     * @default creates a new role
     */
    readonly existingRole?: iam.IRole;

    /** Attach CloudWatchAgentServerPolicy @default true */
    readonly enableCloudWatchAgent?: boolean;

    /** AWS-managed policy names attached in addition to the defaults */
    readonly additionalManagedPolicyNames?: string[];

    /** Inline statements added to the role's default policy */
    readonly inlineStatements?: iam.PolicyStatement[];

    /** Create an instance profile for launch templates @default false */
    readonly createInstanceProfile?: boolean;

    /** @default 'ec2' */
    readonly namePrefix?: string;
}

/**
 * IAM role for EC2 instances and fleets.
 *
 * @example
 * ```typescript
 * const role = new InstanceRoleConstruct(this, 'Role', {
 *     namePrefix: 'instance-production',
 *     createInstanceProfile: true,
 * });
 * role.grantSsmParameterRead('/instance/production/*');
 * ```
 */
export class InstanceRoleConstruct extends Construct {
    /** The role used by instances */
    public readonly role: iam.IRole;

    /** Instance profile wrapping the role (when requested) */
    public readonly instanceProfile?: iam.InstanceProfile;

    /** AWS-managed policy names attached to a created role */
    public readonly managedPolicyNames: readonly string[];

    constructor(scope: Construct, id: string, props: InstanceRoleConstructProps = {}) {
        super(scope, id);

        const namePrefix = props.namePrefix ?? 'ec2';

        if (props.existingRole) {
            this.role = props.existingRole;
            this.managedPolicyNames = [];
        } else {
            this.managedPolicyNames = [
                SSM_MANAGED_POLICY,
                ...((props.enableCloudWatchAgent ?? true) ? [CLOUDWATCH_AGENT_POLICY] : []),
                ...(props.additionalManagedPolicyNames ?? []),
            ];
            this.role = new iam.Role(this, 'Role', {
                assumedBy: new iam.ServicePrincipal('ec2.amazonaws.com'),
                description: `IAM role for ${namePrefix} EC2 instances`,
                managedPolicies: this.managedPolicyNames.map((name) =>
                    iam.ManagedPolicy.fromAwsManagedPolicyName(name),
                ),
            });
        }

        for (const statement of props.inlineStatements ?? []) {
            this.addToRolePolicy(statement);
        }

        if (props.createInstanceProfile) {
            this.instanceProfile = new iam.InstanceProfile(this, 'InstanceProfile', {
                role: this.role,
            });
        }

        cdk.Tags.of(this).add('Component', 'InstanceRole');
    }

    /**
     * Add an IAM policy statement to the role.
     * Works on both created and imported roles.
     */
    addToRolePolicy(statement: iam.PolicyStatement): void {
        this.role.addToPrincipalPolicy(statement);
    }

    /**
     * Grant read access to SSM parameters under the given path.
     * The statement Sid carries the path, so each path gets its own.
     *
     * @param parameterPath - SSM path prefix (e.g. '/instance/production/*')
     */
    grantSsmParameterRead(parameterPath: string): void {
        this.addToRolePolicy(new iam.PolicyStatement({
            sid: `SsmParameterRead${pathSid(parameterPath)}`,
            effect: iam.Effect.ALLOW,
            actions: [
                'ssm:GetParameter',
                'ssm:GetParameters',
                'ssm:GetParametersByPath',
            ],
            resources: [
                cdk.Arn.format(
                    {
                        service: 'ssm',
                        resource: 'parameter',
                        resourceName: parameterPath.replace(/^\//, ''),
                    },
                    cdk.Stack.of(this),
                ),
            ],
        }));
    }
}

/** '/instance/production/*' -> 'InstanceProduction' (Sids are alphanumeric) */
function pathSid(parameterPath: string): string {
    return parameterPath
        .split(/[^A-Za-z0-9]+/)
        .filter((part) => part.length > 0)
        .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
        .join('');
}

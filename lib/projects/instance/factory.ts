/**
 * @format
 * EC2 Instance Project Factory
 *
 * Stacks created:
 * - Base: VPC lookup, security group, instance role + profile, log group
 * - Compute: standalone instances named `{provider}-{os}-{env}-{purpose}-{NN}`
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import { Environment, cdkEnvironment } from '../../config/environments';
import { InstanceConfig, getInstanceConfig } from '../../config/instance/configurations';
import { Project, getProjectConfig } from '../../config/projects';
import {
    IProjectFactory,
    ProjectFactoryContext,
    ProjectStackFamily,
} from '../../factories/project-interfaces';
import { ComputeBaseStack, Ec2InstanceStack } from '../../stacks/compute';
import { assertValidConfig, validateInstanceConfig } from '../../utilities/config-validation';
import { getStackId, namePrefix } from '../../utilities/naming';

/**
 * Extended factory context with instance-specific overrides.
 */
export interface InstanceFactoryContext extends ProjectFactoryContext {
    /** Replace the environment's configuration (tests, ad-hoc synth) */
    readonly config?: InstanceConfig;
    /** Use this VPC instead of a lookup */
    readonly vpc?: ec2.IVpc;
}

/**
 * Factory for standalone EC2 instances.
 *
 * @example
 * ```typescript
 * const factory = new InstanceProjectFactory(Environment.PRODUCTION);
 * const { stacks } = factory.createAllStacks(app, { environment: Environment.PRODUCTION });
 * ```
 */
export class InstanceProjectFactory implements IProjectFactory<InstanceFactoryContext> {
    public readonly project = Project.INSTANCE;
    public readonly environment: Environment;
    public readonly namespace: string;

    constructor(environment: Environment) {
        this.environment = environment;
        this.namespace = getProjectConfig(Project.INSTANCE).namespace;
    }

    createAllStacks(scope: cdk.App, context: InstanceFactoryContext): ProjectStackFamily {
        const env = context.environment;
        const config = context.config ?? getInstanceConfig(env);
        assertValidConfig('instance', validateInstanceConfig(config, env));

        const prefix = namePrefix(this.project, env);
        const cdkEnv = cdkEnvironment(env);

        // =================================================================
        // Base Stack - network, security group, role, log group
        // =================================================================
        const baseStack = new ComputeBaseStack(scope, getStackId(this.project, 'base', env), {
            env: cdkEnv,
            targetEnvironment: env,
            os: config.os,
            network: config.network,
            access: config.access,
            vpc: context.vpc,
            namePrefix: prefix,
            logRetentionDays: config.logRetentionDays,
            enableCloudWatchAgent: config.forwardLogs,
        });

        // =================================================================
        // Compute Stack - instances
        // =================================================================
        const computeStack = new Ec2InstanceStack(scope, getStackId(this.project, 'compute', env), {
            env: cdkEnv,
            targetEnvironment: env,
            config,
            vpc: baseStack.vpc,
            securityGroup: baseStack.securityGroup,
            role: baseStack.role,
            logGroup: baseStack.logGroup,
            namePrefix: prefix,
        });
        computeStack.addDependency(baseStack);

        console.log(`✅ Instance factory created 2 stacks for ${env} (${config.instanceCount} instance(s))`);

        return {
            stacks: [baseStack, computeStack],
            stackMap: { base: baseStack, compute: computeStack },
        };
    }
}

/**
 * @format
 * Auto Scaling Project Factory
 *
 * Stacks created:
 * - Base: VPC lookup, security group, instance role + profile, log group
 * - Compute: launch template (or direct instance settings) + Auto Scaling group
 */

import * as ec2 from 'aws-cdk-lib/aws-ec2';
import * as cdk from 'aws-cdk-lib/core';

import { AutoScalingConfig, getAutoScalingConfig } from '../../config/autoscaling/configurations';
import { Environment, cdkEnvironment } from '../../config/environments';
import { Project, getProjectConfig } from '../../config/projects';
import {
    IProjectFactory,
    ProjectFactoryContext,
    ProjectStackFamily,
} from '../../factories/project-interfaces';
import { AutoScalingStack, ComputeBaseStack } from '../../stacks/compute';
import { assertValidConfig, validateAutoScalingConfig } from '../../utilities/config-validation';
import { getStackId, namePrefix } from '../../utilities/naming';

/**
 * Extended factory context with fleet-specific overrides.
 */
export interface AutoScalingFactoryContext extends ProjectFactoryContext {
    /** Replace the environment's configuration (tests, ad-hoc synth) */
    readonly config?: AutoScalingConfig;
    /** Use this VPC instead of a lookup */
    readonly vpc?: ec2.IVpc;
}

/**
 * Factory for Auto Scaling fleets.
 */
export class AutoScalingProjectFactory implements IProjectFactory<AutoScalingFactoryContext> {
    public readonly project = Project.AUTOSCALING;
    public readonly environment: Environment;
    public readonly namespace: string;

    constructor(environment: Environment) {
        this.environment = environment;
        this.namespace = getProjectConfig(Project.AUTOSCALING).namespace;
    }

    createAllStacks(scope: cdk.App, context: AutoScalingFactoryContext): ProjectStackFamily {
        const env = context.environment;
        const config = context.config ?? getAutoScalingConfig(env);
        assertValidConfig('autoscaling', validateAutoScalingConfig(config, env));

        const prefix = namePrefix(this.project, env);
        const cdkEnv = cdkEnvironment(env);

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

        const computeStack = new AutoScalingStack(scope, getStackId(this.project, 'compute', env), {
            env: cdkEnv,
            targetEnvironment: env,
            config,
            vpc: baseStack.vpc,
            securityGroup: baseStack.securityGroup,
            instanceProfile: baseStack.instanceProfile,
            role: baseStack.role,
            logGroup: baseStack.logGroup,
            namePrefix: prefix,
        });
        computeStack.addDependency(baseStack);

        const spot = config.spot ? 'spot + on-demand' : 'on-demand';
        console.log(`✅ Auto Scaling factory created 2 stacks for ${env} (${config.source}, ${spot})`);

        return {
            stacks: [baseStack, computeStack],
            stackMap: { base: baseStack, compute: computeStack },
        };
    }
}

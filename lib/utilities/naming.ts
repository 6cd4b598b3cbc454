/**
 * @format
 * Naming Utilities: Single Source of Truth
 *
 * Centralised resource, instance and stack naming conventions.
 *
 * Stack name pattern:    {Namespace}-{Component}-{environment}
 *   e.g. Ec2Instance-Compute-development
 *
 * Instance name pattern: {provider}-{os}-{env}-{purpose}[-{index}]
 *   e.g. aws-amz-prd-web-01
 */

import { MAX_INSTANCE_NAME_LENGTH } from '../config/defaults';
import { Environment, EnvironmentName } from '../config/environments';
import { OperatingSystem, getOperatingSystemProfile } from '../config/operating-systems';
import { Project, getProjectConfig } from '../config/projects';

// =============================================================================
// STACK REGISTRY: Every stack's identity, defined once
// =============================================================================

/**
 * Maps each project's stack keys to their component names.
 *
 * @example
 * STACK_REGISTRY.autoscaling.compute  // → 'Compute'
 * // Full stack name: Ec2Fleet-Compute-development
 */
export const STACK_REGISTRY = {
    instance: {
        base: 'Base',
        compute: 'Compute',
    },
    autoscaling: {
        base: 'Base',
        compute: 'Compute',
    },
} as const;

// =============================================================================
// STACK NAMING FUNCTIONS
// =============================================================================

/**
 * Generate a CDK construct ID / CloudFormation stack name.
 *
 * @example
 * stackId('Ec2Instance', 'Base', 'development')
 * // Returns: 'Ec2Instance-Base-development'
 */
export function stackId(
    namespace: string,
    component: string,
    environment: EnvironmentName,
): string {
    return `${namespace}-${component}-${environment}`;
}

/**
 * Resolve a full stack name from project enum, stack key, and environment.
 *
 * @throws Error if stackKey is not registered for the project
 *
 * @example
 * getStackId(Project.AUTOSCALING, 'compute', 'production')
 * // Returns: 'Ec2Fleet-Compute-production'
 */
export function getStackId(
    project: Project,
    stackKey: string,
    environment: EnvironmentName,
): string {
    const projectRegistry: Record<string, string> = STACK_REGISTRY[project];
    const component = projectRegistry[stackKey];
    if (!Object.hasOwn(projectRegistry, stackKey) || !component) {
        const validKeys = Object.keys(projectRegistry).join(', ');
        throw new Error(
            `Unknown stack key '${stackKey}' for project '${project}'. ` +
            `Valid keys: ${validKeys}`,
        );
    }

    const namespace = getProjectConfig(project).namespace;
    return stackId(namespace, component, environment);
}

// =============================================================================
// INSTANCE NAMING: provider / os / environment / purpose codes
// =============================================================================

/** Cloud provider codes */
export const PROVIDER_CODES = {
    aws: 'aws',
} as const;

export type Provider = keyof typeof PROVIDER_CODES;

/** Environment codes */
export const ENVIRONMENT_CODES: Record<Environment, string> = {
    [Environment.DEVELOPMENT]: 'dev',
    [Environment.STAGING]: 'stg',
    [Environment.PRODUCTION]: 'prd',
};

/** Purpose codes: a lowercase letter followed by 1-9 lowercase letters or digits */
export const PURPOSE_CODE_PATTERN = /^[a-z][a-z0-9]{1,9}$/;

/**
 * Inputs of an instance name
 */
export interface InstanceNameParts {
    /** @default 'aws' */
    readonly provider?: Provider;
    readonly os: OperatingSystem;
    readonly environment: Environment;
    /** Workload code, e.g. 'web', 'db', 'app' */
    readonly purpose: string;
    /** 1-99, rendered as two digits */
    readonly index?: number;
}

/**
 * Compose an instance name from its codes.
 *
 * @throws Error on an invalid purpose code, an index outside 1-99,
 * or a result longer than a hostname label allows
 *
 * @example
 * instanceName({ os: OperatingSystem.WINDOWS_2022, environment: Environment.PRODUCTION, purpose: 'sql', index: 3 })
 * // Returns: 'aws-win-prd-sql-03'
 */
export function instanceName(parts: InstanceNameParts): string {
    if (!PURPOSE_CODE_PATTERN.test(parts.purpose)) {
        throw new Error(
            `Invalid purpose code '${parts.purpose}'. ` +
            `Expected a lowercase letter followed by 1-9 lowercase letters or digits`,
        );
    }

    const segments = [
        PROVIDER_CODES[parts.provider ?? 'aws'],
        getOperatingSystemProfile(parts.os).code,
        ENVIRONMENT_CODES[parts.environment],
        parts.purpose,
    ];

    if (parts.index !== undefined) {
        if (!Number.isInteger(parts.index) || parts.index < 1 || parts.index > 99) {
            throw new Error(`Invalid instance index ${parts.index}. Must be an integer between 1 and 99`);
        }
        segments.push(String(parts.index).padStart(2, '0'));
    }

    const name = segments.join('-');
    if (name.length > MAX_INSTANCE_NAME_LENGTH) {
        throw new Error(`Instance name '${name}' exceeds ${MAX_INSTANCE_NAME_LENGTH} characters`);
    }
    return name;
}

/**
 * Environment-aware name prefix for resources that must not collide
 * across environments in one account (log groups, launch templates, ASGs).
 *
 * @example
 * namePrefix(Project.INSTANCE, Environment.STAGING) // 'instance-staging'
 */
export function namePrefix(project: Project, environment: Environment): string {
    return `${project}-${environment}`;
}

// =============================================================================
// RESOURCE NAMING FUNCTIONS
// =============================================================================

/**
 * Options for resource naming
 */
export interface NamingOptions {
    readonly project?: string;
    readonly environment?: EnvironmentName;
    readonly component?: string;
}

/**
 * Generate a consistent resource name
 *
 * Format: {project}-{component}-{environment}
 *
 * @example
 * resourceName({ project: 'instance', component: 'sg', environment: 'development' })
 * // Returns: 'instance-sg-development'
 */
export function resourceName(options: NamingOptions): string {
    const parts: string[] = [];

    if (options.project) {
        parts.push(options.project);
    }

    if (options.component) {
        parts.push(options.component);
    }

    if (options.environment) {
        parts.push(options.environment);
    }

    return parts.join('-');
}

/**
 * Generate log group name
 *
 * Format: /{project}/{component}/{environment}
 */
export function logGroupName(
    project: string,
    component: string,
    environment?: EnvironmentName,
): string {
    const parts = ['', project, component];
    if (environment) {
        parts.push(environment);
    }
    return parts.join('/');
}

/**
 * Generate CloudFormation export name
 *
 * Format: {project}-{component}-{output}-{environment}
 */
export function exportName(
    project: string,
    component: string,
    output: string,
    environment?: EnvironmentName,
): string {
    const parts = [project, component, output];
    if (environment) {
        parts.push(environment);
    }
    return parts.join('-');
}

/**
 * Describe a CIDR block in human-readable format
 */
export function describeCidr(cidr: string): string {
    if (cidr.endsWith('/32')) {
        return `IP ${cidr.replace('/32', '')}`;
    }
    if (cidr.endsWith('/0')) {
        return 'All IPs (0.0.0.0/0)';
    }
    return `CIDR ${cidr}`;
}

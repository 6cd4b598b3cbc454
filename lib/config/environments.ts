/**
 * @format
 * Environment Configurations
 *
 * Cross-project environment identity: account, region, and shared utilities.
 *
 * Environment values use FULL NAMES (development, staging, production).
 * Short names (dev, prod) are accepted on the command line and mapped.
 *
 * Account and region are read from the process environment at synth time
 * so the same code deploys into any account:
 * - CDK_DEFAULT_ACCOUNT (set by the CDK CLI) or AWS_ACCOUNT_ID
 * - AWS_REGION, then CDK_DEFAULT_REGION, then DEFAULT_REGION
 */

import * as cdk from 'aws-cdk-lib/core';

import { DEFAULT_REGION } from './defaults';

// =============================================================================
// ENVIRONMENT VARIABLE HELPER
// =============================================================================

/**
 * Read a value from process.env at synth time.
 * Returns undefined if the variable is not set or empty.
 */
export function fromEnv(key: string): string | undefined {
    return process.env[key] || undefined;
}

// =============================================================================
// ENVIRONMENT ENUM & RESOLUTION
// =============================================================================

/**
 * Environment enum - centralized definition for all environments.
 *
 * @example
 * // CLI usage:
 * // npx cdk synth -c project=instance -c environment=development
 */
export enum Environment {
    DEVELOPMENT = 'development',
    STAGING = 'staging',
    PRODUCTION = 'production',
}

/**
 * Mapping from short names to full names.
 * Allows: -c environment=dev OR -c environment=development
 */
const SHORT_TO_FULL: Record<string, Environment> = {
    dev: Environment.DEVELOPMENT,
    staging: Environment.STAGING,
    prod: Environment.PRODUCTION,
};

/**
 * String union type derived from the Environment enum.
 */
export type EnvironmentName = `${Environment}`;

// =============================================================================
// CROSS-PROJECT IDENTITY
// =============================================================================

/**
 * Cross-project environment identity.
 */
export interface EnvironmentConfig {
    /** AWS account ID, undefined for environment-agnostic synthesis */
    readonly account?: string;
    /** Primary AWS region */
    readonly region: string;
}

/**
 * Get environment configuration (cross-project identity).
 *
 * Every environment reads the same variables; a CI pipeline selects the
 * account by exporting credentials for the matching environment.
 */
export function getEnvironmentConfig(_env: Environment): EnvironmentConfig {
    return {
        account: fromEnv('CDK_DEFAULT_ACCOUNT') ?? fromEnv('AWS_ACCOUNT_ID'),
        region: fromEnv('AWS_REGION') ?? fromEnv('CDK_DEFAULT_REGION') ?? DEFAULT_REGION,
    };
}

/**
 * Get CDK environment (account + region) for stack props.
 */
export function cdkEnvironment(env: Environment): cdk.Environment {
    const config = getEnvironmentConfig(env);
    return {
        account: config.account,
        region: config.region,
    };
}

// =============================================================================
// ENVIRONMENT UTILITY FUNCTIONS
// =============================================================================

/**
 * Check if an environment is production.
 * Use this instead of inline `env === Environment.PRODUCTION` comparisons.
 */
export function isProductionEnvironment(env: Environment): boolean {
    return env === Environment.PRODUCTION;
}

/**
 * Get the CDK removal policy for an environment.
 * Production retains resources; non-production allows destruction.
 */
export function environmentRemovalPolicy(env: Environment): cdk.RemovalPolicy {
    return env === Environment.PRODUCTION
        ? cdk.RemovalPolicy.RETAIN
        : cdk.RemovalPolicy.DESTROY;
}

/**
 * Check if a value is a full Environment name (not a short alias).
 */
function isFullEnvironmentName(value: string): value is Environment {
    const names: string[] = Object.values(Environment);
    return names.includes(value);
}

/**
 * Resolve environment from context value.
 * Accepts both full names (development, staging, production) and
 * short names (dev, staging, prod).
 *
 * @param contextValue - Value from CDK context or environment variable
 * @returns Resolved Environment enum value
 * @throws Error when the value is neither a full nor a short name
 *
 * @example
 * resolveEnvironment('development') // => Environment.DEVELOPMENT
 * resolveEnvironment('dev')         // => Environment.DEVELOPMENT
 * resolveEnvironment('prod')        // => Environment.PRODUCTION
 */
export function resolveEnvironment(contextValue?: string): Environment {
    const envValue = contextValue ?? fromEnv('ENVIRONMENT') ?? Environment.DEVELOPMENT;

    if (isFullEnvironmentName(envValue)) {
        return envValue;
    }

    if (Object.hasOwn(SHORT_TO_FULL, envValue)) {
        return SHORT_TO_FULL[envValue];
    }

    const accepted = [...Object.values(Environment), ...Object.keys(SHORT_TO_FULL)];
    throw new Error(
        `Unknown environment '${envValue}'. Accepted values: ${[...new Set(accepted)].join(', ')}`,
    );
}

/**
 * Check if a value is a valid Environment (accepts both full and short names)
 */
export function isValidEnvironment(value: string): boolean {
    return isFullEnvironmentName(value) || Object.hasOwn(SHORT_TO_FULL, value);
}

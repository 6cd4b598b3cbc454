/**
 * @format
 * CDK-Nag Compliance Aspect
 *
 * Implements cdk-nag for validating constructs against security and best practice rules.
 * Supports AWS Solutions, HIPAA, NIST 800-53, and PCI DSS rule packs.
 */

import {
    AwsSolutionsChecks,
    HIPAASecurityChecks,
    NIST80053R5Checks,
    PCIDSS321Checks,
    NagSuppressions,
    NagPackSuppression,
} from 'cdk-nag';

import { Aspects, Stack } from 'aws-cdk-lib/core';

import { IConstruct } from 'constructs';

/**
 * Available compliance packs
 */
export enum CompliancePack {
    /** AWS Solutions - General best practices */
    AWS_SOLUTIONS = 'AwsSolutions',
    /** HIPAA Security - Healthcare compliance */
    HIPAA = 'HIPAA',
    /** NIST 800-53 Rev 5 - Federal security */
    NIST_800_53 = 'NIST800-53',
    /** PCI DSS 3.2.1 - Payment card security */
    PCI_DSS = 'PCI-DSS',
}

/**
 * CDK-Nag configuration options
 */
export interface CdkNagConfig {
    /** Which compliance packs to enable */
    readonly packs?: CompliancePack[];
    /** Whether to include verbose logging */
    readonly verbose?: boolean;
    /** Whether to generate compliance reports */
    readonly reports?: boolean;
}

/** Default configuration */
const DEFAULT_CONFIG: Required<CdkNagConfig> = {
    packs: [CompliancePack.AWS_SOLUTIONS],
    verbose: false,
    reports: true,
};

/**
 * Apply cdk-nag compliance checks to a scope.
 *
 * @example
 * ```typescript
 * // Apply AWS Solutions checks to entire app
 * applyCdkNag(app);
 *
 * // Apply multiple packs with verbose logging
 * applyCdkNag(app, {
 *     packs: [CompliancePack.AWS_SOLUTIONS, CompliancePack.NIST_800_53],
 *     verbose: true,
 * });
 * ```
 */
export function applyCdkNag(scope: IConstruct, config: CdkNagConfig = {}): void {
    const packs = config.packs ?? DEFAULT_CONFIG.packs;
    const verbose = config.verbose ?? DEFAULT_CONFIG.verbose;
    const reports = config.reports ?? DEFAULT_CONFIG.reports;

    for (const pack of packs) {
        switch (pack) {
            case CompliancePack.AWS_SOLUTIONS:
                Aspects.of(scope).add(
                    new AwsSolutionsChecks({ verbose, reports })
                );
                break;
            case CompliancePack.HIPAA:
                Aspects.of(scope).add(
                    new HIPAASecurityChecks({ verbose, reports })
                );
                break;
            case CompliancePack.NIST_800_53:
                Aspects.of(scope).add(
                    new NIST80053R5Checks({ verbose, reports })
                );
                break;
            case CompliancePack.PCI_DSS:
                Aspects.of(scope).add(
                    new PCIDSS321Checks({ verbose, reports })
                );
                break;
        }
    }
}

/**
 * Parse a comma-separated list of pack names (e.g. 'AwsSolutions,PCI-DSS').
 *
 * @throws Error on an unknown pack name
 */
export function parseCompliancePacks(value: string): CompliancePack[] {
    const known: string[] = Object.values(CompliancePack);
    const packs: CompliancePack[] = [];

    for (const name of value.split(',').map((part) => part.trim()).filter((part) => part.length > 0)) {
        const pack = Object.values(CompliancePack).find((candidate) => candidate === name);
        if (!pack) {
            throw new Error(`Unknown compliance pack '${name}'. Valid packs: ${known.join(', ')}`);
        }
        if (!packs.includes(pack)) {
            packs.push(pack);
        }
    }

    return packs;
}

/**
 * Documented exceptions for the EC2 compute stacks.
 */
export const COMMON_SUPPRESSIONS: NagPackSuppression[] = [
    {
        id: 'AwsSolutions-EC23',
        reason: 'Web tier accepts HTTPS from 0.0.0.0/0; management ports are limited to trusted CIDRs',
    },
    {
        id: 'AwsSolutions-EC28',
        reason: 'Detailed monitoring is disabled in development for cost',
    },
    {
        id: 'AwsSolutions-EC29',
        reason: 'Termination protection is enabled in production only; ASG-managed instances are replaceable',
    },
    {
        id: 'AwsSolutions-IAM4',
        reason: 'AWS managed policies used for SSM and CloudWatch agent - standard for EC2 instances',
    },
    {
        id: 'AwsSolutions-IAM5',
        reason: 'Log stream and SSM parameter path wildcards are scoped to this project',
    },
];

/**
 * Apply common suppressions to a stack.
 *
 * @example
 * ```typescript
 * applyCommonSuppressions(computeStack);
 * ```
 */
export function applyCommonSuppressions(stack: Stack): void {
    NagSuppressions.addStackSuppressions(stack, COMMON_SUPPRESSIONS);
}

/**
 * @format
 * Tag Composition
 *
 * Builds the tag set every resource carries. Mandatory keys come first
 * in a fixed order; caller-supplied tags follow and may not override them.
 */

import { Environment } from '../config/environments';

/** Keys owned by the tagging policy */
export const MANDATORY_TAG_KEYS = ['Name', 'Environment', 'Project', 'Owner', 'ManagedBy', 'CostCenter'] as const;

/** Tag key / value limits enforced by EC2 */
export const MAX_TAG_KEY_LENGTH = 128;
export const MAX_TAG_VALUE_LENGTH = 256;

/**
 * Tag configuration for resources
 */
export interface TagConfig {
    readonly environment: Environment;
    readonly project: string;
    readonly owner: string;
    readonly costCenter?: string;
    /** Value of the Name tag */
    readonly name?: string;
    /** Extra tags appended after the mandatory set */
    readonly additional?: Record<string, string>;
}

/**
 * Compose the ordered tag record for a resource.
 *
 * @throws Error when an additional tag overrides a mandatory key, uses the
 * reserved `aws:` prefix, or exceeds the EC2 length limits
 *
 * @example
 * buildResourceTags({ environment: Environment.PRODUCTION, project: 'Ec2Instance', owner: 'platform', costCenter: '12345' })
 * // { Environment: 'production', Project: 'Ec2Instance', Owner: 'platform', ManagedBy: 'CDK', CostCenter: '12345' }
 */
export function buildResourceTags(config: TagConfig): Record<string, string> {
    const tags: Record<string, string> = {
        ...(config.name && { Name: config.name }),
        Environment: config.environment,
        Project: config.project,
        Owner: config.owner,
        ManagedBy: 'CDK',
        ...(config.costCenter && { CostCenter: config.costCenter }),
    };

    const mandatory: readonly string[] = MANDATORY_TAG_KEYS;
    for (const [key, value] of Object.entries(config.additional ?? {})) {
        if (mandatory.includes(key)) {
            throw new Error(`Tag '${key}' is set by the tagging policy and cannot be overridden`);
        }
        if (key.toLowerCase().startsWith('aws:')) {
            throw new Error(`Tag '${key}' uses the reserved 'aws:' prefix`);
        }
        if (key.length === 0 || key.length > MAX_TAG_KEY_LENGTH) {
            throw new Error(`Tag key '${key}' must be 1-${MAX_TAG_KEY_LENGTH} characters`);
        }
        if (value.length > MAX_TAG_VALUE_LENGTH) {
            throw new Error(`Tag '${key}' value exceeds ${MAX_TAG_VALUE_LENGTH} characters`);
        }
        tags[key] = value;
    }

    return tags;
}

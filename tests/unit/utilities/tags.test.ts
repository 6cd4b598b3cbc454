/**
 * @format
 * Tag Composition Unit Tests
 */

import { Environment } from '../../../lib/config/environments';
import { buildResourceTags } from '../../../lib/utilities/tags';

describe('buildResourceTags', () => {
    const base = {
        environment: Environment.PRODUCTION,
        project: 'Ec2Instance',
        owner: 'platform-team',
    };

    it('should compose the mandatory tags in a fixed order', () => {
        const tags = buildResourceTags({ ...base, costCenter: '12345', name: 'aws-amz-prd-web-01' });

        expect(Object.entries(tags)).toEqual([
            ['Name', 'aws-amz-prd-web-01'],
            ['Environment', 'production'],
            ['Project', 'Ec2Instance'],
            ['Owner', 'platform-team'],
            ['ManagedBy', 'CDK'],
            ['CostCenter', '12345'],
        ]);
    });

    it('should omit Name and CostCenter when not given', () => {
        expect(Object.keys(buildResourceTags(base))).toEqual(['Environment', 'Project', 'Owner', 'ManagedBy']);
    });

    it('should append additional tags after the mandatory set', () => {
        const tags = buildResourceTags({ ...base, additional: { Team: 'web', Tier: 'frontend' } });

        expect(Object.keys(tags)).toEqual(['Environment', 'Project', 'Owner', 'ManagedBy', 'Team', 'Tier']);
        expect(tags.Team).toBe('web');
    });

    it('should reject an additional tag overriding a mandatory key', () => {
        expect(() => buildResourceTags({ ...base, additional: { Owner: 'someone-else' } })).toThrow(
            "Tag 'Owner' is set by the tagging policy and cannot be overridden"
        );
    });

    it('should reject the reserved aws: prefix in any case', () => {
        expect(() => buildResourceTags({ ...base, additional: { 'AWS:custom': 'x' } })).toThrow(
            "Tag 'AWS:custom' uses the reserved 'aws:' prefix"
        );
    });

    it('should reject keys longer than 128 characters', () => {
        const key = 'k'.repeat(129);
        expect(() => buildResourceTags({ ...base, additional: { [key]: 'x' } })).toThrow(
            `Tag key '${key}' must be 1-128 characters`
        );
    });

    it('should reject values longer than 256 characters', () => {
        expect(() => buildResourceTags({ ...base, additional: { Notes: 'v'.repeat(257) } })).toThrow(
            "Tag 'Notes' value exceeds 256 characters"
        );
    });
});

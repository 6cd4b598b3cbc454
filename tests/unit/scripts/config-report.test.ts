/**
 * @format
 * Configuration Report Unit Tests
 */

import { Environment } from '../../../lib/config/environments';
import { Project } from '../../../lib/config/projects';
import { buildConfigReports, hasErrors, reportFor, selectReports } from '../../../scripts/config-report';

const SITE_KEYS = ['VPC_ID', 'VPC_NAME', 'KEY_PAIR_NAME', 'TRUSTED_CIDRS', 'AMI_ID'];

describe('config report', () => {
    const saved = { ...process.env };

    beforeEach(() => {
        SITE_KEYS.forEach((key) => delete process.env[key]);
    });

    afterEach(() => {
        process.env = { ...saved };
    });

    it('should render one name per production instance', () => {
        expect(reportFor(Project.INSTANCE, Environment.PRODUCTION)).toEqual({
            project: Project.INSTANCE,
            environment: Environment.PRODUCTION,
            names: ['aws-amz-prd-web-01', 'aws-amz-prd-web-02'],
            errors: [],
        });
    });

    it('should render the fleet name without an index', () => {
        expect(reportFor(Project.AUTOSCALING, Environment.STAGING).names).toEqual(['aws-amz-stg-app']);
    });

    it('should cover every project and environment by default', () => {
        const reports = buildConfigReports();

        expect(reports.map((report) => `${report.project}/${report.environment}`)).toEqual([
            'instance/development',
            'instance/staging',
            'instance/production',
            'autoscaling/development',
            'autoscaling/staging',
            'autoscaling/production',
        ]);
        expect(hasErrors(reports)).toBe(false);
    });

    it('should report errors from site-specific values and skip names', () => {
        process.env.TRUSTED_CIDRS = 'not-a-cidr';

        const [report] = buildConfigReports({
            projects: [Project.INSTANCE],
            environments: [Environment.DEVELOPMENT],
        });

        expect(report.errors.length).toBeGreaterThan(0);
        expect(report.names).toEqual([]);
        expect(hasErrors([report])).toBe(true);
    });

    describe('selectReports', () => {
        it('should select everything without flags', () => {
            expect(selectReports({})).toEqual({ options: { projects: undefined, environments: undefined } });
        });

        it('should resolve a short environment name', () => {
            expect(selectReports({ project: 'instance', environment: 'prod' })).toEqual({
                options: { projects: [Project.INSTANCE], environments: [Environment.PRODUCTION] },
            });
        });

        it('should reject an unknown environment instead of throwing', () => {
            expect(selectReports({ environment: 'qa' })).toEqual({
                error: "Invalid environment 'qa'. Valid environments: development, staging, production, dev, prod",
            });
        });

        it('should reject an unknown project', () => {
            expect(selectReports({ project: 'fleet', environment: 'qa' })).toEqual({
                error: "Invalid project 'fleet'. Valid projects: instance, autoscaling",
            });
        });
    });
});

#!/usr/bin/env node
/**
 * @format
 * EC2 Compute Projects Entry Point
 *
 * Slim orchestrator: parses project/environment, delegates ALL context
 * resolution (configuration, VPC lookup, env vars) to the project factory,
 * then applies cross-cutting aspects (tagging, compliance).
 *
 * Usage:
 *   npx cdk synth -c project=instance -c environment=dev
 *   npx cdk synth -c project=autoscaling -c environment=prod
 *   npx cdk synth -c project=autoscaling -c environment=staging -c compliancePacks=AwsSolutions,NIST800-53
 */

import * as dotenv from 'dotenv';

import * as cdk from 'aws-cdk-lib/core';

import { applyCdkNag, applyCommonSuppressions, parseCompliancePacks, TaggingAspect } from '../lib/aspects';
import { isValidEnvironment, resolveEnvironment } from '../lib/config/environments';
import { getProjectConfig, isValidProject } from '../lib/config/projects';
import { getProjectFactoryFromContext } from '../lib/factories/project-registry';

// Local runs: .env → process.env (CI exports the same variables)
dotenv.config();

const app = new cdk.App();

// ============================================================================
// 1. Parse & Validate Project + Environment
// ============================================================================

const projectContext: unknown = app.node.tryGetContext('project');
const environmentContext: unknown = app.node.tryGetContext('environment');

if (typeof projectContext !== 'string' || !isValidProject(projectContext)) {
    throw new Error(
        'Project context required. Use: -c project=instance|autoscaling -c environment=dev|staging|prod',
    );
}

if (typeof environmentContext !== 'string' || !isValidEnvironment(environmentContext)) {
    throw new Error(
        `Environment required. Use: -c project=${projectContext} -c environment=dev|staging|prod`,
    );
}

const environment = resolveEnvironment(environmentContext);
const projectConfig = getProjectConfig(projectContext);

console.log(`=== Project: ${projectConfig.namespace} | Environment: ${environment} ===`);

// ============================================================================
// 2. Create All Stacks
//
// Site-specific values (VPC_ID, VPC_NAME, KEY_PAIR_NAME, TRUSTED_CIDRS,
// AMI_ID) are read by the typed config via fromEnv().
// CDK context is reserved for structural routing only.
// ============================================================================

const factory = getProjectFactoryFromContext(projectContext, environment);
const { stacks } = factory.createAllStacks(app, { environment });

// ============================================================================
// 3. Cross-Cutting Aspects
// ============================================================================

// Tagging: mandatory tag set on every taggable resource
cdk.Aspects.of(app).add(new TaggingAspect({
    environment,
    project: projectConfig.namespace,
    owner: process.env.PROJECT_OWNER ?? 'platform-team',
    costCenter: process.env.COST_CENTER,
}));

// CDK-Nag compliance checks
const enableNagChecks = String(app.node.tryGetContext('nagChecks')) !== 'false';
if (enableNagChecks) {
    const packsContext: unknown = app.node.tryGetContext('compliancePacks');
    applyCdkNag(app, {
        packs: typeof packsContext === 'string' ? parseCompliancePacks(packsContext) : undefined,
        verbose: false,
        reports: true,
    });
    stacks.forEach((stack) => applyCommonSuppressions(stack));
}

// ============================================================================
// 4. Summary
// ============================================================================

const stackNames = stacks.map((s) => `  - ${s.stackName}`).join('\n');
console.log(`\nStacks created:\n${stackNames}\n`);

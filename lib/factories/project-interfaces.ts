/**
 * @format
 * Project Factory Interfaces
 *
 * Defines the interface for project-specific factories that create
 * project stacks. Each factory owns its own context resolution
 * (configuration, VPC lookup, env vars); the entry point only provides
 * the target environment.
 */

import * as cdk from 'aws-cdk-lib/core';

import { Environment } from '../config/environments';
import { Project } from '../config/projects';

/**
 * Base context passed to project factories for stack creation.
 *
 * Only the target environment is required. Each factory defines
 * its own extended context interface for project-specific overrides.
 */
export interface ProjectFactoryContext {
    /** Target environment */
    readonly environment: Environment;
    /** Allow project-specific context overrides */
    readonly [key: string]: unknown;
}

/**
 * Result of creating all stacks for a project
 */
export interface ProjectStackFamily {
    /** All stacks created by the factory */
    readonly stacks: cdk.Stack[];
    /** Map of stack key to stack instance */
    readonly stackMap: Record<string, cdk.Stack>;
}

/**
 * Interface for project-specific factories.
 *
 * @typeParam TContext - Factory-specific context extending ProjectFactoryContext
 */
export interface IProjectFactory<TContext extends ProjectFactoryContext = ProjectFactoryContext> {
    /** The project this factory creates stacks for */
    readonly project: Project;
    /** The target environment */
    readonly environment: Environment;
    /** The namespace prefix for stack names */
    readonly namespace: string;

    /**
     * Create all stacks for this project.
     *
     * @param scope - CDK app or stage
     * @param context - Typed context with environment and optional project-specific overrides
     */
    createAllStacks(scope: cdk.App, context: TContext): ProjectStackFamily;
}

/**
 * Constructor type for project factories.
 */
export type ProjectFactoryConstructor = new (environment: Environment) => IProjectFactory;

/**
 * @format
 * Project Registry
 *
 * Maps project + environment combinations to their respective factories.
 * This is the central registry for all project factories.
 */

import { Environment, isValidEnvironment, resolveEnvironment } from '../config/environments';
import { Project, isValidProject, getAvailableProjects } from '../config/projects';
import { AutoScalingProjectFactory } from '../projects/autoscaling';
import { InstanceProjectFactory } from '../projects/instance';

import { IProjectFactory, ProjectFactoryConstructor } from './project-interfaces';

/**
 * Registry of project factories by project type
 */
const projectFactoryRegistry: Record<Project, ProjectFactoryConstructor> = {
    [Project.INSTANCE]: InstanceProjectFactory,
    [Project.AUTOSCALING]: AutoScalingProjectFactory,
};

/**
 * Get a project factory for a specific project and environment.
 *
 * @example
 * ```typescript
 * const factory = getProjectFactory(Project.INSTANCE, Environment.DEVELOPMENT);
 * factory.createAllStacks(app, { environment: Environment.DEVELOPMENT });
 * ```
 */
export function getProjectFactory(project: Project, environment: Environment): IProjectFactory {
    const FactoryClass = projectFactoryRegistry[project];
    return new FactoryClass(environment);
}

/**
 * Get a project factory from context values (strings).
 * Used when parsing CDK context.
 *
 * @example
 * ```typescript
 * // From CDK context: -c project=autoscaling -c environment=dev
 * const factory = getProjectFactoryFromContext('autoscaling', 'dev');
 * ```
 */
export function getProjectFactoryFromContext(
    projectStr: string,
    environmentStr: string,
): IProjectFactory {
    if (!isValidProject(projectStr)) {
        const available = getAvailableProjects().join(', ');
        throw new Error(`Invalid project: '${projectStr}'. Valid projects: ${available}`);
    }

    if (!isValidEnvironment(environmentStr)) {
        const available = Object.values(Environment).join(', ');
        throw new Error(`Invalid environment: '${environmentStr}'. Valid environments: ${available}`);
    }

    // Short names (dev, prod) resolve to full names
    return getProjectFactory(projectStr, resolveEnvironment(environmentStr));
}

/**
 * Check if a project factory exists for the given project
 */
export function hasProjectFactory(project: string): boolean {
    return Object.hasOwn(projectFactoryRegistry, project);
}

/**
 * Register a custom project factory.
 * Useful for replacing a project's stacks in tests or extensions.
 */
export function registerProjectFactory(
    project: Project,
    factory: ProjectFactoryConstructor,
): void {
    projectFactoryRegistry[project] = factory;
}

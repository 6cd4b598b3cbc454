/**
 * @format
 * Factories - Central Export
 *
 * Project Factory pattern for creating infrastructure stacks.
 * Each project (instance, autoscaling) has its own factory implementation.
 *
 * @example
 * ```typescript
 * import { getProjectFactoryFromContext } from '../lib/factories';
 *
 * const factory = getProjectFactoryFromContext('instance', 'dev');
 * const { stacks } = factory.createAllStacks(app, { environment });
 * ```
 */

// Project Factory Interfaces
export * from './project-interfaces';

// Project Factory Registry (main entry point)
export * from './project-registry';


/**
 * @format
 * EC2 Instance Project - Central Export
 */

export { InstanceProjectFactory } from './factory';
export type { InstanceFactoryContext } from './factory';

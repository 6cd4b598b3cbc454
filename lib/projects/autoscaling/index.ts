/**
 * @format
 * Auto Scaling Project - Central Export
 */

export { AutoScalingProjectFactory } from './factory';
export type { AutoScalingFactoryContext } from './factory';

/**
 * @format
 * Stacks - Central Export
 */

export * from './compute';

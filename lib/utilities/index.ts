/**
 * @format
 * Utilities - Central Export
 */

export * from './naming';
export * from './tags';
export * from './validation';
export * from './config-validation';

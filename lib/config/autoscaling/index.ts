/**
 * @format
 * Auto Scaling Project Configuration - Central Export
 */

export * from './configurations';

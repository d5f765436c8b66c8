/**
 * Domain layer: parameter types and validation
 */

export * from './types';
export * from './validation';

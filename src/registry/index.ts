/**
 * Model registry.
 *
 * @module registry
 */

export { ModelRegistry } from './model-registry.js';
export { RegistryBuilder } from './registry-builder.js';

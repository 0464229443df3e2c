/**
 * Entity types and their schema descriptors.
 *
 * @module model
 */

export { Model, MODEL_CAPABILITY, ABSTRACT_MODEL, isModel, isAbstractModel } from './model.js';
export type { ModelType, TableOptions } from './model.js';
export { TableInfo } from './table-info.js';
export { InvalidModelError } from './errors.js';

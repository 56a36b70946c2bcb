/**
 * tabletrace-core - Evidence model and scan plumbing
 *
 * - Types: evidence, confidence, reference kinds, file categories
 * - Inflection: Rails-style singular/plural and class/table names
 * - Scanner: directory walk, file categorisation, source loading
 * - Schema: table and column index from schema.rb
 * - Pipeline: dedup, filters, schema validation, ranking
 * - Config, errors and logging shared by every package
 */

export const VERSION = '0.1.0';

export * from './types/index.js';
export * from './inflection/index.js';
export * from './scanner/index.js';
export * from './schema/index.js';
export * from './pipeline/index.js';
export * from './config/index.js';
export * from './errors/index.js';
export * from './logging/index.js';
export * from './utils/index.js';

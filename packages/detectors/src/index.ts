/**
 * tabletrace-detectors - Table dependency scanners
 *
 * Each scanner reads the files of its categories line by line and emits
 * evidence that a table depends on the target:
 * - Schema: foreign key columns in db/schema.rb
 * - Migration: add_reference, add_column, add_foreign_key and removals
 * - Association: belongs_to, has_many and has_one in models
 * - Raw query: SQL text, heredocs and query-builder calls
 * - Config: table names in YAML settings
 * - Contextual: identifiers and comments near query or schema code
 * - Polymorphic: _type/_id pairs tied to the target
 */

export { BaseScanner, type ScanTarget, type EvidenceFields } from './base/index.js';
export { SchemaScanner } from './schema/index.js';
export { MigrationScanner } from './migration/index.js';
export { AssociationScanner, type AssociationScannerOptions } from './association/index.js';
export { RawQueryScanner } from './raw-query/index.js';
export { ConfigScanner } from './config/index.js';
export { ContextualScanner } from './contextual/index.js';
export * from './polymorphic/index.js';
export { createScanners, SCANNER_IDS, type ScannerId, type ScannerSetOptions } from './registry.js';

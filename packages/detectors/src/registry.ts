/**
 * Scanner Registry
 *
 * Builds the full scanner set for one target table. Scanners are
 * independent of each other; the order only decides the order of raw hits.
 */

import { AssociationScanner } from './association/association-scanner.js';
import type { BaseScanner, ScanTarget } from './base/base-scanner.js';
import { ConfigScanner } from './config/config-scanner.js';
import { ContextualScanner } from './contextual/contextual-scanner.js';
import { MigrationScanner } from './migration/migration-scanner.js';
import { PolymorphicScanner } from './polymorphic/polymorphic-scanner.js';
import { RawQueryScanner } from './raw-query/raw-query-scanner.js';
import { SchemaScanner } from './schema/schema-scanner.js';

export interface ScannerSetOptions {
  /** Tables from the schema index */
  knownTables?: ReadonlySet<string> | undefined;
}

export const SCANNER_IDS = [
  'schema',
  'migration',
  'association',
  'raw-query',
  'config',
  'contextual',
  'polymorphic',
] as const;

export type ScannerId = (typeof SCANNER_IDS)[number];

export function createScanners(target: ScanTarget, options: ScannerSetOptions = {}): BaseScanner[] {
  return [
    new SchemaScanner(target),
    new MigrationScanner(target),
    new AssociationScanner({ ...target, knownTables: options.knownTables }),
    new RawQueryScanner(target),
    new ConfigScanner(target),
    new ContextualScanner(target),
    new PolymorphicScanner(target),
  ];
}

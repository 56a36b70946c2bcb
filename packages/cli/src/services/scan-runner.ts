/**
 * Scan Runner Service
 *
 * Drives one scan end to end: validate the request, collect and load
 * files, index the schema, run every scanner, then post-process.
 * Progress is reported per phase and cancellation is polled between
 * phases and between scanners, never inside one. Only one scan runs per
 * process at a time.
 */

import { setImmediate } from 'node:timers/promises';

import {
  Errors,
  buildSchemaIndex,
  collectFiles,
  countFiles,
  loadSources,
  parseScanRequest,
  postProcess,
  silentLogger,
  type Evidence,
  type Logger,
  type ScanRequest,
} from 'tabletrace-core';
import { createScanners, type BaseScanner, type ScanTarget, type ScannerSetOptions } from 'tabletrace-detectors';

// ============================================================================
// Types
// ============================================================================

export type ScanPhase = 'collecting' | 'indexing' | 'scanning' | 'processing';

export interface ScanObserver {
  onProgress?: ((phase: ScanPhase, detail: string) => void) | undefined;
  /** Polled before each phase and between scanners */
  isCancelled?: (() => boolean) | undefined;
}

export interface ScanStats {
  /** Files that matched a category and could be read */
  filesScanned: number;
  rawHits: number;
  afterDedup: number;
  /** After the direction, known-table and self filters and validation */
  afterValidation: number;
  /** Final result count */
  afterFilter: number;
  /** Raw hits per scanner id; scanners without hits are left out */
  scannerHits: Record<string, number>;
  durationMs: number;
}

export type ScanOutcome =
  | { status: 'cancelled' }
  | { status: 'completed'; evidence: Evidence[]; stats: ScanStats };

export interface ScanRunnerConfig {
  logger?: Logger | undefined;
  /** Scanner factory (default: the full registry) */
  scannerFactory?: ((target: ScanTarget, options: ScannerSetOptions) => BaseScanner[]) | undefined;
}

const CANCELLED: ScanOutcome = { status: 'cancelled' };

/** Shared by every runner in the process */
let scanActive = false;

// ============================================================================
// Scan Runner
// ============================================================================

export class ScanRunner {
  private readonly logger: Logger;
  private readonly scannerFactory: (target: ScanTarget, options: ScannerSetOptions) => BaseScanner[];

  constructor(config: ScanRunnerConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.scannerFactory = config.scannerFactory ?? createScanners;
  }

  /** Whether any runner in this process is scanning */
  isRunning(): boolean {
    return scanActive;
  }

  /**
   * Run a scan. Rejects with a ScanError for invalid input, a missing
   * root, or when another scan in this process has not finished.
   */
  async run(request: ScanRequest, observer: ScanObserver = {}): Promise<ScanOutcome> {
    if (scanActive) {
      throw Errors.scanInProgress();
    }
    scanActive = true;

    try {
      return await this.execute(request, observer);
    } finally {
      scanActive = false;
    }
  }

  private async execute(request: ScanRequest, observer: ScanObserver): Promise<ScanOutcome> {
    const startTime = Date.now();
    const config = parseScanRequest(request);
    const cancelled = () => observer.isCancelled?.() ?? false;
    const progress = (phase: ScanPhase, detail: string) => {
      this.logger.debug(`[${phase}] ${detail}`);
      observer.onProgress?.(phase, detail);
    };

    // Collect
    if (cancelled()) return CANCELLED;
    progress('collecting', `Collecting files in ${config.rootDir}...`);
    const categorized = await collectFiles(config.rootDir, {
      ignoreDirectories: config.ignoreDirectories,
      logger: this.logger,
    });
    const sources = await loadSources(categorized, this.logger);
    const filesScanned = countFiles(sources);

    // Index
    if (cancelled()) return CANCELLED;
    progress('indexing', `Indexing schema (${sources.schema.length} file(s))...`);
    const schema = buildSchemaIndex(sources.schema);

    // Scan
    const scanners = this.scannerFactory(
      { tableName: config.tableName, foreignKey: config.foreignKey },
      { knownTables: schema.tables }
    );
    const raw: Evidence[] = [];
    const scannerHits: Record<string, number> = {};

    for (const [index, scanner] of scanners.entries()) {
      // Scanners are synchronous; let pending signal handlers run first
      await setImmediate();
      if (cancelled()) return CANCELLED;
      progress('scanning', `${scanner.name} (${index + 1}/${scanners.length})`);

      const hits = scanner.scanAll(sources);
      if (hits.length > 0) {
        scannerHits[scanner.id] = hits.length;
      }
      for (const hit of hits) {
        raw.push(hit);
      }
    }

    // Process
    if (cancelled()) return CANCELLED;
    progress('processing', `Processing ${raw.length} raw hit(s)...`);
    const { evidence, counts } = postProcess(raw, {
      tableName: config.tableName,
      schema,
      strict: config.strict,
      minConfidence: config.minConfidence,
      rootDir: config.rootDir,
    });

    return {
      status: 'completed',
      evidence,
      stats: {
        filesScanned,
        rawHits: raw.length,
        ...counts,
        scannerHits,
        durationMs: Date.now() - startTime,
      },
    };
  }
}

export function createScanRunner(config: ScanRunnerConfig = {}): ScanRunner {
  return new ScanRunner(config);
}

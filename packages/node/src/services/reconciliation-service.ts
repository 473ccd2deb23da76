/**
 * ReconciliationService: Composition root for the reconciler.
 *
 * Route handlers delegate to this service; they never build a Reconciler
 * themselves. The engine is pure, so this is also where its diagnostics
 * become log lines.
 */

import type { Logger } from "pino";
import { Reconciler, assembleReport } from "@treerecon/reconciler";
import type {
  ReconcilerConfig,
  ReconciliationNotice,
  ReconciliationResult,
  ReconciliationSummary,
  ReportWorkbook,
} from "@treerecon/reconciler";
import type { ColumnMapping, RawTable } from "@treerecon/types";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconciliationServiceConfig {
  /** Defaults applied to every request */
  readonly reconciler?: ReconcilerConfig;
  readonly logger: Logger;
}

export interface ReconcileRequest {
  readonly source: { readonly tables: readonly RawTable[] };
  readonly test: { readonly tables: readonly RawTable[] };
  readonly mapping?: Partial<ColumnMapping> | undefined;
  readonly dropBlankRows?: boolean | undefined;
}

export interface ReportResponse {
  readonly digest: string;
  readonly summary: ReconciliationSummary;
  readonly workbook: ReportWorkbook;
}

// =============================================================================
// Notice Messages
// =============================================================================

function describeNotice(notice: ReconciliationNotice): string {
  switch (notice.kind) {
    case "malformed-level":
      return "Unreadable level value; row treated as level-less";
    case "duplicate-key":
      return "Duplicate primary key; later row ignored for matching";
    case "ambiguous-parent-child":
      return "Parent-child key is not unique in both datasets; fallback skipped";
    case "ambiguous-loose-tag":
      return "Tag is not unique in both datasets; loose match skipped";
  }
}

// =============================================================================
// Service
// =============================================================================

export class ReconciliationService {
  private readonly defaults: Reconciler;
  private readonly dropBlankRows: boolean;
  private readonly logger: Logger;

  constructor(config: ReconciliationServiceConfig) {
    this.defaults = new Reconciler(config.reconciler);
    this.dropBlankRows = config.reconciler?.dropBlankRows ?? true;
    this.logger = config.logger;
  }

  /** Column mapping used when a request brings none. */
  getMapping(): ColumnMapping {
    return this.defaults.getMapping();
  }

  reconcile(request: ReconcileRequest): ReconciliationResult {
    const reconciler = this.reconcilerFor(request);
    const result = reconciler.reconcileTables(request.source.tables, request.test.tables);

    for (const notice of result.notices) {
      this.logger.warn({ notice }, describeNotice(notice));
    }

    const { summary } = result;
    this.logger.info(
      {
        sourceRows: summary.totalSourceRows,
        testRows: summary.totalTestRows,
        matchedByTier: summary.matchedByTier,
        differences: result.differences.length,
        digest: result.digest,
      },
      summary.allReconciled ? "Datasets reconciled" : "Datasets differ",
    );

    return result;
  }

  report(request: ReconcileRequest): ReportResponse {
    const result = this.reconcile(request);
    return {
      digest: result.digest,
      summary: result.summary,
      workbook: assembleReport(result, request.source.tables),
    };
  }

  private reconcilerFor(request: ReconcileRequest): Reconciler {
    if (request.mapping === undefined && request.dropBlankRows === undefined) {
      return this.defaults;
    }
    return new Reconciler({
      mapping: { ...this.defaults.getMapping(), ...request.mapping },
      dropBlankRows: request.dropBlankRows ?? this.dropBlankRows,
    });
  }
}

import type { AnalysisResult } from "../agents/coordinator.js";
import type { ThreatLevel } from "../experts/types.js";
import type { Category } from "../router/types.js";
import { logger, roundTo } from "../utils.js";

export interface HistoryQuery {
  /** Default: 50 */
  readonly limit?: number;
  readonly offset?: number;
  readonly threatLevel?: ThreatLevel;
  readonly category?: Category;
  /** Inclusive lower bound on AnalysisResult.timestamp */
  readonly from?: number;
  /** Inclusive upper bound on AnalysisResult.timestamp */
  readonly to?: number;
}

export interface HistoryStats {
  readonly totalAnalyses: number;
  readonly degradedCount: number;
  readonly averageRiskScore: number;
  readonly byThreatLevel: Readonly<Record<ThreatLevel, number>>;
  readonly byCategory: Readonly<Record<Category, number>>;
}

/**
 * Newest-first list of analysis results, capped in size
 * @remarks Lives only as long as the process
 */
export class MemoryHistoryStore {
  private records: AnalysisResult[] = [];
  private readonly maxSize: number;

  constructor(maxSize = 100) {
    this.maxSize = Math.max(1, maxSize);
  }

  /**
   * Record a result, dropping the oldest entries beyond the cap
   * @returns The result's task id
   */
  save(result: AnalysisResult): string {
    this.records.unshift(result);
    if (this.records.length > this.maxSize) {
      this.records = this.records.slice(0, this.maxSize);
    }
    logger.debug(`[History] Saved analysis ${result.taskId}`);
    return result.taskId;
  }

  get(taskId: string): AnalysisResult | undefined {
    return this.records.find((record) => record.taskId === taskId);
  }

  /**
   * Filter, then page, newest first
   */
  list(query: HistoryQuery = {}): readonly AnalysisResult[] {
    const { limit = 50, offset = 0, threatLevel, category, from, to } = query;

    const filtered = this.records.filter(
      (record) =>
        (threatLevel === undefined || record.threatLevel === threatLevel) &&
        (category === undefined || record.category === category) &&
        (from === undefined || record.timestamp >= from) &&
        (to === undefined || record.timestamp <= to)
    );

    return filtered.slice(Math.max(0, offset), Math.max(0, offset) + Math.max(0, limit));
  }

  getStats(): HistoryStats {
    const byThreatLevel: Record<ThreatLevel, number> = { high: 0, medium: 0, low: 0 };
    const byCategory: Record<Category, number> = {
      web_attack: 0,
      vulnerability_attack: 0,
      illegal_connection: 0,
    };
    let degradedCount = 0;
    let riskTotal = 0;

    for (const record of this.records) {
      byThreatLevel[record.threatLevel]++;
      byCategory[record.category]++;
      if (record.degraded) degradedCount++;
      riskTotal += record.riskScore;
    }

    return {
      totalAnalyses: this.records.length,
      degradedCount,
      averageRiskScore:
        this.records.length > 0 ? roundTo(riskTotal / this.records.length, 2) : 0,
      byThreatLevel,
      byCategory,
    };
  }

  size(): number {
    return this.records.length;
  }

  clear(): void {
    this.records = [];
  }
}

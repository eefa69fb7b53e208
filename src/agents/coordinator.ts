import { randomUUID } from "crypto";
import type { ExpertOutcome, ThreatLevel } from "../experts/types.js";
import type { Category, RoutingDecision } from "../router/types.js";
import { logRecord, roundTo, type RecordSink } from "../utils.js";
import { parseAlert, type Alert } from "../validation.js";

/** Stage timings of one analysis, in milliseconds */
export interface StageLatencies {
  readonly classificationMs: number;
  readonly analysisMs: number;
  readonly totalMs: number;
}

export interface AnalysisResult {
  readonly taskId: string;
  /** Unix epoch milliseconds at which analysis started */
  readonly timestamp: number;
  readonly alert: Alert;
  readonly category: Category;
  readonly technique: string;
  readonly riskScore: number;
  readonly threatLevel: ThreatLevel;
  readonly advice: readonly string[];
  readonly analysis: string;
  readonly routing: RoutingDecision;
  readonly latencies: StageLatencies;
  readonly degraded: boolean;
}

/** Anything that can classify alert text */
export interface AlertClassifier {
  classify(text: string, hint?: string): RoutingDecision;
}

/** Anything that analyzes an alert and always resolves */
export interface AlertAnalyzer {
  analyze(alert: Alert): Promise<ExpertOutcome>;
}

export interface CoordinatorOptions {
  readonly classifier: AlertClassifier;
  readonly experts: Readonly<Record<Category, AlertAnalyzer>>;
  /** Clock in epoch milliseconds (default: Date.now) */
  readonly now?: () => number;
  readonly newTaskId?: () => string;
  readonly recordSink?: RecordSink;
}

/**
 * Sequences classification, expert dispatch and result assembly
 * @remarks Never retries; experts resolve even when the model is down
 */
export class AlertCoordinator {
  private readonly classifier: AlertClassifier;
  private readonly experts: Readonly<Record<Category, AlertAnalyzer>>;
  private readonly now: () => number;
  private readonly newTaskId: () => string;
  private readonly recordSink: RecordSink;

  constructor(options: CoordinatorOptions) {
    this.classifier = options.classifier;
    this.experts = options.experts;
    this.now = options.now ?? Date.now;
    this.newTaskId = options.newTaskId ?? randomUUID;
    this.recordSink = options.recordSink ?? logRecord;
  }

  /**
   * Route and analyze one alert
   * @throws ValidationError if the alert is malformed
   */
  async analyzeAlert(input: unknown): Promise<AnalysisResult> {
    const alert = parseAlert(input);
    return this.run(alert);
  }

  /**
   * Analyze independent alerts concurrently
   * @remarks Every alert is validated before any analysis starts
   * @throws ValidationError if any alert is malformed
   */
  async analyzeMany(inputs: readonly unknown[]): Promise<readonly AnalysisResult[]> {
    const alerts = inputs.map((input) => parseAlert(input));
    return Promise.all(alerts.map((alert) => this.run(alert)));
  }

  private async run(alert: Alert): Promise<AnalysisResult> {
    const taskId = this.newTaskId();
    const startedAt = this.now();

    // The declared type is evidence too; it also earns the hint bonus when it names a category
    const routingText =
      alert.attackType !== undefined ? `${alert.attackType} ${alert.payload}` : alert.payload;
    const routing = this.classifier.classify(routingText, alert.attackType);
    const classifiedAt = this.now();

    const outcome = await this.experts[routing.category].analyze(alert);
    const analyzedAt = this.now();

    const { finding } = outcome;
    const result: AnalysisResult = Object.freeze({
      taskId,
      timestamp: startedAt,
      alert,
      category: routing.category,
      technique: finding.technique,
      riskScore: finding.riskScore,
      threatLevel: finding.threatLevel,
      advice: finding.advice,
      analysis: finding.analysis,
      routing,
      latencies: Object.freeze({
        classificationMs: classifiedAt - startedAt,
        analysisMs: analyzedAt - classifiedAt,
        totalMs: analyzedAt - startedAt,
      }),
      degraded: outcome.degraded,
    });

    this.recordSink("analysis_result", {
      task_id: taskId,
      category: result.category,
      confidence: roundTo(routing.confidence),
      technique: result.technique,
      risk_score: result.riskScore,
      threat_level: result.threatLevel,
      degraded: result.degraded,
      ...(outcome.failureReason !== undefined
        ? { failure_reason: outcome.failureReason }
        : {}),
      classification_ms: result.latencies.classificationMs,
      analysis_ms: result.latencies.analysisMs,
      total_ms: result.latencies.totalMs,
    });

    return result;
  }
}

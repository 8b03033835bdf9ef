import path from "node:path";
import { nanoid } from "nanoid";
import { lengthCritic } from "../analysis/critic";
import { SummaryGenerator } from "../analysis/summary-generator";
import { ValidationError } from "../core/errors";
import { FileSessionStore, type SessionStore } from "../core/state-store";
import { type RunInspection, WorkflowEngine } from "../core/workflow-engine";
import { loadCsvDataset } from "../dataset/csv-loader";
import { OpenAiTextGenerator, type TextGenerator } from "../llm/text-generator";
import { type AnalysisConfig, MAX_THRESHOLD_PERCENT } from "../project/config";

export interface StartRequest {
  csvPath: string;
  sessionId?: string;
  thresholdPercent?: number;
}

export const newSessionId = (): string => `analysis-${nanoid(8)}`;

export const thresholdFraction = (
  percent: number | undefined,
  config: AnalysisConfig,
): number => {
  const value = percent ?? config.anomalyThresholdPercent;
  if (!Number.isFinite(value) || value < 0 || value > MAX_THRESHOLD_PERCENT) {
    throw new ValidationError(
      `thresholdPercent must be between 0 and ${MAX_THRESHOLD_PERCENT}, got ${value}`,
    );
  }
  return value / 100;
};

export const createEngine = (
  config: AnalysisConfig,
  store: SessionStore,
  textGenerator: TextGenerator = new OpenAiTextGenerator(config.llm),
): WorkflowEngine =>
  new WorkflowEngine(
    store,
    {
      columns: config.columns,
      zScoreCutoff: config.zScoreCutoff,
      summaryGenerator: new SummaryGenerator(textGenerator),
      critic: lengthCritic(),
    },
    { maxIterations: config.maxIterations },
  );

/**
 * Operator actions shared by the extension's tools and its slash command.
 */
export class AnalysisController {
  constructor(
    private readonly engine: WorkflowEngine,
    private readonly config: AnalysisConfig,
    private readonly cwd: string,
  ) {}

  static fromConfig(config: AnalysisConfig, cwd: string): AnalysisController {
    const store = new FileSessionStore(path.resolve(cwd, config.storeDir));
    store.ensure();
    return new AnalysisController(createEngine(config, store), config, cwd);
  }

  async start(request: StartRequest): Promise<RunInspection> {
    const threshold = thresholdFraction(request.thresholdPercent, this.config);
    const dataset = loadCsvDataset(path.resolve(this.cwd, request.csvPath));
    return this.engine.start(request.sessionId ?? newSessionId(), {
      dataset,
      anomaly_threshold: threshold,
    });
  }

  async approve(sessionId: string): Promise<RunInspection> {
    return this.engine.resume(sessionId);
  }

  inspect(sessionId: string): RunInspection | null {
    return this.engine.inspect(sessionId);
  }

  list(): RunInspection[] {
    return this.engine.list();
  }
}

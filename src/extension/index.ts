import type {
  ExtensionAPI,
  ExtensionCommandContext,
} from "@mariozechner/pi-coding-agent";
import { Type } from "@sinclair/typebox";
import { errorMessage } from "../core/errors";
import type { RunInspection } from "../core/workflow-engine";
import {
  buildActionLines,
  buildCommandHelpLines,
  buildRunReportLines,
  buildSessionLines,
} from "../observability/report";
import { loadAnalysisConfig } from "../project/config";
import { AnalysisController } from "./controller";

const asToolResult = (payload: unknown) => ({
  content: [{ type: "text" as const, text: JSON.stringify(payload, null, 2) }],
  details: payload,
});

const summarizeRun = (run: RunInspection) => ({
  sessionId: run.sessionId,
  status: run.status,
  pendingStep: run.pendingStep,
  error: run.error,
  exitReason: run.exitReason,
  anomalies: run.state.anomalies.length,
  classification: run.state.air_quality_class,
  alertTriggered: run.state.alert_triggered,
  trendSummary: run.state.trend_summary,
  iterations: run.state.iterations,
  summary: run.state.final_summary,
});

const statusMessage = (run: RunInspection): string =>
  run.status === "paused"
    ? `airq ${run.sessionId}: waiting for approval before ${run.pendingStep}`
    : `airq ${run.sessionId}: ${run.status}`;

export default function (pi: ExtensionAPI): void {
  let controller: AnalysisController | undefined;

  const initialize = async (): Promise<AnalysisController> => {
    if (!controller) {
      const config = await loadAnalysisConfig(process.cwd());
      controller = AnalysisController.fromConfig(config, process.cwd());
    }
    return controller;
  };

  pi.on("session_start", async (_event, ctx) => {
    const current = await initialize();
    const waiting = current
      .list()
      .filter((run) => run.status === "paused").length;
    ctx.ui.setStatus(
      "airq",
      waiting > 0 ? `airq: ${waiting} awaiting approval` : "airq: ready",
    );
  });

  pi.registerTool({
    name: "airq_start",
    label: "Air Quality Start",
    description:
      "Start a new air-quality analysis of a CSV file. Runs until the alert decision and waits for approval.",
    parameters: Type.Object({
      csvPath: Type.String({ description: "Path to the readings CSV" }),
      sessionId: Type.Optional(
        Type.String({ description: "Session to restart; generated if omitted" }),
      ),
      thresholdPercent: Type.Optional(
        Type.Number({
          description: "Alert when this percentage of readings are anomalies",
          minimum: 0,
          maximum: 5,
        }),
      ),
    }),
    async execute(_toolCallId, params, _signal, _onUpdate, ctx) {
      const current = await initialize();
      const run = await current.start(params);
      ctx.ui.notify(statusMessage(run), "info");
      return asToolResult(summarizeRun(run));
    },
  });

  pi.registerTool({
    name: "airq_resume",
    label: "Air Quality Approve",
    description:
      "Approve a paused analysis and continue it through alerting and summarization",
    parameters: Type.Object({
      sessionId: Type.String({ description: "Session to resume" }),
    }),
    async execute(_toolCallId, params, _signal, _onUpdate, ctx) {
      const current = await initialize();
      const run = await current.approve(params.sessionId);
      ctx.ui.notify(statusMessage(run), "info");
      return asToolResult(summarizeRun(run));
    },
  });

  pi.registerTool({
    name: "airq_inspect",
    label: "Air Quality Inspect",
    description: "Show the status and results of an analysis session",
    parameters: Type.Object({
      sessionId: Type.String({ description: "Session to inspect" }),
    }),
    async execute(_toolCallId, params) {
      const current = await initialize();
      const run = current.inspect(params.sessionId);
      return asToolResult(
        run ? summarizeRun(run) : { error: "unknown_session" },
      );
    },
  });

  pi.registerCommand("airq", {
    description: "Run and approve air-quality analyses",
    handler: async (args, ctx) => {
      try {
        await handleCommand(args, ctx, await initialize());
      } catch (error) {
        ctx.ui.notify(`airq error: ${errorMessage(error)}`, "error");
      }
    },
  });
}

const parsePercent = (raw?: string): number | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`thresholdPercent must be a number, got ${raw}`);
  }
  return value;
};

const handleCommand = async (
  args: string,
  ctx: ExtensionCommandContext,
  controller: AnalysisController,
): Promise<void> => {
  const [command, ...rest] = args.trim().split(/\s+/);

  if (!command || command === "status") {
    const sessionId = rest[0];
    if (sessionId) {
      const run = controller.inspect(sessionId);
      ctx.ui.setWidget("airq", buildRunReportLines(run));
      ctx.ui.notify(run ? statusMessage(run) : "session not found", "info");
      return;
    }

    const runs = controller.list();
    ctx.ui.setWidget("airq", [
      ...buildSessionLines(runs),
      "--- actions ---",
      ...buildActionLines(runs),
    ]);
    ctx.ui.notify(`airq: ${runs.length} sessions`, "info");
    return;
  }

  if (command === "start") {
    const csvPath = rest[0];
    if (!csvPath) {
      ctx.ui.notify(
        "usage: /airq start <csvPath> [sessionId] [thresholdPercent]",
        "warning",
      );
      return;
    }
    const run = await controller.start({
      csvPath,
      sessionId: rest[1],
      thresholdPercent: parsePercent(rest[2]),
    });
    ctx.ui.setWidget("airq", buildRunReportLines(run));
    ctx.ui.notify(
      statusMessage(run),
      run.status === "paused" ? "warning" : "info",
    );
    return;
  }

  if (command === "approve" || command === "resume") {
    const sessionId = rest[0];
    if (!sessionId) {
      ctx.ui.notify("usage: /airq approve <sessionId>", "warning");
      return;
    }
    const run = await controller.approve(sessionId);
    ctx.ui.setWidget("airq", buildRunReportLines(run));
    ctx.ui.notify(statusMessage(run), "info");
    return;
  }

  if (command === "help") {
    ctx.ui.setWidget("airq-help", buildCommandHelpLines());
    ctx.ui.notify("airq help updated", "info");
    return;
  }

  ctx.ui.notify(`unknown airq command: ${command}`, "warning");
};

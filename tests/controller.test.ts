import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { ExtensionAPI } from "@mariozechner/pi-coding-agent";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ValidationError } from "../src/core/errors";
import { MemorySessionStore } from "../src/core/state-store";
import {
  AnalysisController,
  createEngine,
  thresholdFraction,
} from "../src/extension/controller";
import registerExtension from "../src/extension/index";
import { defaultAnalysisConfig } from "../src/project/config";

const CSV = [
  "Timestamp,PM2.5 (µg/m³),PM10 (µg/m³)",
  ...Array.from(
    { length: 21 },
    (_, hour) =>
      `2024-01-01 ${String(hour).padStart(2, "0")}:00,${hour === 20 ? 100 : 10},20`,
  ),
].join("\n");

const createProject = () => {
  const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "airq-controller-"));
  fs.writeFileSync(path.join(cwd, "readings.csv"), CSV, "utf8");
  return cwd;
};

const createController = (cwd: string) => {
  const prompts: string[] = [];
  const engine = createEngine(defaultAnalysisConfig, new MemorySessionStore(), {
    generate: async (prompt) => {
      prompts.push(prompt);
      return "One spike at 20:00; otherwise moderate air.";
    },
  });
  return {
    controller: new AnalysisController(engine, defaultAnalysisConfig, cwd),
    prompts,
  };
};

describe("AnalysisController", () => {
  it("starts a generated session from a CSV path relative to cwd", async () => {
    const { controller } = createController(createProject());

    const run = await controller.start({ csvPath: "readings.csv" });

    expect(run.sessionId).toMatch(/^analysis-[A-Za-z0-9_-]{8}$/);
    expect(run.status).toBe("paused");
    expect(run.state.anomaly_threshold).toBe(0.01);
    expect(controller.list()).toHaveLength(1);
  });

  it("approves a paused session through to the summary", async () => {
    const { controller, prompts } = createController(createProject());
    await controller.start({ csvPath: "readings.csv", sessionId: "daily" });

    const run = await controller.approve("daily");

    expect(run.status).toBe("completed");
    expect(run.state.alert_triggered).toBe(true);
    expect(prompts[0]).toContain("- Alert Status: TRIGGERED");
    expect(controller.inspect("daily")?.state.final_summary).toBe(
      "One spike at 20:00; otherwise moderate air.",
    );
  });

  it("rejects thresholds outside 0-5 percent and missing files", async () => {
    const { controller } = createController(createProject());

    await expect(
      controller.start({ csvPath: "readings.csv", thresholdPercent: 6 }),
    ).rejects.toThrow("thresholdPercent must be between 0 and 5, got 6");
    await expect(controller.start({ csvPath: "absent.csv" })).rejects.toThrow(
      ValidationError,
    );
  });

  it("converts percentages to fractions", () => {
    expect(thresholdFraction(undefined, defaultAnalysisConfig)).toBe(0.01);
    expect(thresholdFraction(2.5, defaultAnalysisConfig)).toBe(0.025);
    expect(thresholdFraction(0, defaultAnalysisConfig)).toBe(0);
  });
});

type ToolDefinition = {
  name: string;
  execute: (
    toolCallId: string,
    params: Record<string, unknown>,
    signal: undefined,
    onUpdate: undefined,
    ctx: unknown,
  ) => Promise<{ details: unknown }>;
};

type CommandDefinition = {
  handler: (args: string, ctx: unknown) => Promise<void>;
};

const createFakePi = () => {
  const tools = new Map<string, ToolDefinition>();
  const commands = new Map<string, CommandDefinition>();
  const pi = {
    on: () => undefined,
    registerTool: (tool: ToolDefinition) => {
      tools.set(tool.name, tool);
    },
    registerCommand: (name: string, command: CommandDefinition) => {
      commands.set(name, command);
    },
  } as unknown as ExtensionAPI;
  return { pi, tools, commands };
};

const createFakeContext = () => {
  const notifications: [string, string][] = [];
  const widgets = new Map<string, string[]>();
  const ctx = {
    ui: {
      notify: (message: string, level: string) => {
        notifications.push([message, level]);
      },
      setWidget: (key: string, lines: string[]) => {
        widgets.set(key, lines);
      },
      setStatus: () => undefined,
    },
  };
  return { ctx, notifications, widgets };
};

describe("extension", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers the analysis tools and command", () => {
    const { pi, tools, commands } = createFakePi();
    registerExtension(pi);

    expect([...tools.keys()]).toEqual([
      "airq_start",
      "airq_resume",
      "airq_inspect",
    ]);
    expect([...commands.keys()]).toEqual(["airq"]);
  });

  it("starts an analysis from the slash command", async () => {
    const cwd = createProject();
    vi.spyOn(process, "cwd").mockReturnValue(cwd);
    const { pi, commands, tools } = createFakePi();
    registerExtension(pi);
    const { ctx, notifications, widgets } = createFakeContext();

    await commands.get("airq")?.handler("start readings.csv morning 2", ctx);

    expect(notifications).toEqual([
      ["airq morning: waiting for approval before alert_decision", "warning"],
    ]);
    expect(widgets.get("airq")?.slice(0, 4)).toEqual([
      "=== run ===",
      "session=morning",
      "status=paused",
      "waiting for approval before: alert_decision",
    ]);
    expect(
      fs.existsSync(
        path.join(cwd, ".airq", "sessions", "morning", "checkpoint.json"),
      ),
    ).toBe(true);

    const inspected = await tools
      .get("airq_inspect")
      ?.execute("call-1", { sessionId: "morning" }, undefined, undefined, ctx);
    expect(inspected?.details).toMatchObject({
      sessionId: "morning",
      status: "paused",
      pendingStep: "alert_decision",
      anomalies: 1,
    });
  });

  it("reports command errors as notifications", async () => {
    vi.spyOn(process, "cwd").mockReturnValue(createProject());
    const { pi, commands } = createFakePi();
    registerExtension(pi);
    const { ctx, notifications } = createFakeContext();

    await commands.get("airq")?.handler("approve nobody", ctx);
    await commands.get("airq")?.handler("launch", ctx);

    expect(notifications).toEqual([
      ["airq error: Unknown session: nobody", "error"],
      ["unknown airq command: launch", "warning"],
    ]);
  });
});

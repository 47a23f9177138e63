#!/usr/bin/env tsx
import { Command } from "commander";
import chalk from "chalk";
import { render } from "ink";
import React from "react";
import { FrequencyModeSchema, type SystemState } from "@edgepulse/protocol";
import {
  checkHealth,
  controlInference,
  defragment,
  fetchSystemInfo,
  fetchSystemStatus,
  getWebSocketUrl,
  runInference,
  setFrequency,
} from "./api.js";
import { formatDetection, readImageAsDataUrl, withErrorHandler } from "./utils.js";
import { ClientSession } from "./session/client-session.js";
import Monitor from "./components/Monitor.js";

const DEFAULT_URL = process.env.CONTROLLER_URL || "http://localhost:8080";

const program = new Command();

program
  .name("edgepulse")
  .description("CLI for the EdgePulse telemetry and control API")
  .version("1.0.0")
  .option("--url <url>", "Controller URL", DEFAULT_URL);

function controllerUrl(): string {
  const { url } = program.opts<{ url: string }>();
  return url;
}

function printStatus(state: SystemState): void {
  console.log(chalk.blue(`CPU (${state.cpu.frequencyMode})`));
  for (const [id, core] of Object.entries(state.cpu.cores)) {
    console.log(
      `  ${id.padEnd(6)} ${String(core.frequencyMHz).padStart(4)} MHz  ${core.usagePct.toFixed(1).padStart(5)}%  ${core.temperatureC.toFixed(1)}°C`
    );
  }
  const { memory, ai } = state;
  console.log(chalk.blue("Memory"));
  console.log(`  ${memory.usedMB} / ${memory.totalMB} MB`);
  console.log(`  pressure ${memory.pressurePct}%  fragmentation ${memory.fragmentationPct}%`);
  console.log(chalk.blue(`NPU (${ai.isRunning ? "running" : "idle"})`));
  console.log(`  usage ${ai.npuUsagePct}%  latency ${ai.inferenceLatencyMs} ms  detections ${ai.detectionCount}`);
  console.log(chalk.blue("Drivers"));
  for (const [name, status] of Object.entries(state.drivers)) {
    console.log(`  ${name}: ${status === "error" ? chalk.red(status) : status}`);
  }
}

// Utility commands

program
  .command("info")
  .description("Show the board descriptor")
  .action(
    withErrorHandler(async () => {
      const info = await fetchSystemInfo(controllerUrl());
      console.log(chalk.blue(`${info.platform} (${info.architecture})`));
      console.log(`Cores: ${info.cores}`);
      console.log(`NPU: ${info.npu}`);
      console.log(`Memory: ${info.memory}`);
      console.log(`Version: ${info.version}`);
      console.log(`Uptime: ${Math.round(info.uptime)}s`);
    })
  );

program
  .command("health")
  .description("Check controller health")
  .action(
    withErrorHandler(async () => {
      const health = await checkHealth(controllerUrl());
      console.log(
        chalk.green(`✓ Controller is ${health.status} (${health.connected_sessions} sessions)`)
      );
    })
  );

program
  .command("status")
  .description("Print the current telemetry document")
  .action(
    withErrorHandler(async () => {
      printStatus(await fetchSystemStatus(controllerUrl()));
    })
  );

// Control commands

program
  .command("frequency <mode>")
  .description("Set the CPU frequency mode (high, normal, low)")
  .action(
    withErrorHandler(async (mode: string) => {
      const parsed = FrequencyModeSchema.safeParse(mode);
      if (!parsed.success) {
        throw new Error(`mode must be one of ${FrequencyModeSchema.options.join(", ")}`);
      }
      const ack = await setFrequency(controllerUrl(), parsed.data);
      console.log(chalk.green(`✓ ${ack.message}`));
    })
  );

program
  .command("defrag")
  .description("Defragment memory")
  .action(
    withErrorHandler(async () => {
      const ack = await defragment(controllerUrl());
      console.log(chalk.green(`✓ ${ack.message}`));
    })
  );

program
  .command("inference <action>")
  .description("Start or stop continuous inference")
  .action(
    withErrorHandler(async (action: string) => {
      if (action !== "start" && action !== "stop") {
        throw new Error("action must be start or stop");
      }
      const ack = await controlInference(controllerUrl(), action);
      console.log(chalk.green(`✓ ${ack.message}`));
    })
  );

program
  .command("detect <file>")
  .description("Run object detection on an image file")
  .action(
    withErrorHandler(async (file: string) => {
      const imageData = await readImageAsDataUrl(file);
      console.log(chalk.gray(`Uploading ${file}...`));
      const report = await runInference(controllerUrl(), imageData);

      console.log(
        chalk.blue(
          `${report.detections.length} detections in ${report.inferenceTime} ms (${report.width}x${report.height})`
        )
      );
      for (const detection of report.detections) {
        console.log(`  ${formatDetection(detection)}`);
      }
    })
  );

// Live dashboard

program
  .command("monitor")
  .description("Open the live dashboard")
  .action(
    withErrorHandler(async () => {
      const wsUrl = getWebSocketUrl(controllerUrl());
      const createSession = () => new ClientSession({ url: wsUrl });
      const app = render(
        <Monitor createSession={createSession} interactive={process.stdin.isTTY === true} />
      );
      await app.waitUntilExit();
    })
  );

await program.parseAsync();

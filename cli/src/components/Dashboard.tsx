import React from "react";
import { Box, Text } from "ink";
import type {
  DriverStatus,
  InferenceResultPayload,
  StateSnapshotEvent,
} from "@edgepulse/protocol";
import type { SessionState } from "../session/client-session.js";
import Gauge, { Spinner, type GaugeLevels } from "./Gauge.js";

interface DashboardProps {
  snapshot: StateSnapshotEvent | null;
  connection: SessionState;
  inference?: InferenceResultPayload | null;
  notice?: string | null;
  interactive?: boolean;
}

const CONNECTION_COLORS: Record<SessionState, string> = {
  connected: "green",
  connecting: "yellow",
  reconnecting: "yellow",
  disconnected: "red",
};

const LOAD_LEVELS: GaugeLevels = { warn: 60, alert: 80 };
const FRAGMENTATION_LEVELS: GaugeLevels = { warn: 30, alert: 60 };

const DRIVER_COLORS: Record<DriverStatus, string> = {
  connected: "green",
  active: "cyan",
  idle: "gray",
  error: "red",
};

function Section({ title, children }: { title: string; children: React.ReactNode }) {
  return (
    <Box flexDirection="column" borderStyle="round" borderColor="gray" paddingX={1}>
      <Text color="blue" bold>
        {title}
      </Text>
      {children}
    </Box>
  );
}

export default function Dashboard({
  snapshot,
  connection,
  inference,
  notice,
  interactive = true,
}: DashboardProps) {
  return (
    <Box flexDirection="column">
      <Box>
        <Text bold color="magenta">
          EdgePulse RK3588
        </Text>
        <Text> </Text>
        <Text color={CONNECTION_COLORS[connection]}>[{connection}]</Text>
        {snapshot && <Text color="gray"> seq {snapshot.seq}</Text>}
      </Box>

      {!snapshot ? (
        <Spinner text="Waiting for telemetry..." />
      ) : (
        <>
          <Section title={`CPU (${snapshot.data.cpu.frequencyMode})`}>
            {Object.entries(snapshot.data.cpu.cores).map(([id, core]) => (
              <Gauge
                key={id}
                label={`${id.padEnd(6)} ${String(core.frequencyMHz).padStart(4)} MHz ${core.temperatureC.toFixed(1)}°C`}
                value={core.usagePct}
                levels={LOAD_LEVELS}
              />
            ))}
          </Section>

          <Section title="Memory">
            <Text>
              {snapshot.data.memory.usedMB} / {snapshot.data.memory.totalMB} MB, allocations{" "}
              {snapshot.data.memory.allocationCount}
            </Text>
            <Gauge
              label="pressure     "
              value={snapshot.data.memory.pressurePct}
              levels={LOAD_LEVELS}
            />
            <Gauge
              label="fragmentation"
              value={snapshot.data.memory.fragmentationPct}
              levels={FRAGMENTATION_LEVELS}
            />
          </Section>

          <Section title={`NPU (${snapshot.data.ai.isRunning ? "running" : "idle"})`}>
            <Gauge label="usage" value={snapshot.data.ai.npuUsagePct} />
            <Text>
              latency {snapshot.data.ai.inferenceLatencyMs} ms, batch{" "}
              {snapshot.data.ai.batchSize}, detections {snapshot.data.ai.detectionCount}
            </Text>
          </Section>

          <Section title="Drivers">
            <Box>
              {Object.entries(snapshot.data.drivers).map(([name, status]) => (
                <Text key={name}>
                  {name}: <Text color={DRIVER_COLORS[status]}>{status}</Text>{"  "}
                </Text>
              ))}
            </Box>
          </Section>
        </>
      )}

      {inference && (
        <Box>
          <Text color="green">
            Last inference: {inference.detections.length} detections in{" "}
            {inference.inferenceTime} ms
            {inference.detections.length > 0 &&
              ` (${inference.detections.map((d) => d.className).join(", ")})`}
          </Text>
        </Box>
      )}

      {notice && (
        <Box>
          <Text color="yellow">{notice}</Text>
        </Box>
      )}

      {interactive ? (
        <Text color="gray">
          [s] start [x] stop [h/n/l] frequency [d] defragment [q] quit
        </Text>
      ) : (
        <Text color="gray">Read-only: stdin is not a terminal, Ctrl+C to quit</Text>
      )}
    </Box>
  );
}

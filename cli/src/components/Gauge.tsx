import React, { useEffect, useState } from "react";
import { Text } from "ink";

export interface GaugeLevels {
  /** Above this the bar turns yellow. */
  warn: number;
  /** Above this the bar turns red. */
  alert: number;
}

interface GaugeProps {
  value: number;
  label?: string;
  width?: number;
  levels?: GaugeLevels;
  /** Fixed colour, used when no levels are given. */
  color?: string;
}

export function gaugeColor(value: number, levels: GaugeLevels): "green" | "yellow" | "red" {
  if (value > levels.alert) return "red";
  if (value > levels.warn) return "yellow";
  return "green";
}

/** One-line percentage bar: `label ██████░░░░ 42.5%`. */
export default function Gauge({ value, label, width = 20, levels, color = "cyan" }: GaugeProps) {
  const pct = Math.min(100, Math.max(0, value));
  const filled = Math.round((pct / 100) * width);

  return (
    <Text>
      {label !== undefined && `${label} `}
      <Text color={levels ? gaugeColor(pct, levels) : color}>{"█".repeat(filled)}</Text>
      <Text color="gray">{"░".repeat(width - filled)}</Text> {pct.toFixed(1)}%
    </Text>
  );
}

const FRAMES = "⠋⠙⠹⠸⠼⠴⠦⠧⠇⠏";

export function Spinner({ text }: { text: string }) {
  const [tick, setTick] = useState(0);

  useEffect(() => {
    const timer = setInterval(() => setTick((n) => n + 1), 100);
    return () => clearInterval(timer);
  }, []);

  return (
    <Text color="yellow">
      {FRAMES.charAt(tick % FRAMES.length)} {text}
    </Text>
  );
}

import React, { useEffect, useRef, useState } from "react";
import { useApp, useInput } from "ink";
import type {
  ClientCommand,
  InferenceResultPayload,
  StateSnapshotEvent,
} from "@edgepulse/protocol";
import {
  ClientSession,
  type ServerError,
  type SessionState,
} from "../session/client-session.js";
import Dashboard from "./Dashboard.js";

interface MonitorProps {
  createSession: () => ClientSession;
  /** Key bindings need a raw-mode stdin; without one the dashboard is read-only. */
  interactive?: boolean;
}

const KEY_COMMANDS: Record<string, ClientCommand> = {
  s: { type: "start_inference" },
  x: { type: "stop_inference" },
  h: { type: "adjust_frequency", mode: "high" },
  n: { type: "adjust_frequency", mode: "normal" },
  l: { type: "adjust_frequency", mode: "low" },
  d: { type: "defragment_memory" },
};

export default function Monitor({ createSession, interactive = true }: MonitorProps) {
  const { exit } = useApp();
  const sessionRef = useRef<ClientSession | null>(null);
  const [connection, setConnection] = useState<SessionState>("disconnected");
  const [snapshot, setSnapshot] = useState<StateSnapshotEvent | null>(null);
  const [inference, setInference] = useState<InferenceResultPayload | null>(null);
  const [notice, setNotice] = useState<string | null>(null);

  useEffect(() => {
    const session = createSession();
    sessionRef.current = session;

    session.on("state", (state: SessionState) => setConnection(state));
    session.on("render", (event: StateSnapshotEvent) => setSnapshot(event));
    session.on("inference", (payload: InferenceResultPayload) => setInference(payload));
    session.on("serverError", (error: ServerError) =>
      setNotice(`${error.code}: ${error.message}`)
    );

    session.start();
    return () => {
      session.removeAllListeners();
      session.stop();
      sessionRef.current = null;
    };
  }, [createSession]);

  useInput(
    (input) => {
      if (input === "q") {
        exit();
        return;
      }

      const command = KEY_COMMANDS[input];
      if (!command) return;

      const sent = sessionRef.current?.send(command) ?? false;
      setNotice(sent ? `Sent ${command.type}` : "Not connected, command dropped");
    },
    { isActive: interactive }
  );

  return (
    <Dashboard
      snapshot={snapshot}
      connection={connection}
      inference={inference}
      notice={notice}
      interactive={interactive}
    />
  );
}

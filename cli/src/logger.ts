import pino from "pino";

// stderr keeps log lines out of the Ink frame on stdout
export const logger = pino(
  {
    level: process.env.LOG_LEVEL || "warn",
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label: string) => ({ level: label }),
    },
  },
  pino.destination(2)
);

export type CliLogger = pino.Logger;

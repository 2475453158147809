import pino from "pino";

// Stdout carries the MCP stdio protocol, so logs always go to stderr.
const isTest = process.env.NODE_ENV === "test" || process.env.VITEST !== undefined;

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const logger = pino(
  {
    // Entry points apply the configured level through setLogLevel.
    level: isTest ? "silent" : "info",
    redact: {
      paths: [
        "apiKey",
        "openaiApiKey",
        "databaseUrl",
        "authorization",
        "Authorization",
        "*.apiKey",
        "*.openaiApiKey",
        "*.databaseUrl",
      ],
      censor: "***REDACTED***",
    },
    serializers: {
      err: pino.stdSerializers.err,
    },
  },
  pino.destination({ dest: 2, sync: false }),
);

// Children copy the level when created, so a later change has to reach each one.
const componentLoggers = new Set<pino.Logger>();

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
  for (const child of componentLoggers) {
    child.level = level;
  }
}

export function createComponentLogger(component: string): pino.Logger {
  const child = logger.child({ component });
  componentLoggers.add(child);
  return child;
}

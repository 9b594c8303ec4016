import pino from "pino";

export function createLogger(level: string = "info") {
  return pino({
    level,
    transport: {
      target: "pino/file",
      options: { destination: 1 }, // stdout
    },
  });
}

/**
 * Logger without a transport worker, for tests and embedded use.
 */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

export type Logger = pino.Logger;

import "dotenv/config";

import pino, { type DestinationStream, type Logger } from "pino";

export interface LoggerSettings {
  level: string;
  /** Also append log lines to this file, creating its directory */
  file?: string;
}

function isLevel(value: string): value is pino.Level {
  return Object.hasOwn(pino.levels.values, value);
}

/**
 * JSON logs go to stderr; stdout belongs to the spinner lines and the run
 * summary. Errors are logged under `error`, so that key is serialized like
 * pino's own `err`.
 */
export function createLogger(
  settings: LoggerSettings,
  stderr: DestinationStream = pino.destination({ fd: 2, sync: true })
): Logger {
  const options = {
    level: settings.level,
    base: { app: "zone-sync" },
    serializers: { error: pino.stdSerializers.err },
  };

  if (settings.file === undefined || settings.file === "") {
    return pino(options, stderr);
  }

  const level = isLevel(settings.level) ? settings.level : "info";
  return pino(
    options,
    pino.multistream([
      { level, stream: stderr },
      {
        level,
        stream: pino.destination({
          dest: settings.file,
          mkdir: true,
          sync: true,
        }),
      },
    ])
  );
}

export const logger = createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  file: process.env.LOG_FILE,
});

export const czdsLogger = logger.child({ module: "czds-api" });
export const dbLogger = logger.child({ module: "database" });
export const syncLogger = logger.child({ module: "sync" });

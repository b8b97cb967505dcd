import pino from "pino";

export type Logger = pino.Logger;

type LoggerOptions = {
  level: string;
  pretty?: boolean;
};

const redactPaths = ["req.headers.authorization", "*.password", "*.databaseUrl"];

export const createLogger = (options: LoggerOptions): Logger => {
  const baseOptions: pino.LoggerOptions = {
    level: options.level,
    base: {
      service: "library-ledger",
      version: process.env.APP_VERSION ?? "dev"
    },
    redact: {
      paths: redactPaths,
      censor: "[REDACTED]"
    }
  };

  if (options.pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname"
        }
      }
    });
  }

  return pino(baseOptions);
};

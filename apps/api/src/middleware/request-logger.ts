import morgan from "morgan";
import type { RequestHandler } from "express";
import type { Logger } from "../lib/logger";

export const createRequestLogger = (logger: Logger): RequestHandler => {
  return morgan("combined", {
    stream: {
      write: (line: string) => {
        logger.info(line.trim());
      }
    }
  });
};

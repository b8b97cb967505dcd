import type { ErrorRequestHandler } from "express";
import { ZodError } from "zod";
import { HttpError } from "../lib/errors";
import type { Logger } from "../lib/logger";

const isMalformedJson = (error: unknown): boolean => {
  return error instanceof SyntaxError && "body" in error;
};

export const createErrorHandler = (logger: Logger): ErrorRequestHandler => {
  return (error: unknown, req, res, _next) => {
    if (error instanceof HttpError) {
      res.status(error.statusCode).json({
        error: {
          kind: error.kind,
          message: error.message,
          details: error.details
        }
      });
      return;
    }

    if (error instanceof ZodError) {
      res.status(400).json({
        error: {
          kind: "validation",
          message: "Invalid request",
          details: error.flatten()
        }
      });
      return;
    }

    if (isMalformedJson(error)) {
      res.status(400).json({
        error: {
          kind: "validation",
          message: "Malformed JSON body"
        }
      });
      return;
    }

    logger.error({ err: error, method: req.method, path: req.path }, "unhandled request error");
    res.status(500).json({
      error: {
        kind: "internal",
        message: "Internal server error"
      }
    });
  };
};

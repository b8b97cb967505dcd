import type { Request, Response } from "express";

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      kind: "not_found",
      message: "Route not found",
      details: { method: req.method, path: req.path }
    }
  });
};

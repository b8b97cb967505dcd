import cors from "cors";
import express, { type Express } from "express";
import helmet from "helmet";
import { createAppContext, type AppContext } from "./context";
import { createErrorHandler } from "./middleware/error-handler";
import { notFoundHandler } from "./middleware/not-found";
import { createRequestLogger } from "./middleware/request-logger";
import { createApiRouter } from "./routes";

type AppOptions = Omit<AppContext, "loans"> & {
  corsOrigins?: string[];
};

export const createApp = ({ corsOrigins = [], ...deps }: AppOptions): Express => {
  const context = createAppContext(deps);
  const app = express();

  app.use(
    cors({
      origin: corsOrigins
    })
  );
  app.use(helmet());
  app.use(createRequestLogger(context.logger));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.status(200).json({
      status: "ok",
      uptime: process.uptime()
    });
  });

  app.use("/api/v1", createApiRouter(context));

  app.use(notFoundHandler);
  app.use(createErrorHandler(context.logger));

  return app;
};

import express, { type ErrorRequestHandler, type Express, type RequestHandler } from "express";
import { HttpError } from "./errors";
import { log } from "./logger";
import { registerRoutes } from "./routes";
import { serveLandingPage } from "./static";
import type { IStorage } from "./storage";

export interface AppOptions {
  logRequests?: boolean;
}

const MAX_LOG_LINE = 80;

function requestLogger(): RequestHandler {
  return (req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json.bind(res);
    res.json = (bodyJson: unknown) => {
      capturedJsonResponse = bodyJson;
      return originalResJson(bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }

        if (logLine.length > MAX_LOG_LINE) {
          logLine = logLine.slice(0, MAX_LOG_LINE - 1) + "…";
        }

        log(logLine);
      }
    });

    next();
  };
}

function isBodyParseError(error: unknown): boolean {
  return typeof error === "object" && error !== null && "type" in error && error.type === "entity.parse.failed";
}

const handleErrors: ErrorRequestHandler = (err, _req, res, next) => {
  const error: unknown = err;
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof HttpError) {
    res.status(error.status).json({ error: error.message });
    return;
  }

  if (isBodyParseError(error)) {
    res.status(400).json({ error: "Malformed JSON body" });
    return;
  }

  console.error("Unhandled request error:", error);
  res.status(500).json({ error: "Internal server error" });
};

export function createApp(storage: IStorage, options: AppOptions = {}): Express {
  const app = express();

  app.use(express.json());
  if (options.logRequests) {
    app.use(requestLogger());
  }

  registerRoutes(app, storage);
  serveLandingPage(app);

  app.use((_req, res) => {
    res.status(404).json({ error: "Resource not found" });
  });
  app.use(handleErrors);

  return app;
}

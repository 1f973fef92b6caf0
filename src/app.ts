import express from "express";
import cors from "cors";
import rateLimit from "express-rate-limit";
import type { Explanations } from "./explanations.js";
import type { Settings } from "./settings.js";
import type { SshConfig } from "./sshConfig.js";
import type { SshdConfig } from "./sshdConfig.js";
import { createSshdRouter } from "./routes/sshdRoutes.js";
import { createSshRouter } from "./routes/sshRoutes.js";
import { createErrorHandler } from "./utils/errorHandler.js";

export interface AppContext {
  sshd: SshdConfig;
  ssh: SshConfig;
  explanations: Explanations;
}

const LOCALHOST_ORIGIN = /^https?:\/\/localhost(:\d+)?$/;

export function createApp(settings: Settings, context: AppContext): express.Express {
  const app = express();

  // Mutating endpoints: 60 requests per minute per IP
  const editLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 60,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req, res) => {
      console.warn(`[Rate Limit] Too many edit requests from IP: ${req.ip}`);
      res.status(429).json({ error: "Too many requests, please slow down" });
    },
  });

  app.use(cors({ origin: settings.corsOrigin ?? LOCALHOST_ORIGIN }));
  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (req, res) => {
    res.json({ status: "ok" });
  });

  app.use("/api/sshd", createSshdRouter(context.sshd, { explanations: context.explanations, limiter: editLimiter }));
  app.use("/api/ssh", createSshRouter(context.ssh, { limiter: editLimiter }));

  // Must stay last
  app.use(createErrorHandler({ production: settings.production }));

  return app;
}

// server/src/app.ts
import express from "express";
import cors from "cors";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import morgan from "morgan";
import { ZodError } from "zod";

import importRoutes from "./routes/importRoutes";
import testsRoutes from "./routes/testsRoutes";
import type { ExtractionPipeline } from "./services/extraction";
import { formatZodError } from "./utils/zodError";

export type AppOptions = {
  pipeline: ExtractionPipeline;
  testsDir: string;
  manifestFile: string;
  corsOrigins?: string[];
  /** morgan access log; off in tests */
  accessLog?: boolean;
};

export function createApp(opts: AppOptions) {
  const app = express();
  const allowed = opts.corsOrigins ?? [];

  app.use(
    cors({
      origin: (origin, cb) => {
        if (!origin || allowed.length === 0 || allowed.includes(origin)) return cb(null, true);
        return cb(new Error("Not allowed by CORS"));
      },
      credentials: true,
    })
  );

  app.use(helmet());
  // whole exam papers are posted as text
  app.use(express.json({ limit: "5mb" }));
  app.use(rateLimit({ windowMs: 60_000, max: 100, standardHeaders: true }));
  if (opts.accessLog !== false) app.use(morgan("dev"));

  // --- health checks ---
  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use("/imports", importRoutes(opts.pipeline));
  app.use("/tests", testsRoutes({ testsDir: opts.testsDir, manifestFile: opts.manifestFile }));

  // zod handler
  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (err instanceof ZodError) {
      const details = formatZodError(err);
      console.error("[ZOD] validation failed:", JSON.stringify(details, null, 2));
      return res.status(400).json({ error: "Invalid input", ...details });
    }
    return next(err);
  });

  // default error handler
  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error("[ERR]", err);
    const status = err instanceof SyntaxError && "status" in err && err.status === 400 ? 400 : 500;
    res.status(status).json({ error: status === 400 ? "Malformed JSON body" : "Internal server error" });
  });

  return app;
}

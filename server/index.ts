import express, { type Request, Response, NextFunction } from "express";
import { createServer } from "http";
import session from "express-session";
import connectPgSimple from "connect-pg-simple";
import { loadConfig } from "./config";
import { createDatabase } from "./db";
import { DatabaseStorage } from "./storage";
import { createServices } from "./services";
import { registerRoutes } from "./routes";
import { ensureDefaultDepartments, seed } from "./seed";
import { log, logError } from "./lib/logger";

async function main() {
  const config = loadConfig();
  const { pool, db } = createDatabase(config.databaseUrl);
  const storage = new DatabaseStorage(db);
  const services = createServices(storage, config);

  const app = express();
  const httpServer = createServer(app);

  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    const path = req.path;
    let capturedJsonResponse: unknown;

    const originalResJson = res.json;
    res.json = function (bodyJson) {
      capturedJsonResponse = bodyJson;
      return originalResJson.call(res, bodyJson);
    };

    res.on("finish", () => {
      const duration = Date.now() - start;
      if (path.startsWith("/api")) {
        let logLine = `${req.method} ${path} ${res.statusCode} in ${duration}ms`;
        if (capturedJsonResponse !== undefined && res.statusCode >= 400) {
          logLine += ` :: ${JSON.stringify(capturedJsonResponse)}`;
        }
        if (logLine.length > 200) {
          logLine = logLine.slice(0, 199) + "…";
        }
        log(logLine);
      }
    });

    next();
  });

  await services.permissions.ensureEntries();
  await ensureDefaultDepartments(storage, config.departmentNames);
  if (config.seedAdminEmail) {
    await seed(storage, config.departmentNames, config.seedAdminEmail);
  }

  const PgSession = connectPgSimple(session);
  await registerRoutes(httpServer, app, {
    config,
    ...services,
    sessionStore: new PgSession({ pool, createTableIfMissing: true }),
  });

  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    logError("Unhandled request error", err);
    if (res.headersSent) {
      return next(err);
    }
    res.status(500).json({ error: "Internal Server Error" });
  });

  services.sync?.start();
  if (!services.sync) {
    log("External API not configured, reconciliation disabled", "sync");
  }

  httpServer.listen({ port: config.port, host: "0.0.0.0" }, () => {
    log(`serving on port ${config.port}`);
  });

  const shutdown = async (signal: string) => {
    log(`${signal} received, shutting down`);
    httpServer.close();
    await services.sync?.stop();
    await pool.end();
    process.exit(0);
  };

  process.on("SIGTERM", () => {
    shutdown("SIGTERM").catch((err) => {
      logError("Shutdown failed", err);
      process.exit(1);
    });
  });
  process.on("SIGINT", () => {
    shutdown("SIGINT").catch((err) => {
      logError("Shutdown failed", err);
      process.exit(1);
    });
  });
}

main().catch((err) => {
  logError("Startup failed", err, "db");
  process.exit(1);
});

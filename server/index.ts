import "dotenv/config";
import express, { type ErrorRequestHandler, type Express } from "express";
import { v4 as uuidv4 } from "uuid";

import { handleHealth } from "./routes/health";
import {
  handleEscalateIncident,
  handleGetIncident,
  handleGetIncidentReport,
  handleListIncidents,
  handleRecordMitigation,
  handleResolveIncident,
  handleTrigger,
} from "./routes/incidents";
import { handleGetRules, handleReloadRules } from "./routes/rules";
import { handleIngestSignals, handleQuerySignals } from "./routes/signals";
import { handleGetNeighbors, handleGetTopology, handleReloadTopology } from "./routes/topology";
import { getEngine, loadEngineFiles, startEngine, stopEngine } from "./services/engine";

/**
 * Create and configure Express server
 */
export function createServer(): Express {
  const app = express();

  // Middleware
  app.use(express.json({ limit: "5mb" }));
  app.use(express.urlencoded({ extended: true }));

  // Request logging
  app.use((req, res, next) => {
    const requestId = uuidv4();
    res.setHeader("x-request-id", requestId);
    res.locals.requestId = requestId;
    console.log(`[${requestId}] ${req.method} ${req.path}`);
    next();
  });

  // ============ API Routes ============

  app.get("/api/health", handleHealth);

  // Signal feed
  app.post("/api/signals", handleIngestSignals);
  app.get("/api/signals", handleQuerySignals);

  // Trigger intake and incidents
  app.post("/api/triggers", handleTrigger);
  app.get("/api/incidents", handleListIncidents);
  app.get("/api/incidents/:incidentId", handleGetIncident);
  app.get("/api/incidents/:incidentId/report", handleGetIncidentReport);
  app.post("/api/incidents/:incidentId/mitigation", handleRecordMitigation);
  app.post("/api/incidents/:incidentId/resolve", handleResolveIncident);
  app.post("/api/incidents/:incidentId/escalate", handleEscalateIncident);

  // Topology
  app.get("/api/topology", handleGetTopology);
  app.put("/api/topology", handleReloadTopology);
  app.get("/api/topology/:service/neighbors", handleGetNeighbors);

  // Diagnosis rule base
  app.get("/api/rules", handleGetRules);
  app.put("/api/rules", handleReloadRules);

  // ============ Error Handler ============

  const errorHandler: ErrorRequestHandler = (err: unknown, _req, res, _next) => {
    const requestId = res.locals.requestId || "unknown";
    console.error(`[${requestId}] Server error:`, err);
    // body-parser marks malformed JSON with a 4xx status
    const status =
      err && typeof err === "object" && "status" in err && typeof err.status === "number"
        ? err.status
        : 500;
    res.status(status).json({
      error: {
        code: status < 500 ? "BAD_REQUEST" : "INTERNAL_SERVER_ERROR",
        message: err instanceof Error ? err.message : "Unknown error",
      },
      requestId,
    });
  };
  app.use(errorHandler);

  return app;
}

/**
 * Start the server
 */
export async function startServer(): Promise<void> {
  const engine = getEngine();
  await loadEngineFiles(engine);
  startEngine(engine);

  await new Promise<void>((resolve) => {
    const app = createServer();
    const port = engine.config.port;

    const server = app.listen(port, () => {
      console.log(`\n✓ Server running on http://localhost:${port}`);
      console.log(`\n📋 Available endpoints:`);
      console.log(`  POST   /api/signals                 - Ingest a batch of signals`);
      console.log(`  POST   /api/triggers                - Open an incident from an alert`);
      console.log(`  GET    /api/incidents               - List incidents`);
      console.log(`  GET    /api/incidents/:id/report    - Incident report`);
      console.log(`  PUT    /api/topology                - Reload the service topology\n`);

      resolve();
    });

    // Graceful shutdown
    process.on("SIGTERM", () => {
      console.log("SIGTERM received, shutting down gracefully...");
      stopEngine(engine);
      server.close(() => {
        console.log("Server closed");
        process.exit(0);
      });
    });
  });
}

// Start server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  startServer().catch((err) => {
    console.error("Failed to start server:", err);
    process.exit(1);
  });
}

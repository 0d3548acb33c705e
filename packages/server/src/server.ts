// =============================================================================
// @dailysync/server — Express app + MCP Streamable HTTP transport
// =============================================================================
// createDependencies wires the production stack (Neo4j store, generation
// client, source aggregator, pipeline, job registry). createApp takes any
// AppDependencies, so tests hand it in-memory stand-ins.
// =============================================================================

import { createServer, type Server as HttpServer } from "node:http";
import express, {
  type Express,
  type Request,
  type Response,
  type RequestHandler,
} from "express";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import {
  closeDriver,
  createGenerationClient,
  createNeo4jContentStore,
  createPromptLibrary,
  errorMessage,
  healthCheck,
  type Config,
  type ContentStore,
  type Driver,
  type HealthCheckResult,
  type Logger,
} from "@dailysync/shared";
import {
  createContentPipeline,
  createFileSourceCache,
  createGenerationJobs,
  createSourceAggregator,
  type GenerationJobs,
} from "@dailysync/worker";
import { createContentRouter } from "./content-api.js";

export const SERVICE_NAME = "dailysync";
export const SERVICE_VERSION = "0.1.0";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Registers MCP tools on a per-request McpServer instance. */
export type ToolRegistrar = (server: McpServer, deps: AppDependencies) => void;

export interface AppDependencies {
  config: Config;
  logger: Logger;
  store: ContentStore;
  jobs: GenerationJobs;
  /** Store connectivity, reported by GET /health */
  checkHealth: () => Promise<HealthCheckResult>;
  /** Releases external connections; called once on shutdown */
  close: () => Promise<void>;
}

export interface AppInstance {
  app: Express;
  httpServer: HttpServer;
  deps: AppDependencies;
  /** Register a tool registrar that will be called for every MCP request. */
  addToolRegistrar: (registrar: ToolRegistrar) => void;
  /** Stop accepting requests, let in-flight generations settle, then close. */
  shutdown: () => Promise<void>;
}

// ---------------------------------------------------------------------------
// Production wiring
// ---------------------------------------------------------------------------

export function createDependencies(
  config: Config,
  driver: Driver,
  logger: Logger,
): AppDependencies {
  const store = createNeo4jContentStore(driver, { logger });
  const generation = createGenerationClient(config, logger);
  const sources = createSourceAggregator({
    sources: config.SOURCES,
    cache: createFileSourceCache(config.SOURCE_CACHE_DIR),
    timeoutMs: config.SOURCE_TIMEOUT_MS,
    logger,
  });
  const pipeline = createContentPipeline(
    { sources, generation, prompts: createPromptLibrary(), store, logger },
    {
      maxAttempts: config.PIPELINE_MAX_ATTEMPTS,
      retryDelayMs: config.PIPELINE_RETRY_DELAY_MS,
      reviewEnabled: config.REVIEW_ENABLED,
      onStateChange: ({ date, state, attempt }) =>
        logger.debug("Pipeline state", { date, state, attempt }),
    },
  );

  return {
    config,
    logger,
    store,
    jobs: createGenerationJobs(pipeline, logger),
    checkHealth: () => healthCheck(driver),
    close: () => closeDriver(driver),
  };
}

// ---------------------------------------------------------------------------
// CORS middleware (inline, no external dependency)
// ---------------------------------------------------------------------------

function createCorsMiddleware(origins: string): RequestHandler {
  return (req: Request, res: Response, next) => {
    res.setHeader("Access-Control-Allow-Origin", origins);
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.status(204).end();
      return;
    }

    next();
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export function createApp(deps: AppDependencies): AppInstance {
  const { config, logger } = deps;
  const toolRegistrars: ToolRegistrar[] = [];

  const app = express();
  app.use(express.json());
  app.use(createCorsMiddleware(config.CORS_ORIGINS));

  // --- Banner ---
  app.get("/", (_req: Request, res: Response) => {
    res.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: [
        "GET /health",
        "POST /api/generate/:date",
        "GET /api/content/:date",
        "GET /api/content?from=&to=",
        "DELETE /api/content/:date",
        "GET /api/dates",
        "POST /mcp",
      ],
    });
  });

  // --- Health ---
  app.get("/health", async (_req: Request, res: Response) => {
    let neo4j: HealthCheckResult;
    try {
      neo4j = await deps.checkHealth();
    } catch (err) {
      neo4j = { ok: false, latencyMs: 0, error: errorMessage(err) };
    }
    if (!neo4j.ok) {
      logger.warn("Health check failed", { error: neo4j.error });
    }
    res.status(neo4j.ok ? 200 : 503).json({
      status: neo4j.ok ? "ok" : "unhealthy",
      neo4j,
      activeGenerations: deps.jobs.activeDates(),
      uptime: process.uptime(),
    });
  });

  // --- REST ---
  app.use("/api", createContentRouter(deps));

  // --- MCP Streamable HTTP transport (stateless, per-request) ---
  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      const server = new McpServer({ name: SERVICE_NAME, version: SERVICE_VERSION });
      for (const registrar of toolRegistrars) {
        registrar(server, deps);
      }

      const transport = new StreamableHTTPServerTransport({
        sessionIdGenerator: undefined, // stateless
      });

      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (err) {
      logger.error("MCP request failed", { error: errorMessage(err) });
      if (!res.headersSent) {
        res.status(500).json({ error: "Internal server error" });
      }
    }
  });

  // Reject GET and DELETE for stateless server
  app.get("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  app.delete("/mcp", (_req: Request, res: Response) => {
    res.status(405).json({ error: "Method not allowed for stateless server" });
  });

  const httpServer = createServer(app);

  // --- Graceful shutdown ---
  let shuttingDown = false;

  async function shutdown(): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info("Shutting down gracefully...");

    if (httpServer.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((err) => {
          if (err) reject(err);
          else resolve();
        });
      });
    }

    const pending = deps.jobs.activeDates();
    if (pending.length > 0) {
      logger.info("Waiting for in-flight generations", { dates: pending });
    }
    await deps.jobs.idle();

    await deps.close();

    logger.info("Shutdown complete");
  }

  return {
    app,
    httpServer,
    deps,
    addToolRegistrar: (registrar: ToolRegistrar) => {
      toolRegistrars.push(registrar);
    },
    shutdown,
  };
}

import express from "express";
import type { NextFunction, Request, Response } from "express";
import { errorMessage } from "@/lib/errors";
import {
  handleCypher,
  handleExamples,
  handleExplain,
  handleGetRun,
  handleHealth,
  handleListRuns,
  handleQuery,
  handleSchema,
} from "./handlers";
import type { HandlerContext, HandlerResult } from "./handlers";

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

function send(res: Response, result: HandlerResult): void {
  res.status(result.status).json(result.body);
}

// express 4 does not forward rejected promises to the error middleware
function route(handler: (req: Request) => HandlerResult | Promise<HandlerResult>): AsyncRoute {
  return async (req, res, next) => {
    try {
      send(res, await handler(req));
    } catch (error) {
      next(error);
    }
  };
}

function queryString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

export function createApp(ctx: HandlerContext): express.Express {
  const app = express();
  app.use(express.json({ limit: "100kb" }));

  app.get("/health", route(() => handleHealth(ctx)));
  app.post("/query", route(req => handleQuery(ctx, req.body)));
  app.get(
    "/query",
    route(req => handleQuery(ctx, { question: queryString(req.query.q), locale: queryString(req.query.locale) }))
  );
  app.post("/explain", route(req => handleExplain(ctx, req.body)));
  app.post("/cypher", route(req => handleCypher(ctx, req.body)));
  app.get("/schema", route(() => handleSchema(ctx)));
  app.get("/examples", route(req => handleExamples(ctx, queryString(req.query.locale))));
  app.get(
    "/runs",
    route(req =>
      handleListRuns(ctx, {
        success: queryString(req.query.success),
        operation: queryString(req.query.operation),
        start: queryString(req.query.start),
        end: queryString(req.query.end),
        limit: queryString(req.query.limit),
      })
    )
  );
  app.get("/runs/:id", route(req => handleGetRun(ctx, req.params.id)));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: `Not found: ${req.method} ${req.path}` });
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    console.error(`[Server] Request failed: ${errorMessage(error)}`);
    res.status(500).json({ error: errorMessage(error) || "Internal server error" });
  });

  return app;
}

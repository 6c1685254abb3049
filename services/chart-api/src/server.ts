import Fastify, { type FastifyBaseLogger, type FastifyInstance } from "fastify";
import { ZodError } from "zod";
import { UploadRequest } from "@album-insights/schemas";
import { CHART_HINTS, isPipelineError, runPipeline } from "@album-insights/pipeline";
import { withSpan } from "@album-insights/telemetry";

import { CHART_API_BODY_LIMIT_BYTES, CHART_API_HOST, CHART_API_PORT, SERVICE_NAME } from "./config";
import { logger as defaultLogger } from "./logger";

export interface ServerOptions {
  logger?: FastifyBaseLogger;
  bodyLimit?: number;
}

export function buildServer(options: ServerOptions = {}): FastifyInstance {
  const logger = options.logger ?? defaultLogger;
  const app = Fastify({
    logger,
    bodyLimit: options.bodyLimit ?? CHART_API_BODY_LIMIT_BYTES
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ZodError) {
      const issue = error.issues[0];
      const field = issue?.path.join(".") || "body";
      reply.status(400).send({ error: `Invalid request ${field}: ${issue?.message ?? "validation failed"}` });
      return;
    }
    logger.error({ err: error }, "Chart API error");
    reply.status(error.statusCode ?? 500).send({ error: error.message });
  });

  app.get("/health", () => ({ ok: true, ts: Date.now() }));

  app.get("/charts", () => CHART_HINTS);

  app.post("/views", async (request) => {
    const body = UploadRequest.parse(request.body ?? {});
    const filename = body.filename ?? null;

    return withSpan(SERVICE_NAME, "views.build", (span) => {
      const result = runPipeline(body.contents, {
        onFailure: (error) => {
          if (isPipelineError(error)) {
            logger.warn({ err: error, kind: error.kind, filename }, "Album upload rejected");
          } else {
            logger.error({ err: error, filename }, "Album pipeline failed unexpectedly");
          }
        }
      });

      span.setAttributes({
        "views.ok": result.error === "",
        "views.charting": result.views.chartPerformance.length,
        "views.years": result.views.releaseFrequency.length
      });

      return { ...result, charts: CHART_HINTS };
    });
  });

  return app;
}

export async function startHttpServer(): Promise<FastifyInstance> {
  const app = buildServer();
  await app.listen({ port: CHART_API_PORT, host: CHART_API_HOST });
  defaultLogger.info({ port: CHART_API_PORT }, "Chart API ready");
  return app;
}

// Load environment variables from .env file (local development only)
import "dotenv/config";

import Fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { config } from "./config/index.js";
import { createProvider } from "./adapters/llm/router.js";
import type { StreamingChatProvider } from "./adapters/llm/types.js";
import type { EventSink } from "./generation/events.js";
import { createGenerationOrchestrator } from "./generation/orchestrator.js";
import observabilityPlugin from "./plugins/observability.js";
import generateRoute from "./routes/v1.generate.js";
import { statusRoutes, incrementRequestCount, incrementErrorCount } from "./routes/v1.status.js";
import {
  buildErrorV1,
  getStatusCodeForErrorCode,
  sanitizeErrorMessage,
  toErrorV1,
} from "./utils/errors.js";
import { createLoggerConfig } from "./utils/logger-config.js";
import { REQUEST_ID_HEADER, resolveRequestId } from "./utils/request-id.js";
import { flushMetrics, log } from "./utils/telemetry.js";
import { SERVICE_NAME, SERVICE_VERSION } from "./version.js";

export interface BuildOptions {
  /** Provider override; defaults to the one selected by LLM_PROVIDER */
  provider?: StreamingChatProvider;
  sink?: EventSink;
}

export async function build(opts: BuildOptions = {}): Promise<FastifyInstance> {
  // Fail-fast: createProvider throws when the OpenAI provider has no API key
  const provider = opts.provider ?? createProvider(config.llm);
  const orchestrator = createGenerationOrchestrator({ provider, sink: opts.sink });

  const app = Fastify({
    logger: createLoggerConfig(config.server.logLevel),
    genReqId: resolveRequestId,
  });

  await app.register(observabilityPlugin, {
    infoSampleRate: config.server.infoSampleRate,
    logStack: config.server.logStack,
    onRequestComplete: incrementErrorCount,
  });

  app.addHook("onRequest", async (request, reply) => {
    incrementRequestCount();
    reply.header(REQUEST_ID_HEADER, request.id);
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    // Fastify's own client errors (malformed JSON body, wrong content type)
    const status = error.statusCode ?? 500;
    if (status >= 400 && status < 500) {
      return reply
        .status(status)
        .send(buildErrorV1("BAD_INPUT", sanitizeErrorMessage(error.message), undefined, request.id));
    }

    const errorV1 = toErrorV1(error, request.id);
    app.log.error(
      { error, request_id: request.id, method: request.method, url: request.url },
      `[${errorV1.code}] ${errorV1.message}`
    );
    return reply.status(getStatusCodeForErrorCode(errorV1.code)).send(errorV1);
  });

  app.addHook("onClose", async () => {
    await orchestrator.shutdown();
  });

  await statusRoutes(app, { orchestrator });
  await generateRoute(app, { orchestrator });

  return app;
}

// If running directly (not imported), start the server
if (import.meta.url === `file://${process.argv[1]}`) {
  build()
    .then(async (app) => {
      app.log.info(
        {
          service: SERVICE_NAME,
          version: SERVICE_VERSION,
          env: config.server.nodeEnv,
          provider: config.llm.provider,
          model: config.llm.model,
          structured_output: config.generation.structuredEnabled,
          fallback_enabled: config.generation.fallbackEnabled,
          breaker_threshold: config.breaker.failureThreshold,
          breaker_recovery_ms: config.breaker.recoveryTimeoutMs,
        },
        "Generation service starting"
      );

      const shutdown = (signal: string) => {
        app.log.info({ signal }, "Shutting down");
        app
          .close()
          .then(() => flushMetrics())
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            log.error({ err }, "Error during shutdown");
            process.exit(1);
          });
      };
      process.once("SIGTERM", shutdown);
      process.once("SIGINT", shutdown);

      await app.listen({ port: config.server.port, host: "0.0.0.0" });
    })
    .catch((err: unknown) => {
      log.fatal({ err }, "Failed to start server");
      process.exit(1);
    });
}

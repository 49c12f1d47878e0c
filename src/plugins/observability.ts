import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import fp from "fastify-plugin";

/**
 * Observability Plugin
 *
 * Request completion logging with sampling for successful requests
 * (errors are always logged) and duration tracking. Secrets are redacted by
 * the logger configuration.
 */

export interface ObservabilityOptions {
  /** Fraction of 2xx/3xx requests logged at info level (0..1) */
  infoSampleRate?: number;
  /** Include stack traces in error logs */
  logStack?: boolean;
  /** Called once per finished request with its status code */
  onRequestComplete?: (statusCode: number) => void;
}

async function observabilityPlugin(fastify: FastifyInstance, opts: ObservabilityOptions) {
  const sampleRate = opts.infoSampleRate ?? 1;

  // Always log errors, sample successful requests
  const shouldLog = (statusCode: number): boolean =>
    statusCode >= 400 || Math.random() < sampleRate;

  fastify.addHook("onResponse", async (request: FastifyRequest, reply: FastifyReply) => {
    const statusCode = reply.statusCode;
    opts.onRequestComplete?.(statusCode);

    if (!shouldLog(statusCode)) {
      return;
    }

    const logData = {
      request_id: request.id,
      method: request.method,
      url: request.url,
      status: statusCode,
      duration_ms: Math.round(reply.elapsedTime),
      user_agent: request.headers["user-agent"],
    };

    if (statusCode >= 500) {
      fastify.log.error(logData, "Request completed with server error");
    } else if (statusCode >= 400) {
      fastify.log.warn(logData, "Request completed with client error");
    } else {
      fastify.log.info(logData, "Request completed");
    }
  });

  // Log uncaught errors in request lifecycle
  fastify.addHook("onError", async (request: FastifyRequest, _reply: FastifyReply, error: Error) => {
    fastify.log.error(
      {
        request_id: request.id,
        method: request.method,
        url: request.url,
        error: {
          name: error.name,
          message: error.message,
          ...(opts.logStack ? { stack: error.stack } : {}),
        },
      },
      "Request error"
    );
  });
}

export default fp(observabilityPlugin, {
  name: "observability",
  fastify: "5.x",
});

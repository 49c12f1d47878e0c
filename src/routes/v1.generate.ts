import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  createGenerationRequest,
  type GenerationOrchestrator,
} from "../generation/orchestrator.js";
import {
  BreakerOpenError,
  GenerationFailedError,
  buildErrorV1,
  getStatusCodeForErrorCode,
  toErrorV1,
} from "../utils/errors.js";

export const GenerateInput = z.object({
  user_id: z.string().min(1),
  chat_id: z.union([z.string(), z.number()]).optional(),
  text: z.string().min(1),
  include_prompt: z.boolean().default(true),
  mode: z.string().optional(),
});

export interface GenerateOutput {
  text: string;
  generated_at: string;
  mode: string;
}

export interface GenerateRouteDeps {
  orchestrator: GenerationOrchestrator;
}

/**
 * POST /v1/generate
 *
 * Synchronous generation for one user message. Unknown modes are served as
 * "base"; the mode actually used is echoed back.
 */
export default async function route(app: FastifyInstance, deps: GenerateRouteDeps) {
  app.post("/v1/generate", async (req, reply) => {
    const parsed = GenerateInput.safeParse(req.body);

    if (!parsed.success) {
      reply.code(400);
      return reply.send(
        buildErrorV1("BAD_INPUT", "invalid input", { validation_errors: parsed.error.flatten() }, req.id)
      );
    }

    const request = createGenerationRequest({
      userId: parsed.data.user_id,
      text: parsed.data.text,
      mode: parsed.data.mode,
      includePrompt: parsed.data.include_prompt,
    });

    try {
      const text = await deps.orchestrator.generate(request);
      const body: GenerateOutput = {
        text,
        generated_at: new Date().toISOString(),
        mode: request.mode,
      };
      return reply.send(body);
    } catch (error) {
      const errorV1 = toErrorV1(error, req.id);

      if (error instanceof GenerationFailedError && error.cause instanceof BreakerOpenError) {
        reply.header("Retry-After", String(Math.max(1, Math.ceil(error.cause.retryAfterMs / 1000))));
      }

      reply.code(getStatusCodeForErrorCode(errorV1.code));
      return reply.send(errorV1);
    }
  });
}

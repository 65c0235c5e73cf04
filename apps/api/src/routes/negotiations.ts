import type { FastifyInstance } from "fastify";
import { z } from "zod";
import {
  Adjudicator,
  NegotiationAgent,
  NegotiationEngine,
  NegotiationError,
  type JudgingClient,
  type TextGenerator,
} from "@parley/engine-session";

const ConstraintInput = z
  .object({
    role: z.enum(["SELLER", "BUYER"]),
    bound: z.number().positive(),
    ideal: z.number().positive(),
    urgency: z.string().optional(),
  })
  .strict();

const AgentInput = z
  .object({
    constraints: ConstraintInput,
    persona: z.string().min(1).default("None"),
    persona_modifier: z.string().optional(),
    agent_id: z.string().min(1).optional(),
  })
  .strict();

export const NegotiationRequestSchema = z
  .object({
    agent_a: AgentInput,
    agent_b: AgentInput,
    scenario: z.string().optional(),
    max_rounds: z.number().int().positive().max(50).optional(),
  })
  .strict();

export type NegotiationRequest = z.infer<typeof NegotiationRequestSchema>;

export interface NegotiationDeps {
  generator: TextGenerator;
  judge: JudgingClient | null;
  max_rounds: number;
}

/**
 * Register negotiation routes on the Fastify instance.
 * One request runs one negotiation to completion and returns its outcome.
 */
export function registerNegotiationRoutes(app: FastifyInstance, deps: NegotiationDeps) {
  // ─── POST /negotiations — Run a negotiation ──────────────
  app.post("/negotiations", async (request, reply) => {
    const parsed = NegotiationRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ error: "INVALID_REQUEST", issues: parsed.error.issues });
    }
    const body = parsed.data;

    let engine: NegotiationEngine;
    let agentA: NegotiationAgent;
    let agentB: NegotiationAgent;
    try {
      engine = new NegotiationEngine({
        adjudicator: new Adjudicator({ client: deps.judge, logger: request.log }),
        max_rounds: body.max_rounds ?? deps.max_rounds,
        logger: request.log,
      });
      agentA = new NegotiationAgent({ speaker: "A", generator: deps.generator, scenario: body.scenario, ...body.agent_a });
      agentB = new NegotiationAgent({ speaker: "B", generator: deps.generator, scenario: body.scenario, ...body.agent_b });
    } catch (err) {
      if (err instanceof NegotiationError) {
        return reply.status(400).send({ error: err.code, message: err.message });
      }
      throw err;
    }

    // Abandon between rounds when the client goes away.
    const controller = new AbortController();
    reply.raw.on("close", () => {
      if (!reply.raw.writableFinished) {
        controller.abort();
      }
    });

    try {
      const outcome = await engine.run(agentA, agentB, {
        scenario: body.scenario,
        signal: controller.signal,
      });
      return reply.status(outcome.status === "FAILED" ? 502 : 200).send(outcome);
    } catch (err) {
      if (err instanceof NegotiationError) {
        return reply.status(400).send({ error: err.code, message: err.message });
      }
      throw err;
    }
  });
}

import Fastify from "fastify";
import cors from "@fastify/cors";
import OpenAI from "openai";
import type { JudgingClient, TextGenerator } from "@parley/engine-session";
import type { AppConfig } from "./config.js";
import { OpenAiJudgingClient, OpenAiTextGenerator } from "./llm/openai.js";
import { registerNegotiationRoutes } from "./routes/negotiations.js";

/** External capabilities; defaults to OpenAI-backed ones. */
export interface ServerDeps {
  generator: TextGenerator;
  judge: JudgingClient | null;
}

function openAiDeps(config: AppConfig): ServerDeps {
  const client = new OpenAI({ apiKey: config.OPENAI_API_KEY });
  return {
    generator: new OpenAiTextGenerator(client, {
      model: config.AGENT_MODEL,
      temperature: config.AGENT_TEMPERATURE,
      max_tokens: config.AGENT_MAX_TOKENS,
    }),
    judge: new OpenAiJudgingClient(client, config.JUDGE_MODEL),
  };
}

export async function createServer(config: AppConfig, deps: ServerDeps = openAiDeps(config)) {
  const app = Fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  // ─── CORS ────────────────────────────────────────────────
  await app.register(cors, {
    origin: [...config.CORS_ORIGINS, /^http:\/\/localhost:\d+$/],
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  // ─── Health Check ────────────────────────────────────────
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  // ─── Negotiation Routes ──────────────────────────────────
  registerNegotiationRoutes(app, { ...deps, max_rounds: config.MAX_ROUNDS });

  return app;
}

import OpenAI from "openai";
import { zodResponseFormat } from "openai/helpers/zod";
import {
  GenerationError,
  errorMessage,
  renderPrompt,
  type JudgeRequest,
  type JudgingClient,
  type PromptContext,
  type TextGenerator,
} from "@parley/engine-session";

const AGENT_SYSTEM =
  "You are a negotiation agent. Follow the instructions carefully and generate realistic negotiation messages.";

/** Statuses that will not succeed on a later turn. */
const NON_RECOVERABLE_STATUS = new Set([400, 401, 403, 404]);

/** Connection errors, rate limits and server errors leave the run alive. */
export function isRecoverable(err: unknown): boolean {
  if (err instanceof OpenAI.APIError) {
    return err.status === undefined || !NON_RECOVERABLE_STATUS.has(err.status);
  }
  return true;
}

export interface GeneratorSettings {
  model: string;
  temperature: number;
  max_tokens: number;
}

/** Text generation through chat completions. Retries are the SDK's own. */
export class OpenAiTextGenerator implements TextGenerator {
  constructor(
    private readonly client: OpenAI,
    private readonly settings: GeneratorSettings,
  ) {}

  async generate(context: PromptContext): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.settings.model,
        temperature: this.settings.temperature,
        max_tokens: this.settings.max_tokens,
        messages: [
          { role: "system", content: AGENT_SYSTEM },
          { role: "user", content: renderPrompt(context) },
        ],
      });
      return completion.choices[0]?.message.content ?? "";
    } catch (err) {
      throw new GenerationError(`text generation failed: ${errorMessage(err)}`, {
        recoverable: isRecoverable(err),
        cause: err,
      });
    }
  }
}

/** Judging through chat completions with a strict JSON-schema response format. */
export class OpenAiJudgingClient implements JudgingClient {
  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
  ) {}

  async complete(request: JudgeRequest): Promise<unknown> {
    const completion = await this.client.chat.completions.create({
      model: this.model,
      temperature: request.temperature,
      max_tokens: request.max_tokens,
      messages: [
        { role: "system", content: request.system },
        { role: "user", content: request.prompt },
      ],
      response_format: zodResponseFormat(request.schema, request.name),
    });
    const content = completion.choices[0]?.message.content;
    if (!content) {
      return null;
    }
    const decoded: unknown = JSON.parse(content);
    return decoded;
  }
}

import Anthropic from "@anthropic-ai/sdk";
import type { CostTable } from "../config/worker-config";
import { TransientError } from "../core/errors";

export interface GenerationRequest {
  system: string;
  prompt: string;
  /** Overrides the configured output limit for this request. */
  maxTokens?: number;
}

export interface GenerationResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
  costMicros: number;
}

export interface ContentGenerator {
  generate(request: GenerationRequest, signal?: AbortSignal): Promise<GenerationResult>;
}

export const generationCost = (
  costs: CostTable,
  inputTokens: number,
  outputTokens: number,
): number =>
  inputTokens * costs.generationInputMicrosPerToken +
  outputTokens * costs.generationOutputMicrosPerToken;

/**
 * Largest output limit whose worst-case cost fits `budgetMicros`, given an
 * upper bound on input tokens. Never above `cap`.
 */
export const affordableOutputTokens = (
  costs: CostTable,
  budgetMicros: number,
  inputTokens: number,
  cap: number,
): number => {
  const left = budgetMicros - inputTokens * costs.generationInputMicrosPerToken;
  if (left <= 0) {
    return 0;
  }
  if (costs.generationOutputMicrosPerToken === 0) {
    return cap;
  }
  return Math.min(cap, Math.floor(left / costs.generationOutputMicrosPerToken));
};

/**
 * Pulls the outermost JSON object out of model output, tolerating code
 * fences and prose around it. Unparseable output is transient: the model
 * may do better on the next attempt.
 */
export const parseJsonObject = (text: string): unknown => {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end <= start) {
    throw new TransientError("model output contained no JSON object");
  }
  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch (error) {
    throw new TransientError("model output was not valid JSON", { cause: error });
  }
};

export interface AnthropicGeneratorOptions {
  apiKey?: string;
  model: string;
  maxTokens: number;
  costs: CostTable;
}

export class AnthropicContentGenerator implements ContentGenerator {
  private readonly client: Anthropic;

  constructor(private readonly options: AnthropicGeneratorOptions) {
    this.client = new Anthropic({
      ...(options.apiKey ? { apiKey: options.apiKey } : {}),
      maxRetries: 0,
    });
  }

  async generate(
    request: GenerationRequest,
    signal?: AbortSignal,
  ): Promise<GenerationResult> {
    const response = await this.client.messages.create(
      {
        model: this.options.model,
        max_tokens: request.maxTokens ?? this.options.maxTokens,
        system: request.system,
        messages: [{ role: "user", content: request.prompt }],
      },
      { signal },
    );

    const text = response.content
      .flatMap((block) => (block.type === "text" ? [block.text] : []))
      .join("");
    const inputTokens = response.usage.input_tokens;
    const outputTokens = response.usage.output_tokens;

    return {
      text,
      inputTokens,
      outputTokens,
      costMicros: generationCost(this.options.costs, inputTokens, outputTokens),
    };
  }
}

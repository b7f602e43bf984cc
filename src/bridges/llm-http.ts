import { z } from 'zod';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { CapabilityError, describeError } from '../workflow/errors.js';
import { isRecord } from '../workflow/state.js';
import type { TokenUsage } from '../workflow/types.js';
import { addUsage, EMPTY_USAGE } from '../workflow/types.js';
import type { LlmCapability, LlmRequest, LlmResponse, Tool } from './capabilities.js';

export const MAX_TOOL_ROUNDS = 5;

const toolCallSchema = z.object({
  id: z.string(),
  type: z.literal('function').default('function'),
  function: z.object({
    name: z.string(),
    arguments: z.string().default('{}'),
  }),
});

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable().default(null),
          tool_calls: z.array(toolCallSchema).optional(),
        }),
      }),
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number().int().nonnegative().default(0),
      completion_tokens: z.number().int().nonnegative().default(0),
      total_tokens: z.number().int().nonnegative().optional(),
    })
    .optional(),
});

type ToolCall = z.infer<typeof toolCallSchema>;

type ChatMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: ToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

export interface OpenAICompatibleLlmOptions {
  apiKey?: string;
  baseUrl?: string;
  fetchImpl?: typeof fetch;
}

/**
 * LLM capability over any OpenAI-compatible `/chat/completions` endpoint.
 * Replies are requested as JSON objects; tool calls are served from the node's
 * acquired tools for up to MAX_TOOL_ROUNDS rounds.
 */
export class OpenAICompatibleLlm implements LlmCapability {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;

  constructor(options: OpenAICompatibleLlmOptions = {}) {
    this.apiKey = options.apiKey ?? config.llm.apiKey;
    this.baseUrl = (options.baseUrl ?? config.llm.baseUrl).replace(/\/+$/, '');
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async invoke(request: LlmRequest): Promise<LlmResponse> {
    const messages: ChatMessage[] = [
      {
        role: 'system',
        content: `Respond with a single JSON object matching this JSON Schema:\n${JSON.stringify(request.outputShape)}`,
      },
      { role: 'user', content: request.prompt },
    ];
    let usage: TokenUsage = EMPTY_USAGE;

    for (let round = 0; round <= MAX_TOOL_ROUNDS; round++) {
      const completion = await this.complete(request, messages, round < MAX_TOOL_ROUNDS);
      usage = addUsage(usage, toUsage(completion.usage));

      const [choice] = completion.choices;
      if (!choice) {
        throw new CapabilityError('LLM response contained no choices', true);
      }
      const calls = choice.message.tool_calls ?? [];
      if (calls.length === 0) {
        return { payload: parsePayload(choice.message.content), usage };
      }

      messages.push({ role: 'assistant', content: choice.message.content, tool_calls: calls });
      for (const call of calls) {
        messages.push({ role: 'tool', tool_call_id: call.id, content: await runToolCall(request.tools, call) });
      }
    }

    throw new CapabilityError(`LLM kept calling tools after ${MAX_TOOL_ROUNDS} rounds`, false);
  }

  private async complete(
    request: LlmRequest,
    messages: ChatMessage[],
    allowTools: boolean,
  ): Promise<z.infer<typeof completionSchema>> {
    const { config: llm } = request;
    const baseUrl = (llm.apiBase ?? this.baseUrl).replace(/\/+$/, '');
    const body = {
      model: llm.model.includes('/') ? llm.model.slice(llm.model.indexOf('/') + 1) : llm.model,
      messages,
      response_format: { type: 'json_object' },
      ...(llm.temperature !== undefined ? { temperature: llm.temperature } : {}),
      ...(llm.maxTokens !== undefined ? { max_tokens: llm.maxTokens } : {}),
      ...(allowTools && request.tools.length > 0
        ? {
            tools: request.tools.map((tool) => ({
              type: 'function',
              function: {
                name: tool.name,
                description: tool.description ?? '',
                parameters: tool.parameters ?? { type: 'object', properties: {} },
              },
            })),
          }
        : {}),
    };

    let response: Response;
    try {
      response = await this.fetchImpl(`${baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          ...(this.apiKey ? { Authorization: `Bearer ${this.apiKey}` } : {}),
        },
        body: JSON.stringify(body),
        signal: request.signal,
      });
    } catch (error) {
      if (request.signal?.aborted) throw error;
      throw new CapabilityError(`LLM request failed: ${describeError(error)}`, true, { cause: error });
    }

    if (!response.ok) {
      const text = await response.text();
      logger.error(`HTTP error ${response.status}: ${text}`);
      throw new CapabilityError(
        `HTTP ${response.status}: ${text}`,
        response.status === 429 || response.status >= 500,
      );
    }

    const parsed = completionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new CapabilityError(`Malformed LLM response: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, false);
    }
    return parsed.data;
  }
}

function toUsage(usage: z.infer<typeof completionSchema>['usage']): TokenUsage {
  if (!usage) return EMPTY_USAGE;
  return {
    inputTokens: usage.prompt_tokens,
    outputTokens: usage.completion_tokens,
    totalTokens: usage.total_tokens ?? usage.prompt_tokens + usage.completion_tokens,
  };
}

/** JSON replies become objects; anything else is handed on as text for the output model to judge. */
function parsePayload(content: string | null): unknown {
  if (content === null) return null;
  const trimmed = content.trim();
  const fenced = /^```(?:json)?\s*([\s\S]*?)\s*```$/.exec(trimmed);
  const candidate = fenced?.[1] ?? trimmed;
  try {
    return JSON.parse(candidate);
  } catch {
    return content;
  }
}

async function runToolCall(tools: Tool[], call: ToolCall): Promise<string> {
  const tool = tools.find((candidate) => candidate.name === call.function.name);
  if (!tool) {
    return JSON.stringify({ error: `Unknown tool '${call.function.name}'` });
  }
  try {
    const args: unknown = JSON.parse(call.function.arguments);
    const result = await tool.invoke(isRecord(args) ? args : {});
    return typeof result === 'string' ? result : JSON.stringify(result ?? null);
  } catch (error) {
    logger.warn('Tool call failed', { tool: tool.name, error: describeError(error) });
    return JSON.stringify({ error: describeError(error) });
  }
}

import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import { ChatOllama } from '@langchain/ollama';
import { isAIMessage, type BaseMessage } from '@langchain/core/messages';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import type { StructuredToolInterface } from '@langchain/core/tools';
import { z } from 'zod';
import { MissingCredentialError } from '../utils/errors.js';
import { logDebug } from '../utils/logger.js';
import type { TokenUsage, ToolCallingModel } from '../agent/types.js';

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_TEMPERATURE = 0.7;

export interface ChatModelOptions {
  /** Session-supplied key; falls back to the provider's environment variable. */
  apiKey?: string;
  temperature?: number;
}

interface ModelOpts {
  temperature: number;
  apiKey?: string;
}

type ModelFactory = (name: string, opts: ModelOpts) => BaseChatModel;

export function getApiKey(envVar: string, providerName: string, override?: string): string {
  const apiKey = override?.trim() || process.env[envVar]?.trim();
  if (!apiKey) {
    throw new MissingCredentialError(envVar, providerName);
  }
  return apiKey;
}

const MODEL_PROVIDERS: Record<string, ModelFactory> = {
  'claude-': (name, opts) =>
    new ChatAnthropic({
      model: name,
      temperature: opts.temperature,
      apiKey: getApiKey('ANTHROPIC_API_KEY', 'Anthropic', opts.apiKey),
    }),
  'gemini-': (name, opts) =>
    new ChatGoogleGenerativeAI({
      model: name,
      temperature: opts.temperature,
      apiKey: getApiKey('GOOGLE_API_KEY', 'Google', opts.apiKey),
    }),
  'ollama:': (name, opts) =>
    new ChatOllama({
      model: name.replace(/^ollama:/, ''),
      temperature: opts.temperature,
      ...(process.env.OLLAMA_BASE_URL ? { baseUrl: process.env.OLLAMA_BASE_URL } : {}),
    }),
};

const DEFAULT_MODEL_FACTORY: ModelFactory = (name, opts) =>
  new ChatOpenAI({
    model: name,
    temperature: opts.temperature,
    apiKey: getApiKey('OPENAI_API_KEY', 'OpenAI', opts.apiKey),
  });

function providerPrefix(modelName: string): string | undefined {
  return Object.keys(MODEL_PROVIDERS).find((p) => modelName.startsWith(p));
}

export function getChatModel(modelName: string = DEFAULT_MODEL, options: ChatModelOptions = {}): BaseChatModel {
  const opts: ModelOpts = {
    temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    ...(options.apiKey ? { apiKey: options.apiKey } : {}),
  };
  const prefix = providerPrefix(modelName);
  const factory = prefix ? MODEL_PROVIDERS[prefix] : DEFAULT_MODEL_FACTORY;
  logDebug(`[LLM] creating model ${modelName} (provider prefix: ${prefix ?? 'openai'})`);
  return factory(modelName, opts);
}

/** Bind tools to a chat model, giving the agent loop its model seam. */
export function bindModelTools(llm: BaseChatModel, tools: StructuredToolInterface[]): ToolCallingModel {
  if (!llm.bindTools) {
    throw new Error(`Model ${llm.getName()} does not support tool calling`);
  }
  const bound = llm.bindTools(tools);
  return {
    invoke: (messages: BaseMessage[], options?: { signal?: AbortSignal }) => bound.invoke(messages, options),
  };
}

const OpenAIUsageSchema = z.object({
  usage: z.object({
    prompt_tokens: z.number().default(0),
    completion_tokens: z.number().default(0),
    total_tokens: z.number().optional(),
  }),
});

export function extractUsage(message: BaseMessage): TokenUsage | undefined {
  if (isAIMessage(message) && message.usage_metadata) {
    const { input_tokens, output_tokens, total_tokens } = message.usage_metadata;
    return { inputTokens: input_tokens, outputTokens: output_tokens, totalTokens: total_tokens };
  }

  const parsed = OpenAIUsageSchema.safeParse(message.response_metadata);
  if (parsed.success) {
    const u = parsed.data.usage;
    return {
      inputTokens: u.prompt_tokens,
      outputTokens: u.completion_tokens,
      totalTokens: u.total_tokens ?? u.prompt_tokens + u.completion_tokens,
    };
  }

  return undefined;
}

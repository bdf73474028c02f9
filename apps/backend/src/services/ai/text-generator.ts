import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { readNumberEnv } from '../../lib/load-env';

/**
 * Black-box text generation. Callers always hold a deterministic fallback: a failed or
 * timed-out call must never fail a run.
 */
export interface TextGenerator {
  generate(prompt: string, system: string | null, temperature: number): Promise<string>;
}

/** `main` for careful writing, `fast` for short drafts. */
export type TextModelTier = 'main' | 'fast';

const DEFAULT_MODEL = 'gpt-4o-mini';

export function resolveTextModel(tier: TextModelTier): string {
  const main = String(process.env.LLM_MODEL_MAIN || '').trim() || DEFAULT_MODEL;
  if (tier === 'main') return main;
  return String(process.env.LLM_MODEL_FAST || '').trim() || main;
}

export function isTextGenerationConfigured(): boolean {
  return Boolean(String(process.env.OPENAI_API_KEY || '').trim() || String(process.env.OPENAI_BASE_URL || '').trim());
}

/**
 * Chat-completions backed generator. Works against OpenAI or any compatible server
 * (`OPENAI_BASE_URL`, e.g. a local model host).
 */
export class OpenAiTextGenerator implements TextGenerator {
  private client: OpenAI | undefined;

  constructor(
    private readonly tier: TextModelTier = 'fast',
    client?: OpenAI
  ) {
    this.client = client;
  }

  private getClient(): OpenAI {
    if (!this.client) {
      const baseURL = String(process.env.OPENAI_BASE_URL || '').trim() || undefined;
      const apiKey = String(process.env.OPENAI_API_KEY || '').trim();
      if (!apiKey && !baseURL) {
        console.warn('[OpenAI] OPENAI_API_KEY is missing');
      }
      this.client = new OpenAI({
        // compatible local servers accept any key
        apiKey: apiKey || 'local',
        baseURL,
        timeout: readNumberEnv('LLM_TIMEOUT_MS', 180_000, 1_000),
        maxRetries: 1,
      });
    }
    return this.client;
  }

  async generate(prompt: string, system: string | null, temperature: number): Promise<string> {
    const messages: ChatCompletionMessageParam[] = [];
    if (system) messages.push({ role: 'system', content: system });
    messages.push({ role: 'user', content: prompt });

    const completion = await this.getClient().chat.completions.create({
      model: resolveTextModel(this.tier),
      messages,
      temperature,
    });
    return (completion.choices[0]?.message?.content ?? '').trim();
  }
}

/** A generator when one is configured, otherwise `null` (callers use templates). */
export function createTextGeneratorFromEnv(tier: TextModelTier = 'fast'): TextGenerator | null {
  return isTextGenerationConfigured() ? new OpenAiTextGenerator(tier) : null;
}

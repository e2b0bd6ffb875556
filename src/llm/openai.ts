import OpenAI, { APIConnectionTimeoutError, APIError } from 'openai';
import { AppConfig } from '../config.js';
import { ProviderTimeout, ProviderUnavailable } from '../agent/errors.js';
import { CompletionOptions, LLM } from './interfaces.js';

const DEFAULT_SYSTEM = 'You are a patient, encouraging study coach.';
const JSON_SYSTEM = 'Respond with ONLY a single JSON object matching the schema provided. No prose, no markdown.';

export class OpenAILLM implements LLM {
  name = 'openai';
  private client?: OpenAI;
  private model: string;

  constructor(cfg: AppConfig, modelOverride?: string, client?: OpenAI) {
    if (client) {
      this.client = client;
    } else if (cfg.OPENAI_API_KEY) {
      this.client = new OpenAI({ apiKey: cfg.OPENAI_API_KEY, timeout: cfg.LLM_TIMEOUT_MS, maxRetries: 1 });
    }
    this.model = modelOverride || cfg.OPENAI_MODEL;
  }

  async complete(prompt: string, opts: CompletionOptions = {}): Promise<string> {
    if (!this.client) throw new ProviderUnavailable('OPENAI_API_KEY is not set');
    const system = opts.system ?? (opts.json ? JSON_SYSTEM : DEFAULT_SYSTEM);
    try {
      const res = await this.client.chat.completions.create({
        model: this.model,
        messages: [{ role: 'system', content: system }, { role: 'user', content: prompt }],
        temperature: 0.2,
        ...(opts.json ? { response_format: { type: 'json_object' as const } } : {}),
      });
      const content = res.choices[0]?.message?.content ?? '';
      if (!opts.json) return content;
      return sanitizeToJson(content) ?? content;
    } catch (err) {
      // APIConnectionTimeoutError is a subclass of APIError, check it first
      if (err instanceof APIConnectionTimeoutError) {
        throw new ProviderTimeout(`OpenAI request timed out (${this.model})`, { cause: err });
      }
      if (err instanceof APIError) {
        throw new ProviderUnavailable(`OpenAI request failed: ${err.message}`, { cause: err });
      }
      throw err;
    }
  }
}

// Pull a single JSON object out of model output that may carry code fences or prose.
export function sanitizeToJson(content: string): string | null {
  if (!content) return null;
  let s = content.trim();
  s = s.replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/i, '').trim();
  if (parses(s)) return s;
  const start = s.indexOf('{');
  const end = s.lastIndexOf('}');
  if (start >= 0 && end > start) {
    const candidate = s.slice(start, end + 1).trim();
    if (parses(candidate)) return candidate;
  }
  return null;
}

function parses(s: string): boolean {
  try {
    JSON.parse(s);
    return true;
  } catch {
    return false;
  }
}

// packages/worker-agent/src/fallback.ts
import { z } from "zod";
import { UpstreamTimeoutError, UpstreamUnavailableError } from "@hopguard/errors";
import { DOMAINS } from "@hopguard/travel-core";

/**
 * Optional natural-language collaborator. It only ever returns text;
 * nothing it says can select or run a tool.
 */
export interface FallbackClassifier {
  classify(text: string): Promise<string>;
  generate(prompt: string): Promise<string>;
}

export interface ChatCompletionsOptions {
  /** Base URL of an OpenAI-compatible API, e.g. https://llm.internal/v1 */
  url: string;
  apiKey?: string;
  model: string;
  timeoutMs?: number;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
}

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
});

export const FALLBACK_CATEGORIES = [...DOMAINS, "none"] as const;

const CLASSIFY_PROMPT =
  `Classify the travel request into exactly one of: ${FALLBACK_CATEGORIES.join(", ")}. ` +
  "Answer with that single word.";

const ANSWER_PROMPT =
  "You are a travel assistant. Answer briefly. You cannot make, change or cancel bookings; " +
  "tell the user which request to send instead.";

export function createChatCompletionsFallback(opts: ChatCompletionsOptions): FallbackClassifier {
  const doFetch = opts.fetchImpl ?? fetch;
  const endpoint = `${opts.url.replace(/\/+$/, "")}/chat/completions`;
  const timeoutMs = opts.timeoutMs ?? 10_000;

  async function complete(system: string, user: string, maxTokens: number): Promise<string> {
    const ctrl = new AbortController();
    const t = setTimeout(() => ctrl.abort(), timeoutMs);
    let response: Response;
    try {
      response = await doFetch(endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(opts.apiKey ? { Authorization: `Bearer ${opts.apiKey}` } : {}),
        },
        body: JSON.stringify({
          model: opts.model,
          messages: [
            { role: "system", content: system },
            { role: "user", content: user },
          ],
          max_tokens: maxTokens,
          temperature: 0,
          stream: false,
        }),
        signal: ctrl.signal,
      });
    } catch (err) {
      if (ctrl.signal.aborted) {
        throw new UpstreamTimeoutError(`Fallback model timed out after ${timeoutMs}ms`);
      }
      throw new UpstreamUnavailableError(
        `Fallback model unreachable: ${err instanceof Error ? err.message : String(err)}`,
      );
    } finally {
      clearTimeout(t);
    }

    if (!response.ok) {
      throw new UpstreamUnavailableError(`Fallback model error: ${response.status}`);
    }
    const parsed = completionSchema.safeParse(await response.json().catch(() => undefined));
    if (!parsed.success) throw new UpstreamUnavailableError("Fallback model answer malformed");
    return (parsed.data.choices[0]?.message.content ?? "").trim();
  }

  return {
    async classify(text) {
      const answer = (await complete(CLASSIFY_PROMPT, text, 5)).toLowerCase();
      return FALLBACK_CATEGORIES.find((c) => answer.startsWith(c)) ?? "none";
    },
    generate(prompt) {
      return complete(ANSWER_PROMPT, prompt, opts.maxTokens ?? 300);
    },
  };
}

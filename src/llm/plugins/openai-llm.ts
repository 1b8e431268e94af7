/**
 * OpenAI-compatible chat completions backend with function calling.
 * Works against any endpoint that speaks the /chat/completions dialect
 * (OpenAI, OpenRouter, a local gateway).
 */

import { z } from "zod";
import { Logger } from "../../logger.js";
import { asError, cortexError, errorLogFields } from "../../errors.js";
import { timedFetch } from "../../utils/timed-fetch.js";
import { MAX_RETRIES, RETRY_BASE_MS, isRetryable, retryDelay, sleep } from "../../utils/retry.js";
import { buildFunctionSchemas, toolCallsToActions } from "../function-schemas.js";
import type { AgentAction } from "../../actions/base.js";
import type { CortexOutput } from "../../cortex-types.js";
import type { CortexLLM } from "../base.js";

export const openAiLlmSchema = z.object({
  base_url: z.string().url().default("https://api.openai.com/v1"),
  model: z.string().min(1).default("gpt-4o-mini"),
  api_key: z.string().optional(),
  timeout_ms: z.number().int().positive().default(30_000),
  temperature: z.number().min(0).max(2).optional(),
  retry_base_ms: z.number().int().nonnegative().default(RETRY_BASE_MS),
});

export type OpenAiLlmConfig = z.infer<typeof openAiLlmSchema>;

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z
          .object({
            content: z.string().nullable().optional(),
            tool_calls: z
              .array(
                z.object({
                  id: z.string().optional(),
                  function: z.object({ name: z.string(), arguments: z.string() }),
                }),
              )
              .optional(),
          })
          .passthrough(),
      }),
    )
    .min(1),
});

export class OpenAILLM implements CortexLLM {
  readonly name = "OpenAILLM";
  private readonly endpoint: string;

  constructor(private readonly config: OpenAiLlmConfig) {
    this.endpoint = `${config.base_url.replace(/\/+$/, "")}/chat/completions`;
  }

  async ask(prompt: string, actions: AgentAction[]): Promise<CortexOutput | null> {
    const started = Date.now();
    try {
      return await this.complete(prompt, actions);
    } catch (e: unknown) {
      const ce = cortexError("provider_error", `${this.name} request failed: ${asError(e).message}`, {
        plugin: this.name,
        latency_ms: Date.now() - started,
        cause: e,
      });
      Logger.error(`[LLM] ${this.name}:`, errorLogFields(ce));
      return null;
    }
  }

  private async complete(prompt: string, actions: AgentAction[]): Promise<CortexOutput | null> {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (this.config.api_key) headers["Authorization"] = `Bearer ${this.config.api_key}`;

    const tools = buildFunctionSchemas(actions);
    const payload: Record<string, unknown> = {
      model: this.config.model,
      messages: [{ role: "user", content: prompt }],
    };
    if (tools.length > 0) {
      payload.tools = tools;
      payload.tool_choice = "auto";
    }
    if (this.config.temperature !== undefined) payload.temperature = this.config.temperature;

    for (let attempt = 0; ; attempt++) {
      const res = await timedFetch(this.endpoint, {
        method: "POST",
        headers,
        body: JSON.stringify(payload),
        timeoutMs: this.config.timeout_ms,
        where: "llm:openai",
      });
      if (res.ok) return this.toOutput(await res.json());

      if (isRetryable(res.status) && attempt < MAX_RETRIES) {
        const delay = retryDelay(attempt, this.config.retry_base_ms);
        Logger.warn(`[LLM] ${res.status}, retry ${attempt + 1}/${MAX_RETRIES} in ${delay}ms`);
        await sleep(delay);
        continue;
      }
      const text = await res.text().catch(() => "");
      throw new Error(`chat completion failed (${res.status}): ${text}`);
    }
  }

  private toOutput(body: unknown): CortexOutput | null {
    const parsed = completionSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error(`unexpected completion shape: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    const message = parsed.data.choices[0].message;
    if (message.content) Logger.debug(`[LLM] ${message.content}`);
    const calls = message.tool_calls ?? [];
    if (calls.length === 0) return null;
    return { actions: toolCallsToActions(calls) };
  }
}

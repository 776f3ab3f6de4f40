// packages/cli/src/lib/completion.ts
// Prompt construction and response parsing around the completion endpoint

import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, generateText } from "ai";
import { z } from "zod";
import type { GeneratedMetadata } from "@headmeta/shared";
import {
  completionRequestFailed,
  invalidCompletionResponse,
  invalidOption,
} from "@headmeta/shared";

export interface CompletionSettings {
  /** Model identifier passed to the endpoint */
  model: string;
  /** Sampling temperature, between 0 and 1 */
  temperature: number;
}

export interface CompletionRequest extends CompletionSettings {
  system: string;
  prompt: string;
}

/** Sends one request to a completion service and returns its raw text */
export interface CompletionTransport {
  complete(request: CompletionRequest): Promise<string>;
}

export interface OpenAICredentials {
  apiKey: string;
  baseURL?: string;
}

const SYSTEM_PROMPT = "You are a helpful web copywriter";

const keywordList = z
  .union([z.array(z.string()), z.string().transform((value) => value.split(","))])
  .transform(dedupeKeywords)
  .pipe(z.array(z.string()).min(1, "no keywords"));

const responseSchema = z.object({
  description: z.string().trim().min(1, "description is empty"),
  keywords: keywordList,
});

function dedupeKeywords(keywords: string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of keywords) {
    const keyword = raw.trim();
    const key = keyword.toLowerCase();
    if (keyword === "" || seen.has(key)) continue;
    seen.add(key);
    result.push(keyword);
  }
  return result;
}

export function assertTemperature(value: number, name = "temperature"): number {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw invalidOption(name, String(value), "a number between 0 and 1");
  }
  return value;
}

export function buildCompletionRequest(
  body: string,
  settings: CompletionSettings
): CompletionRequest {
  const prompt = [
    "Content:",
    body,
    "--",
    "You will write the content for the meta tags of this article.",
    "The description should be approx. 180 characters long (2 to 3 sentences) and use a neutral tone.",
    "It should focus on what a reader can expect to learn from the article:",
    "not a summary, but an overview of the key results a reader will obtain.",
    "Then write a short list of keywords.",
    "",
    'Answer with a single JSON object of the form {"description": string, "keywords": string[]} and nothing else.',
  ].join("\n");

  return {
    model: settings.model,
    temperature: assertTemperature(settings.temperature),
    system: SYSTEM_PROMPT,
    prompt,
  };
}

/** Strip a surrounding markdown code fence, if the model added one */
function unwrapCodeFence(text: string): string {
  const match = text.trim().match(/^```[\w-]*\n([\s\S]*?)\n?```$/);
  return match ? match[1] : text.trim();
}

export function parseCompletionResponse(text: string): GeneratedMetadata {
  let json: unknown;
  try {
    json = JSON.parse(unwrapCodeFence(text));
  } catch {
    throw invalidCompletionResponse("response is not a JSON object");
  }

  const parsed = responseSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "response"}: ${issue.message}`)
      .join("; ");
    throw invalidCompletionResponse(detail);
  }

  return parsed.data;
}

function describeFailure(err: unknown): unknown {
  if (APICallError.isInstance(err)) {
    if (err.statusCode === 429) return new Error("rate limit hit", { cause: err });
    if (err.statusCode === 401 || err.statusCode === 403) {
      return new Error("authentication failed, check OPENAI_API_KEY", { cause: err });
    }
    return new Error(`API error ${err.statusCode ?? "unknown"}: ${err.message}`, { cause: err });
  }
  return err;
}

/**
 * Transport backed by an OpenAI chat model through the AI SDK.
 * Requests are never retried.
 */
export function createOpenAITransport(credentials: OpenAICredentials): CompletionTransport {
  const openai = createOpenAI({
    apiKey: credentials.apiKey,
    baseURL: credentials.baseURL,
  });

  return {
    async complete(request) {
      try {
        const { text } = await generateText({
          model: openai.chat(request.model),
          system: request.system,
          prompt: request.prompt,
          temperature: request.temperature,
          maxRetries: 0,
        });
        return text;
      } catch (err) {
        throw completionRequestFailed(describeFailure(err));
      }
    },
  };
}

/** Ask the completion service for a description and keywords of a markdown body */
export async function generateMetadata(
  body: string,
  settings: CompletionSettings,
  transport: CompletionTransport
): Promise<GeneratedMetadata> {
  const request = buildCompletionRequest(body, settings);
  const text = await transport.complete(request);
  return parseCompletionResponse(text);
}

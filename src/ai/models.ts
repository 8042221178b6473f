import OpenAI from "openai";

export interface ModelSettings {
  apiKey: string;
  model: string;
  transcribeModel: string;
}

export function createOpenAIClient(settings: Pick<ModelSettings, "apiKey">): OpenAI {
  return new OpenAI({ apiKey: settings.apiKey });
}

/**
 * Pull a JSON object out of a model reply. Tolerates replies wrapped in a
 * ```json fence even when JSON mode was requested.
 */
export function extractJSONObject(content: string): unknown {
  let body = content.trim();
  const fence = body.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fence) body = fence[1].trim();
  return JSON.parse(body);
}

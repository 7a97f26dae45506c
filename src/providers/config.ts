import { z } from "zod";
import { SpoolError } from "../errors/SpoolError.js";
import { formatZodError } from "../utils/zod.js";
import type { AnthropicProviderConfig } from "./types.js";

export const AnthropicProviderConfigSchema = z.object({
  "api-key": z.string().min(1, "api-key must not be empty"),
  "base-url": z.url().optional(),
}) satisfies z.ZodType<AnthropicProviderConfig>;

export function parseProviderConfig(input: unknown): AnthropicProviderConfig {
  const parsed = AnthropicProviderConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new SpoolError(`The provider config is not valid:\n${formatZodError(parsed.error)}`, {
      code: "INVALID_CONFIG",
    });
  }
  return parsed.data;
}

/**
 * Fills the keys missing from a partial config from the environment
 * (ANTHROPIC_API_KEY, ANTHROPIC_BASE_URL), then validates the result.
 */
export function resolveProviderConfig(
  config: Partial<AnthropicProviderConfig> = {},
  env: Record<string, string | undefined> = process.env,
): AnthropicProviderConfig {
  return parseProviderConfig({
    "api-key": config["api-key"] ?? env.ANTHROPIC_API_KEY,
    "base-url": config["base-url"] ?? env.ANTHROPIC_BASE_URL,
  });
}

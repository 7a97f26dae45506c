/**
 * How a provider-executed ("server") tool call is surfaced.
 *
 * `name` is the public tool name emitted on the tool-call chunk. When
 * `injectTypeDiscriminator` is set, the provider streams the arguments without
 * the `type` field that tells the variants of the tool apart, so the raw
 * provider name is written into the argument object ahead of the first fragment.
 */
export interface ServerToolStrategy {
  name: string;
  injectTypeDiscriminator: boolean;
}

export const SERVER_TOOL_STRATEGIES: Readonly<Record<string, ServerToolStrategy>> = {
  bash_code_execution: { name: "code_execution", injectTypeDiscriminator: true },
  text_editor_code_execution: { name: "code_execution", injectTypeDiscriminator: true },
};

export function getServerToolStrategy(
  providerName: string,
  strategies: Readonly<Record<string, ServerToolStrategy>> = SERVER_TOOL_STRATEGIES,
): ServerToolStrategy {
  if (Object.hasOwn(strategies, providerName)) {
    return strategies[providerName];
  }
  return { name: providerName, injectTypeDiscriminator: false };
}

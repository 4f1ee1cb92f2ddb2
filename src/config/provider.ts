import type { ProviderFactory } from "../core/index.js";
import type { ProviderName } from "./settings.js";

const providerFactories: Record<ProviderName, ProviderFactory> = {
  openai: () => import("../providers/openai/index.js"),
  anthropic: () => import("../providers/anthropic/index.js"),
};

export function providerFactoryFor(name: ProviderName): ProviderFactory {
  return providerFactories[name];
}

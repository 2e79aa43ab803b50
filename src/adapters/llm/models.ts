/**
 * Model catalogue and routing: friendly model name -> provider and provider model id.
 */

import type { ModelCatalogConfig } from "../../config";
import type { ProviderId } from "./types";

export type ModelCatalog = Record<ProviderId, ModelCatalogConfig>;

export function isKnownModel(catalog: ModelCatalogConfig, modelName: string): boolean {
  return Object.prototype.hasOwnProperty.call(catalog.modelIds, modelName);
}

/** Claude when the name is in the Claude catalogue, OpenAI when in OpenAI's, Claude otherwise. */
export function resolveProvider(modelName: string, catalog: ModelCatalog): ProviderId {
  if (isKnownModel(catalog.claude, modelName)) return "claude";
  if (isKnownModel(catalog.openai, modelName)) return "openai";
  return "claude";
}

/** Provider model id for a friendly name; unknown or missing names use the provider default. */
export function resolveModelId(catalog: ModelCatalogConfig, modelName?: string): string {
  if (modelName !== undefined && isKnownModel(catalog, modelName)) {
    return catalog.modelIds[modelName];
  }
  return catalog.modelIds[catalog.defaultModel] ?? catalog.defaultModel;
}

export function listModels(catalog: ModelCatalog): {
  claude: string[];
  openai: string[];
  defaultClaude: string;
  defaultOpenai: string;
} {
  return {
    claude: Object.keys(catalog.claude.modelIds),
    openai: Object.keys(catalog.openai.modelIds),
    defaultClaude: catalog.claude.defaultModel,
    defaultOpenai: catalog.openai.defaultModel,
  };
}

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import type { AppConfig } from "./config";
import { createChatModel } from "./llm";
import { createSearchClient, type SearchClient } from "./search";

/** Everything an agent needs; built once from the validated config and passed explicitly. */
export interface AnalysisContext {
  config: AppConfig;
  search: SearchClient;
  llm: BaseChatModel;
}

export function createAnalysisContext(config: AppConfig): AnalysisContext {
  return {
    config,
    search: createSearchClient(config),
    llm: createChatModel(config),
  };
}

import type { AppConfig } from "../../config/types";
import type { KnowledgeBase } from "../../knowledge/knowledgeBase";
import type { ChatProvider } from "../../llm/types";

export interface ServerContext {
    config: AppConfig;
    chat: ChatProvider;
    knowledgeBase: KnowledgeBase;
}

import type { RetrievalConfig } from "../config/types";
import type { KnowledgeBase } from "../knowledge/knowledgeBase";
import { assembleContext } from "../query/contextAssembler";

/**
 * Retrieves and assembles context for an agent's query. Returns the no-relevant-info sentinel when the
 * index has nothing to offer.
 */
export async function retrieveInfo(
    knowledgeBase: KnowledgeBase,
    query: string,
    retrieval: RetrievalConfig
): Promise<string> {
    const chunks = await knowledgeBase.retriever.retrieve(query, retrieval.topK);
    return assembleContext(chunks, retrieval.maxContextChunks);
}

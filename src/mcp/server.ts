#!/usr/bin/env node
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import { loadAppConfig } from "../config/loadConfig";
import { describeError } from "../errors";
import { createKnowledgeBase } from "../knowledge/knowledgeBase";
import { createLLMClients } from "../llm/factory";
import { configureLogger, getLogger } from "../utils/logger";
import { retrieveInfo } from "./retrieveInfo";

async function main(): Promise<void> {
    const config = await loadAppConfig(process.env.CAMPUS_RAG_CONFIG_PATH);

    // stdout carries the MCP protocol, so logs go to stderr.
    const logger = configureLogger({ ...config.logging, pretty: false }, process.stderr);
    const { embedder } = createLLMClients(config.llm, logger);
    const knowledgeBase = createKnowledgeBase(config, embedder, logger);
    await knowledgeBase.rebuild();

    const server = new McpServer({
        name: "Campus Knowledge Server",
        version: "1.0.0",
    });

    server.registerTool(
        "retrieve_info",
        {
            title: "Campus Knowledge Retrieval",
            description:
                "Search the campus knowledge base and return the most relevant passages for a query. Returns 'No relevant info found.' when nothing matches.",
            inputSchema: {
                query: z.string().describe("What to look up in the campus knowledge base."),
            },
        },
        async ({ query }) => {
            try {
                const text = await retrieveInfo(knowledgeBase, query, config.retrieval);
                return {
                    content: [{ type: "text", text }],
                };
            } catch (error) {
                logger.error({ err: error }, "retrieve_info failed.");
                return {
                    content: [{ type: "text", text: `Couldn't retrieve campus info: ${describeError(error)}` }],
                    isError: true,
                };
            }
        }
    );

    const transport = new StdioServerTransport();
    await server.connect(transport);
    logger.info("MCP server connected over stdio.");
}

main().catch((error) => {
    getLogger().error({ err: error }, "MCP server failed to start.");
    process.exitCode = 1;
});

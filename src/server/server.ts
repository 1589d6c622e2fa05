import type { Server } from "node:http";
import { once } from "node:events";
import express from "express";
import type { Logger } from "pino";
import { loadAppConfig } from "../config/loadConfig";
import { createKnowledgeBase } from "../knowledge/knowledgeBase";
import { createLLMClients } from "../llm/factory";
import { configureLogger, getLogger } from "../utils/logger";
import { createApiKeyMiddleware } from "./middleware/apiKey";
import { createApiRouter } from "./routers/api";
import { handleHealthRequest } from "./routes/health";
import type { ServerContext } from "./utils/context";
import { createErrorHandler } from "./utils/errors";

export interface ServerOptions {
    configPath?: string;
    port?: number;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    port: number;
    close(): Promise<void>;
}

async function buildContext(configPath?: string): Promise<ServerContext> {
    const config = await loadAppConfig(configPath);
    const logger = configureLogger(config.logging);
    logger.info({ document: config.knowledge.documentPath }, "Loaded server configuration.");

    const { embedder, chat } = createLLMClients(config.llm, logger);
    const knowledgeBase = createKnowledgeBase(config, embedder, logger);

    // Built before the server accepts traffic; a failure here stops startup.
    await knowledgeBase.rebuild();

    return { config, chat, knowledgeBase };
}

export function createApp(context: ServerContext, logger: Logger): ExpressApp {
    const apiKey = context.config.server.apiKey;
    if (!apiKey) {
        throw new Error("Server configuration must include CAMPUS_RAG_SERVER_API_KEY.");
    }

    const app = express();
    app.use(express.json());

    app.get("/health", (req, res) => {
        handleHealthRequest(req, res, context);
    });

    app.use(createApiKeyMiddleware(apiKey));
    app.use(createApiRouter(context, logger));
    app.use(createErrorHandler(logger));

    return app;
}

export async function createServer(options: ServerOptions = {}): Promise<{ app: ExpressApp; context: ServerContext }> {
    const context = await buildContext(options.configPath);
    return { app: createApp(context, getLogger()), context };
}

export async function listen(app: ExpressApp, port: number): Promise<Server> {
    const server = app.listen(port);
    await once(server, "listening");
    return server;
}

export async function closeServer(server: Server): Promise<void> {
    if (!server.listening) {
        return;
    }
    const closed = once(server, "close");
    server.close();
    server.closeAllConnections();
    await closed;
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context } = await createServer(options);
    const port = options.port ?? context.config.server.port;

    const server = await listen(app, port);
    getLogger().info({ port }, "Server listening.");

    return { app, port, close: () => closeServer(server) };
}

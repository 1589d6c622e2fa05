import readline from "node:readline/promises";
import type { Logger } from "pino";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import type { AppConfig } from "../config/types";
import { createKnowledgeBase, type KnowledgeBase } from "../knowledge/knowledgeBase";
import { createLLMClients } from "../llm/factory";
import type { ChatProvider } from "../llm/types";
import { askAi } from "../query/askAi";
import { configureLogger, getLogger } from "../utils/logger";

interface CliOptions {
    configPath: string;
    question?: string;
}

const EXIT_COMMANDS = new Set(["exit", "quit"]);

function printHelp(): void {
    const lines = [
        "Usage: ask [--config <path-to-env>] [question...]",
        "",
        "Builds the knowledge index, then answers the question given on the command line.",
        "Without a question it starts an interactive session; type 'exit' or 'quit' to leave.",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

function parseArgs(argv: string[]): CliOptions {
    let configPath: string | undefined;
    const words: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            printHelp();
            process.exit(0);
        }

        if (arg === "-c" || arg === "--config") {
            configPath = argv[i + 1];
            i += 1;
            continue;
        }

        words.push(arg);
    }

    const question = words.join(" ").trim();
    return {
        configPath: resolveConfigPath(configPath),
        question: question || undefined,
    };
}

interface Session {
    chat: ChatProvider;
    knowledgeBase: KnowledgeBase;
    config: AppConfig;
    logger: Logger;
}

async function answer(session: Session, question: string): Promise<void> {
    const response = await askAi(
        session.chat,
        session.knowledgeBase,
        { question, stream: true },
        { logger: session.logger, config: session.config }
    );

    for await (const text of response.stream) {
        process.stdout.write(text);
    }
    process.stdout.write("\n");
}

async function runInteractive(session: Session): Promise<void> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

    try {
        for (;;) {
            const line = (await rl.question("\nQuestion: ")).trim();
            if (EXIT_COMMANDS.has(line.toLowerCase())) {
                break;
            }
            if (!line) {
                continue;
            }

            try {
                await answer(session, line);
            } catch (error) {
                session.logger.error({ err: error }, "Failed to answer question.");
            }
        }
    } finally {
        rl.close();
    }
}

async function openSession(configPath: string): Promise<Session> {
    const config = await loadAppConfig(configPath);
    const logger = configureLogger(config.logging);
    logger.info({ configPath }, "Loaded configuration.");

    const { embedder, chat } = createLLMClients(config.llm, logger);
    const knowledgeBase = createKnowledgeBase(config, embedder, logger);
    await knowledgeBase.rebuild();

    return { chat, knowledgeBase, config, logger };
}

async function main(): Promise<void> {
    const options = parseArgs(process.argv.slice(2));
    const session = await openSession(options.configPath);

    if (options.question) {
        await answer(session, options.question);
    } else {
        await runInteractive(session);
    }
}

main().catch((error: unknown) => {
    getLogger().error({ err: error }, "Ask command failed.");
    process.exitCode = 1;
});

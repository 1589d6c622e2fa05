import { startServer, type RunningServer } from "./server";
import { getLogger } from "../utils/logger";

const SHUTDOWN_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

function stopOnSignal(running: RunningServer): void {
    const logger = getLogger();

    for (const signal of SHUTDOWN_SIGNALS) {
        process.once(signal, () => {
            logger.info({ signal }, "Shutting down server.");
            running.close().then(
                () => logger.info("Server closed."),
                (error: unknown) => {
                    logger.error({ err: error }, "Failed to close server.");
                    process.exitCode = 1;
                }
            );
        });
    }
}

startServer().then(stopOnSignal, (error: unknown) => {
    getLogger().error({ err: error }, "Failed to start server.");
    process.exitCode = 1;
});

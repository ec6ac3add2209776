import { createServer } from "http";
import { createApp } from "./app";
import { loadConfig } from "./config";
import { ListeningRoomRegistry } from "./services/listeningRoomRegistry";
import { NeteaseMusicProvider } from "./services/neteaseMusic";
import { QqMusicProvider } from "./services/qqMusic";
import { SongLookupService } from "./services/songLookup";
import { logger } from "./utils/logger";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 12_000;

async function main(): Promise<void> {
    const config = loadConfig();
    const providerOptions = { timeoutMs: config.lookupTimeoutMs };
    const lookup = new SongLookupService({
        providers: [
            new QqMusicProvider(providerOptions),
            new NeteaseMusicProvider(providerOptions),
        ],
    });
    const registry = new ListeningRoomRegistry({
        lookup,
        searchLimit: config.searchResultLimit,
    });

    const server = createServer(createApp({ config, registry }));
    server.listen(config.port, () => {
        logger.info(`circlecast API running on port ${config.port}`);
    });

    let shuttingDown = false;
    const shutdown = async (signal: string) => {
        if (shuttingDown) return;
        shuttingDown = true;
        logger.info(`[Shutdown] ${signal} received`);

        const forceExit = setTimeout(() => {
            logger.error("[Shutdown] Timed out waiting for open connections");
            process.exit(1);
        }, HTTP_SERVER_CLOSE_TIMEOUT_MS);
        forceExit.unref();

        await new Promise<void>((resolve) => server.close(() => resolve()));
        await registry.shutdown();
        process.exit(0);
    };

    for (const signal of ["SIGINT", "SIGTERM"] as const) {
        process.once(signal, () => {
            shutdown(signal).catch((error: unknown) => {
                logger.error("[Shutdown] Failed", error);
                process.exit(1);
            });
        });
    }
}

main().catch((error: unknown) => {
    logger.error("[Startup] Failed to start", error);
    process.exit(1);
});

import express from "express";
import cors from "cors";
import helmet from "helmet";
import type { AppConfig } from "./config";
import { createErrorHandler } from "./middleware/errorHandler";
import { roomCommandLimiter } from "./middleware/rateLimiter";
import { createRoomRouter } from "./routes/rooms";
import type { ListeningRoomRegistry } from "./services/listeningRoomRegistry";
import { logger } from "./utils/logger";

export interface AppDependencies {
    config: Pick<AppConfig, "nodeEnv" | "allowedOrigins">;
    registry: ListeningRoomRegistry;
}

export function createApp({ config, registry }: AppDependencies) {
    const app = express();
    const httpLogger = logger.child("http");

    app.use(helmet());
    app.use(
        cors({
            origin: config.allowedOrigins,
            allowedHeaders: ["content-type", "x-caller-id", "x-caller-name"],
        })
    );
    app.use(express.json({ limit: "16kb" }));

    app.use((req, res, next) => {
        const startedAt = Date.now();
        res.on("finish", () => {
            httpLogger.debug("Request complete", {
                method: req.method,
                path: req.path,
                status: res.statusCode,
                durationMs: Date.now() - startedAt,
            });
        });
        next();
    });

    app.get("/health", (_req, res) => {
        res.json({
            ok: true,
            uptimeSec: Math.round(process.uptime()),
            rooms: registry.diagnostics(),
        });
    });

    app.use("/api/rooms", roomCommandLimiter, createRoomRouter(registry));

    app.use(createErrorHandler(config.nodeEnv));

    return app;
}

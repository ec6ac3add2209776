import dotenv from "dotenv";
import { z } from "zod";
import { logger } from "./utils/logger";
import { parseEnvCsv, parseEnvInt } from "./utils/envParsers";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";

dotenv.config();

const DEFAULT_PORT = 3006;
const DEFAULT_LOOKUP_TIMEOUT_MS = 10_000;
const DEFAULT_SEARCH_RESULT_LIMIT = 5;

const envSchema = z.object({
    PORT: z.number().int().min(1).max(65_535),
    NODE_ENV: z.enum(["development", "production", "test"]),
    LOOKUP_TIMEOUT_MS: z.number().int().min(1).max(60_000),
    SEARCH_RESULT_LIMIT: z.number().int().min(1).max(30),
});

export interface AppConfig {
    port: number;
    nodeEnv: "development" | "production" | "test";
    /** Upper bound for every provider request. */
    lookupTimeoutMs: number;
    searchResultLimit: number;
    /** `true` allows any origin. */
    allowedOrigins: string[] | true;
}

/** Reads and validates runtime configuration from an env map. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const result = envSchema.safeParse({
        PORT: parseEnvInt(env.PORT, DEFAULT_PORT),
        NODE_ENV: env.NODE_ENV?.trim() || "development",
        LOOKUP_TIMEOUT_MS: parseEnvInt(
            env.LOOKUP_TIMEOUT_MS,
            DEFAULT_LOOKUP_TIMEOUT_MS
        ),
        SEARCH_RESULT_LIMIT: parseEnvInt(
            env.SEARCH_RESULT_LIMIT,
            DEFAULT_SEARCH_RESULT_LIMIT
        ),
    });

    if (!result.success) {
        logger.error("Environment validation failed:");
        result.error.errors.forEach((err) => {
            logger.error(`   - ${err.path.join(".")}: ${err.message}`);
        });
        throw new AppError(
            ErrorCode.INVALID_CONFIG,
            ErrorCategory.FATAL,
            "Invalid environment configuration",
            { issues: result.error.errors.map((err) => err.path.join(".")) }
        );
    }

    const parsed = result.data;
    const allowedOrigins = parseEnvCsv(env.ALLOWED_ORIGINS);

    return {
        port: parsed.PORT,
        nodeEnv: parsed.NODE_ENV,
        lookupTimeoutMs: parsed.LOOKUP_TIMEOUT_MS,
        searchResultLimit: parsed.SEARCH_RESULT_LIMIT,
        allowedOrigins:
            allowedOrigins ?? (parsed.NODE_ENV === "production" ? [] : true),
    };
}

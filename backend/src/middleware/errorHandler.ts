import type { NextFunction, Request, Response } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";

export const MALFORMED_BODY_GUIDANCE = "The request body must be valid JSON.";

// express.json() reports unparseable bodies as a SyntaxError tagged with this type.
function isBodyParseError(err: Error): boolean {
    return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

export function createErrorHandler(nodeEnv: string) {
    return function errorHandler(
        err: Error,
        _req: Request,
        res: Response,
        _next: NextFunction
    ) {
        if (isBodyParseError(err)) {
            logger.debug(`[Request] Malformed JSON body: ${err.message}`);
            return res.status(400).json({
                error: "Invalid request",
                code: ErrorCode.INVALID_REQUEST,
                message: MALFORMED_BODY_GUIDANCE,
            });
        }

        // Handle AppError with proper categorization
        if (err instanceof AppError) {
            let statusCode = 500;
            switch (err.category) {
                case ErrorCategory.RECOVERABLE:
                    statusCode = 400;
                    break;
                case ErrorCategory.TRANSIENT:
                    statusCode = 503;
                    break;
                case ErrorCategory.FATAL:
                    statusCode = 500;
                    break;
            }

            logger.error(`[AppError] ${err.code}: ${err.message}`, err.details ?? {});

            return res.status(statusCode).json({
                error: err.message,
                code: err.code,
                category: err.category,
                ...(nodeEnv === "development" && { details: err.details }),
            });
        }

        logger.error("Unhandled error:", err.stack);

        if (nodeEnv === "production") {
            return res.status(500).json({ error: "Internal server error" });
        }

        return res.status(500).json({
            error: err.message || "Internal server error",
            stack: err.stack,
        });
    };
}

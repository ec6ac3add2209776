import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode } from "../utils/errors";

export const CALLER_ID_HEADER = "x-caller-id";
export const CALLER_NAME_HEADER = "x-caller-name";
const ANONYMOUS_NAME = "Anonymous";

export interface Caller {
    id: string;
    displayName: string;
}

declare global {
    namespace Express {
        interface Request {
            caller?: Caller;
        }
    }
}

const callerIdSchema = z.string().trim().min(1).max(128);
const callerNameSchema = z.string().trim().min(1).max(64);

/**
 * Identity is whatever the chat platform says it is: the adapter in front of
 * this API forwards the sender id and display name as headers.
 */
export function requireCaller(req: Request, res: Response, next: NextFunction) {
    const id = callerIdSchema.safeParse(req.header(CALLER_ID_HEADER));
    if (!id.success) {
        return res.status(401).json({
            error: "Missing caller identity",
            code: ErrorCode.INVALID_REQUEST,
        });
    }

    const name = callerNameSchema.safeParse(req.header(CALLER_NAME_HEADER));
    req.caller = {
        id: id.data,
        displayName: name.success ? name.data : ANONYMOUS_NAME,
    };
    next();
}

export function callerOf(req: Request): Caller {
    if (!req.caller) {
        throw new AppError(
            ErrorCode.INVALID_REQUEST,
            ErrorCategory.RECOVERABLE,
            "Caller identity was not resolved"
        );
    }
    return req.caller;
}

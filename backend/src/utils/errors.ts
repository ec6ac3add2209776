/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can fix the request and retry
    TRANSIENT = "TRANSIENT", // Temporary upstream issue
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Room and registry conditions
    ROOM_ALREADY_EXISTS = "ROOM_ALREADY_EXISTS",
    NO_ACTIVE_ROOM = "NO_ACTIVE_ROOM",
    NOT_A_MEMBER = "NOT_A_MEMBER",
    OWNER_CANNOT_LEAVE = "OWNER_CANNOT_LEAVE",
    NOT_OWNER = "NOT_OWNER",
    INDEX_OUT_OF_RANGE = "INDEX_OUT_OF_RANGE",
    NO_PENDING_SEARCH = "NO_PENDING_SEARCH",

    // Provider failures, absorbed at the lookup boundary
    LOOKUP_FAILED = "LOOKUP_FAILED",

    // Request and configuration errors
    INVALID_REQUEST = "INVALID_REQUEST",
    INVALID_CONFIG = "INVALID_CONFIG",
}

export type ErrorDetails = Record<string, unknown>;

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly category: ErrorCategory,
        message: string,
        public readonly details?: ErrorDetails
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export type RoomErrorCode =
    | ErrorCode.ROOM_ALREADY_EXISTS
    | ErrorCode.NO_ACTIVE_ROOM
    | ErrorCode.NOT_A_MEMBER
    | ErrorCode.OWNER_CANNOT_LEAVE
    | ErrorCode.NOT_OWNER
    | ErrorCode.INDEX_OUT_OF_RANGE
    | ErrorCode.NO_PENDING_SEARCH;

/**
 * A room or registry invariant the caller ran into. Never fatal.
 */
export class RoomError extends AppError {
    constructor(
        public readonly code: RoomErrorCode,
        message: string,
        details?: ErrorDetails
    ) {
        super(code, ErrorCategory.RECOVERABLE, message, details);
        this.name = "RoomError";
    }
}

export function isRoomError(
    error: unknown,
    code?: RoomErrorCode
): error is RoomError {
    return error instanceof RoomError && (code === undefined || error.code === code);
}

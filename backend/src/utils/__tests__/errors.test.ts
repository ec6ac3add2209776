import { AppError, ErrorCategory, ErrorCode, RoomError, isRoomError } from "../errors";

describe("AppError", () => {
    it("serializes all expected fields in toJSON", () => {
        const error = new AppError(
            ErrorCode.LOOKUP_FAILED,
            ErrorCategory.TRANSIENT,
            "QQ Music search returned an unsuccessful status",
            { code: 500 }
        );

        expect(error.toJSON()).toEqual({
            name: "AppError",
            code: ErrorCode.LOOKUP_FAILED,
            category: ErrorCategory.TRANSIENT,
            message: "QQ Music search returned an unsuccessful status",
            details: { code: 500 },
        });
        expect(error).toBeInstanceOf(Error);
    });
});

describe("RoomError", () => {
    it("is always recoverable", () => {
        const error = new RoomError(ErrorCode.NOT_OWNER, "Only the owner can close the room");

        expect(error).toBeInstanceOf(AppError);
        expect(error.name).toBe("RoomError");
        expect(error.category).toBe(ErrorCategory.RECOVERABLE);
    });
});

describe("isRoomError", () => {
    const error = new RoomError(ErrorCode.NO_PENDING_SEARCH, "Search for a song before selecting one");

    it("matches any room error without a code", () => {
        expect(isRoomError(error)).toBe(true);
    });

    it("matches a specific code", () => {
        expect(isRoomError(error, ErrorCode.NO_PENDING_SEARCH)).toBe(true);
        expect(isRoomError(error, ErrorCode.NOT_A_MEMBER)).toBe(false);
    });

    it("rejects other errors", () => {
        expect(
            isRoomError(new AppError(ErrorCode.INVALID_REQUEST, ErrorCategory.RECOVERABLE, "bad"))
        ).toBe(false);
        expect(isRoomError(new Error("plain"))).toBe(false);
    });
});

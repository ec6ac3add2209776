/**
 * Chat command surface for listening rooms.
 *
 * Each route maps 1:1 onto a registry operation. Numbers arrive 1-based from
 * chat users and are converted to 0-based here; every reply carries a
 * `message` the chat adapter can post verbatim.
 */

import { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import { formatSongLine } from "@circlecast/song-contract";
import { callerOf, requireCaller } from "../middleware/callerIdentity";
import type { ListeningRoomRegistry } from "../services/listeningRoomRegistry";
import {
    formatMode,
    formatModeQuery,
    formatNowPlaying,
    formatPlaylist,
    formatRoomInfo,
    formatSearchResults,
    guidanceFor,
    HELP_TEXT,
    INVALID_NUMBER_GUIDANCE,
    MISSING_KEYWORD_GUIDANCE,
} from "../services/roomReplies";
import { ErrorCode, RoomError, type RoomErrorCode } from "../utils/errors";
import { logger } from "../utils/logger";

// ---------------------------------------------------------------------------
// Validation schemas
// ---------------------------------------------------------------------------

const scopeSchema = z.string().trim().min(1).max(128);

const oneBasedIndexSchema = z.coerce.number().int().min(1);

const indexBodySchema = z.object({ index: oneBasedIndexSchema });

const searchBodySchema = z.object({
    keyword: z.string().trim().min(1).max(100),
});

// Anything unusable becomes "", which the registry answers as a mode query.
const modeInputSchema = z.string().max(32).catch("");

// ---------------------------------------------------------------------------
// Error handler
// ---------------------------------------------------------------------------

const ROOM_ERROR_STATUS: Record<RoomErrorCode, number> = {
    [ErrorCode.ROOM_ALREADY_EXISTS]: 409,
    [ErrorCode.NO_ACTIVE_ROOM]: 404,
    [ErrorCode.NOT_A_MEMBER]: 403,
    [ErrorCode.OWNER_CANNOT_LEAVE]: 409,
    [ErrorCode.NOT_OWNER]: 403,
    [ErrorCode.INDEX_OUT_OF_RANGE]: 400,
    [ErrorCode.NO_PENDING_SEARCH]: 409,
};

class CommandInputError extends Error {
    constructor(readonly guidance: string, readonly issues: z.ZodIssue[]) {
        super(guidance);
        this.name = "CommandInputError";
    }
}

function parseInput<S extends z.ZodTypeAny>(
    schema: S,
    value: unknown,
    guidance: string
): z.infer<S> {
    const result: z.SafeParseReturnType<unknown, z.infer<S>> =
        schema.safeParse(value);
    if (!result.success) {
        throw new CommandInputError(guidance, result.error.errors);
    }
    return result.data;
}

function handleError(
    label: string,
    error: unknown,
    res: Response,
    next: NextFunction
) {
    if (error instanceof CommandInputError) {
        return res.status(400).json({
            error: "Invalid request",
            code: ErrorCode.INVALID_REQUEST,
            message: error.guidance,
            details: error.issues,
        });
    }
    if (error instanceof RoomError) {
        return res.status(ROOM_ERROR_STATUS[error.code]).json({
            error: error.message,
            code: error.code,
            message: guidanceFor(error.code),
        });
    }
    logger.debug(`[Rooms] ${label} failed with an unexpected error`);
    return next(error);
}

type CommandHandler = (req: Request, res: Response) => Promise<unknown>;

function command(label: string, handler: CommandHandler) {
    return async (req: Request, res: Response, next: NextFunction) => {
        try {
            await handler(req, res);
        } catch (error) {
            handleError(label, error, res, next);
        }
    };
}

function scopeOf(req: Request): string {
    return parseInput(scopeSchema, req.params.scope, "Unknown chat scope.");
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function createRoomRouter(registry: ListeningRoomRegistry): Router {
    const router = Router();

    router.get("/help", (_req, res) => {
        res.json({ message: HELP_TEXT });
    });

    router.use(requireCaller);

    router.post(
        "/:scope",
        command("create", async (req, res) => {
            const caller = callerOf(req);
            const room = await registry.createRoom(
                caller.id,
                caller.displayName,
                scopeOf(req)
            );
            return res.status(201).json({
                message: [
                    "Room created.",
                    `Owner: ${caller.displayName}`,
                    "Others can use `join` to enter and `search <keyword>` to add songs.",
                ].join("\n"),
                room,
            });
        })
    );

    router.get(
        "/:scope",
        command("info", async (req, res) => {
            const room = await registry.describeRoom(scopeOf(req));
            return res.json({ message: formatRoomInfo(room), room });
        })
    );

    router.delete(
        "/:scope",
        command("close", async (req, res) => {
            const evictedMembers = await registry.closeRoom(
                callerOf(req).id,
                scopeOf(req)
            );
            return res.json({ message: "Room closed.", evictedMembers });
        })
    );

    router.post(
        "/:scope/join",
        command("join", async (req, res) => {
            const caller = callerOf(req);
            const result = await registry.joinRoom(
                caller.id,
                caller.displayName,
                scopeOf(req)
            );
            const message =
                result.status === "already_member"
                    ? "You are already in this room."
                    : `${caller.displayName} joined the room.\nMembers: ${result.room.members.length}`;
            return res.json({ message, status: result.status, room: result.room });
        })
    );

    router.post(
        "/:scope/leave",
        command("leave", async (req, res) => {
            const displayName = await registry.leaveRoom(
                callerOf(req).id,
                scopeOf(req)
            );
            return res.json({ message: `${displayName} left the room.` });
        })
    );

    router.post(
        "/:scope/search",
        command("search", async (req, res) => {
            const groupScope = scopeOf(req);
            const { keyword } = parseInput(
                searchBodySchema,
                req.body ?? {},
                MISSING_KEYWORD_GUIDANCE
            );
            const songs = await registry.searchSongs(
                callerOf(req).id,
                groupScope,
                keyword
            );
            if (songs.length === 0) {
                return res.json({
                    message: "No songs found. Try another keyword.",
                    songs,
                });
            }
            return res.json({ message: formatSearchResults(songs), songs });
        })
    );

    router.post(
        "/:scope/select",
        command("select", async (req, res) => {
            const groupScope = scopeOf(req);
            const { index } = parseInput(
                indexBodySchema,
                req.body ?? {},
                INVALID_NUMBER_GUIDANCE
            );
            const caller = callerOf(req);
            const result = await registry.selectSong(caller.id, groupScope, index - 1);
            return res.json({
                message: [
                    `${caller.displayName} added a song`,
                    formatSongLine(result.song),
                    `The playlist now has ${result.playlistLength} songs.`,
                ].join("\n"),
                song: result.song,
                playlistLength: result.playlistLength,
            });
        })
    );

    router.get(
        "/:scope/playlist",
        command("playlist", async (req, res) => {
            const room = await registry.showPlaylist(callerOf(req).id, scopeOf(req));
            return res.json({
                message: formatPlaylist(room),
                playlist: room.playlist,
                currentIndex: room.currentIndex,
            });
        })
    );

    router.delete(
        "/:scope/playlist/:index",
        command("remove", async (req, res) => {
            const groupScope = scopeOf(req);
            const index = parseInput(
                oneBasedIndexSchema,
                req.params.index,
                INVALID_NUMBER_GUIDANCE
            );
            const song = await registry.removeSong(callerOf(req).id, groupScope, index - 1);
            return res.json({ message: `Removed: ${formatSongLine(song)}`, song });
        })
    );

    router.delete(
        "/:scope/playlist",
        command("clear", async (req, res) => {
            await registry.clearPlaylist(callerOf(req).id, scopeOf(req));
            return res.json({ message: "Playlist cleared." });
        })
    );

    router.post(
        "/:scope/play",
        command("play", async (req, res) => {
            const result = await registry.play(callerOf(req).id, scopeOf(req));
            switch (result.status) {
                case "empty":
                    return res.json({
                        message: "The playlist is empty. Add songs first.",
                        status: result.status,
                    });
                case "already_playing":
                    return res.json({
                        message: "Already playing.",
                        status: result.status,
                    });
                case "started":
                    return res.json({
                        message: formatNowPlaying("Now playing", result.nowPlaying),
                        status: result.status,
                        nowPlaying: result.nowPlaying,
                    });
            }
        })
    );

    router.post(
        "/:scope/pause",
        command("pause", async (req, res) => {
            const result = await registry.pause(callerOf(req).id, scopeOf(req));
            const message =
                result.status === "paused" ? "Paused." : "Nothing is playing.";
            return res.json({ message, status: result.status });
        })
    );

    router.post(
        "/:scope/next",
        command("next", async (req, res) => {
            const nowPlaying = await registry.next(callerOf(req).id, scopeOf(req));
            if (!nowPlaying) {
                return res.json({ message: "The playlist is empty.", nowPlaying });
            }
            return res.json({
                message: formatNowPlaying("Next song", nowPlaying),
                nowPlaying,
            });
        })
    );

    router.post(
        "/:scope/previous",
        command("previous", async (req, res) => {
            const nowPlaying = await registry.previous(callerOf(req).id, scopeOf(req));
            if (!nowPlaying) {
                return res.json({ message: "The playlist is empty.", nowPlaying });
            }
            return res.json({
                message: formatNowPlaying("Previous song", nowPlaying),
                nowPlaying,
            });
        })
    );

    router.post(
        "/:scope/jump",
        command("jump", async (req, res) => {
            const groupScope = scopeOf(req);
            const { index } = parseInput(
                indexBodySchema,
                req.body ?? {},
                INVALID_NUMBER_GUIDANCE
            );
            const nowPlaying = await registry.jumpTo(
                callerOf(req).id,
                groupScope,
                index - 1
            );
            return res.json({
                message: formatNowPlaying(`Switched to song ${index}`, nowPlaying),
                nowPlaying,
            });
        })
    );

    router.get(
        "/:scope/mode",
        command("mode", async (req, res) => {
            const room = await registry.showPlaylist(callerOf(req).id, scopeOf(req));
            return res.json({ message: formatModeQuery(room.mode), mode: room.mode });
        })
    );

    router.put(
        "/:scope/mode",
        command("mode", async (req, res) => {
            const groupScope = scopeOf(req);
            const mode = modeInputSchema.parse(req.body?.mode);
            const result = await registry.setMode(callerOf(req).id, groupScope, mode);
            const message =
                result.status === "query"
                    ? formatModeQuery(result.mode)
                    : formatMode(result.mode);
            return res.json({ message, status: result.status, mode: result.mode });
        })
    );

    return router;
}

/**
 * Process-wide coordinator for listening rooms.
 *
 * Owns the rooms (one per group scope), the (caller, scope) → room index and
 * every caller's pending search results. All state changes for a scope run
 * through that scope's single-concurrency queue, so commands from members of
 * the same room apply one at a time while other scopes proceed independently.
 *
 * Provider calls never run inside a scope's queue: the queue is released
 * before the lookup and re-entered to commit its result.
 */

import PQueue from "p-queue";
import { assignSongUrl, type Song } from "@circlecast/song-contract";
import { ErrorCode, RoomError } from "../utils/errors";
import { logger as rootLogger, type Logger } from "../utils/logger";
import {
    ListeningRoom,
    roomIdForScope,
    type ModeResult,
    type PauseResult,
    type RandomIndex,
    type RoomSnapshot,
} from "./listeningRoom";
import type { SongLookupService } from "./songLookup";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RegistryOptions {
    lookup: Pick<SongLookupService, "search" | "lookupPlayUrl">;
    searchLimit: number;
    logger?: Logger;
    /** Overrides the uniform random pick of new rooms (tests). */
    randomIndex?: RandomIndex;
}

export interface NowPlaying {
    song: Song;
    index: number;
    url: string;
}

export type JoinResult =
    | { status: "joined"; room: RoomSnapshot }
    | { status: "already_member"; room: RoomSnapshot };

export type PlayOutcome =
    | { status: "started"; nowPlaying: NowPlaying }
    | { status: "already_playing"; song: Song | null; index: number }
    | { status: "empty" };

export interface SelectResult {
    song: Song;
    url: string;
    playlistLength: number;
}

export interface RegistryDiagnostics {
    activeRooms: number;
    memberships: number;
    pendingSearches: number;
    busyScopes: number;
}

function membershipKey(callerId: string, groupScope: string): string {
    return JSON.stringify([callerId, groupScope]);
}

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export class ListeningRoomRegistry {
    private readonly rooms = new Map<string, ListeningRoom>();
    private readonly memberships = new Map<string, string>();
    /** scope → caller → last non-empty search. */
    private readonly pendingSearches = new Map<string, Map<string, Song[]>>();
    private readonly locks = new Map<string, PQueue>();
    private readonly lookup: RegistryOptions["lookup"];
    private readonly searchLimit: number;
    private readonly randomIndex?: RandomIndex;
    private readonly log: Logger;

    constructor(options: RegistryOptions) {
        this.lookup = options.lookup;
        this.searchLimit = options.searchLimit;
        this.randomIndex = options.randomIndex;
        this.log = options.logger ?? rootLogger.child("rooms");
    }

    // -----------------------------------------------------------------------
    // Room lifecycle
    // -----------------------------------------------------------------------

    createRoom(
        callerId: string,
        callerName: string,
        groupScope: string
    ): Promise<RoomSnapshot> {
        return this.withScope(groupScope, () => {
            const roomId = roomIdForScope(groupScope);
            if (this.rooms.has(roomId)) {
                throw new RoomError(
                    ErrorCode.ROOM_ALREADY_EXISTS,
                    "A room is already open in this chat",
                    { groupScope }
                );
            }

            const room = new ListeningRoom(
                groupScope,
                { userId: callerId, displayName: callerName },
                { randomIndex: this.randomIndex }
            );
            this.rooms.set(roomId, room);
            this.memberships.set(membershipKey(callerId, groupScope), roomId);

            this.log.info("Room created", { roomId, ownerId: callerId });
            return room.snapshot();
        });
    }

    joinRoom(
        callerId: string,
        callerName: string,
        groupScope: string
    ): Promise<JoinResult> {
        return this.withScope(groupScope, () => {
            const room = this.requireActiveRoom(groupScope);
            if (room.hasMember(callerId)) {
                this.memberships.set(membershipKey(callerId, groupScope), room.id);
                return { status: "already_member" as const, room: room.snapshot() };
            }

            room.addMember(callerId, callerName);
            this.memberships.set(membershipKey(callerId, groupScope), room.id);

            this.log.info("Member joined", { roomId: room.id, userId: callerId });
            return { status: "joined" as const, room: room.snapshot() };
        });
    }

    /** Returns the display name the caller had in the room. */
    leaveRoom(callerId: string, groupScope: string): Promise<string> {
        return this.withScope(groupScope, () => {
            const room = this.resolveRoomFor(callerId, groupScope);
            if (room.isOwner(callerId)) {
                throw new RoomError(
                    ErrorCode.OWNER_CANNOT_LEAVE,
                    "The owner cannot leave; close the room instead",
                    { roomId: room.id }
                );
            }

            const displayName =
                room.listMembers().find((member) => member.userId === callerId)
                    ?.displayName ?? callerId;
            room.removeMember(callerId);
            this.memberships.delete(membershipKey(callerId, groupScope));
            this.dropStash(callerId, groupScope);

            this.log.info("Member left", { roomId: room.id, userId: callerId });
            return displayName;
        });
    }

    /** Closes the room and evicts every member; returns how many were evicted. */
    closeRoom(callerId: string, groupScope: string): Promise<number> {
        return this.withScope(groupScope, () => {
            const room = this.requireActiveRoom(groupScope);
            if (!room.isOwner(callerId)) {
                throw new RoomError(
                    ErrorCode.NOT_OWNER,
                    "Only the owner can close the room",
                    { roomId: room.id }
                );
            }

            const memberIds = room.memberIds();
            for (const memberId of memberIds) {
                this.memberships.delete(membershipKey(memberId, groupScope));
            }
            this.pendingSearches.delete(groupScope);
            this.rooms.delete(room.id);

            this.log.info("Room closed", {
                roomId: room.id,
                evictedMembers: memberIds.length,
            });
            return memberIds.length;
        });
    }

    /** Room info is visible to anyone in the scope, member or not. */
    describeRoom(groupScope: string): Promise<RoomSnapshot> {
        return this.withScope(groupScope, () =>
            this.requireActiveRoom(groupScope).snapshot()
        );
    }

    /**
     * The room `callerId` belongs to in `groupScope`. Callers without a room
     * get NOT_A_MEMBER whether or not the scope has one.
     */
    resolveRoomFor(callerId: string, groupScope: string): ListeningRoom {
        const roomId = this.memberships.get(membershipKey(callerId, groupScope));
        const room = roomId ? this.rooms.get(roomId) : undefined;
        if (!room || !room.hasMember(callerId)) {
            throw new RoomError(
                ErrorCode.NOT_A_MEMBER,
                "You are not in a room in this chat",
                { groupScope }
            );
        }
        return room;
    }

    // -----------------------------------------------------------------------
    // Search staging
    // -----------------------------------------------------------------------

    stashSearchResults(
        callerId: string,
        groupScope: string,
        songs: Song[]
    ): Promise<void> {
        return this.withScope(groupScope, () => {
            this.resolveRoomFor(callerId, groupScope);
            this.stash(callerId, groupScope, songs);
        });
    }

    /** Consumes the caller's pending search. */
    takeSearchResults(callerId: string, groupScope: string): Promise<Song[]> {
        return this.withScope(groupScope, () => {
            const songs = this.peekStash(callerId, groupScope);
            this.dropStash(callerId, groupScope);
            return songs;
        });
    }

    async searchSongs(
        callerId: string,
        groupScope: string,
        keyword: string
    ): Promise<Song[]> {
        await this.withScope(groupScope, () =>
            this.resolveRoomFor(callerId, groupScope)
        );

        const songs = await this.lookup.search(keyword, this.searchLimit);
        if (songs.length === 0) return [];

        await this.stashSearchResults(callerId, groupScope, songs);
        return songs;
    }

    /**
     * Adds entry `index` (0-based) of the caller's pending search to the
     * playlist. An out-of-range index keeps the pending search.
     */
    async selectSong(
        callerId: string,
        groupScope: string,
        index: number
    ): Promise<SelectResult> {
        const song = await this.withScope(groupScope, () => {
            this.resolveRoomFor(callerId, groupScope);
            const songs = this.peekStash(callerId, groupScope);
            const picked = Number.isInteger(index) ? songs[index] : undefined;
            if (!picked) {
                throw new RoomError(
                    ErrorCode.INDEX_OUT_OF_RANGE,
                    "Search result index is out of range",
                    { index, length: songs.length }
                );
            }
            this.dropStash(callerId, groupScope);
            return picked;
        });

        const url = await this.lookup.lookupPlayUrl(song);

        return this.withScope(groupScope, () => {
            const room = this.resolveRoomFor(callerId, groupScope);
            const stored = assignSongUrl(song, url);
            const playlistLength = room.addSong(song);
            this.log.debug("Song added", {
                roomId: room.id,
                songId: song.id,
                source: song.source,
            });
            return { song, url: stored, playlistLength };
        });
    }

    // -----------------------------------------------------------------------
    // Playlist
    // -----------------------------------------------------------------------

    showPlaylist(callerId: string, groupScope: string): Promise<RoomSnapshot> {
        return this.withScope(groupScope, () =>
            this.resolveRoomFor(callerId, groupScope).snapshot()
        );
    }

    removeSong(callerId: string, groupScope: string, index: number): Promise<Song> {
        return this.withScope(groupScope, () =>
            this.resolveRoomFor(callerId, groupScope).removeSong(index)
        );
    }

    clearPlaylist(callerId: string, groupScope: string): Promise<void> {
        return this.withScope(groupScope, () => {
            const room = this.resolveRoomFor(callerId, groupScope);
            if (!room.isOwner(callerId)) {
                throw new RoomError(
                    ErrorCode.NOT_OWNER,
                    "Only the owner can clear the playlist",
                    { roomId: room.id }
                );
            }
            room.clear();
        });
    }

    setMode(callerId: string, groupScope: string, input: string): Promise<ModeResult> {
        return this.withScope(groupScope, () =>
            this.resolveRoomFor(callerId, groupScope).setMode(input)
        );
    }

    // -----------------------------------------------------------------------
    // Playback
    // -----------------------------------------------------------------------

    async play(callerId: string, groupScope: string): Promise<PlayOutcome> {
        const result = await this.withScope(groupScope, () =>
            this.resolveRoomFor(callerId, groupScope).play()
        );
        if (result.status !== "started") return result;

        const url = await this.resolveUrl(groupScope, result.song);
        return {
            status: "started",
            nowPlaying: { song: result.song, index: result.index, url },
        };
    }

    pause(callerId: string, groupScope: string): Promise<PauseResult> {
        return this.withScope(groupScope, () =>
            this.resolveRoomFor(callerId, groupScope).pause()
        );
    }

    /** `null` when the playlist is empty. */
    next(callerId: string, groupScope: string): Promise<NowPlaying | null> {
        return this.navigate(callerId, groupScope, (room) => room.advance());
    }

    /** `null` when the playlist is empty. */
    previous(callerId: string, groupScope: string): Promise<NowPlaying | null> {
        return this.navigate(callerId, groupScope, (room) => room.retreat());
    }

    async jumpTo(
        callerId: string,
        groupScope: string,
        index: number
    ): Promise<NowPlaying> {
        const song = await this.withScope(groupScope, () =>
            this.resolveRoomFor(callerId, groupScope).skipTo(index)
        );
        const url = await this.resolveUrl(groupScope, song);
        return { song, index, url };
    }

    // -----------------------------------------------------------------------
    // Lifecycle
    // -----------------------------------------------------------------------

    diagnostics(): RegistryDiagnostics {
        let pendingSearches = 0;
        for (const perScope of this.pendingSearches.values()) {
            pendingSearches += perScope.size;
        }
        let busyScopes = 0;
        for (const queue of this.locks.values()) {
            if (queue.size > 0 || queue.pending > 0) busyScopes++;
        }

        return {
            activeRooms: this.rooms.size,
            memberships: this.memberships.size,
            pendingSearches,
            busyScopes,
        };
    }

    /** Lets queued commands finish, then forgets every room. */
    async shutdown(): Promise<void> {
        await Promise.all(Array.from(this.locks.values(), (queue) => queue.onIdle()));
        const roomCount = this.rooms.size;
        this.rooms.clear();
        this.memberships.clear();
        this.pendingSearches.clear();
        this.locks.clear();
        this.log.info("Registry shut down", { droppedRooms: roomCount });
    }

    // -----------------------------------------------------------------------
    // Internal helpers
    // -----------------------------------------------------------------------

    private async navigate(
        callerId: string,
        groupScope: string,
        move: (room: ListeningRoom) => Song | null
    ): Promise<NowPlaying | null> {
        const moved = await this.withScope(groupScope, () => {
            const room = this.resolveRoomFor(callerId, groupScope);
            const song = move(room);
            return song ? { song, index: room.currentIndex } : null;
        });
        if (!moved) return null;

        const url = await this.resolveUrl(groupScope, moved.song);
        return { ...moved, url };
    }

    /** Lookup outside the scope queue, then a queued write onto the song. */
    private async resolveUrl(groupScope: string, song: Song): Promise<string> {
        const url = await this.lookup.lookupPlayUrl(song);
        return this.withScope(groupScope, () => assignSongUrl(song, url));
    }

    private requireActiveRoom(groupScope: string): ListeningRoom {
        const room = this.rooms.get(roomIdForScope(groupScope));
        if (!room) {
            throw new RoomError(
                ErrorCode.NO_ACTIVE_ROOM,
                "There is no room in this chat yet",
                { groupScope }
            );
        }
        return room;
    }

    private stash(callerId: string, groupScope: string, songs: Song[]): void {
        let perScope = this.pendingSearches.get(groupScope);
        if (!perScope) {
            perScope = new Map();
            this.pendingSearches.set(groupScope, perScope);
        }
        perScope.set(callerId, [...songs]);
    }

    private peekStash(callerId: string, groupScope: string): Song[] {
        const songs = this.pendingSearches.get(groupScope)?.get(callerId);
        if (!songs) {
            throw new RoomError(
                ErrorCode.NO_PENDING_SEARCH,
                "Search for a song before selecting one",
                { groupScope }
            );
        }
        return songs;
    }

    private dropStash(callerId: string, groupScope: string): void {
        const perScope = this.pendingSearches.get(groupScope);
        if (!perScope) return;
        perScope.delete(callerId);
        if (perScope.size === 0) this.pendingSearches.delete(groupScope);
    }

    private async withScope<T>(groupScope: string, run: () => T): Promise<T> {
        let queue = this.locks.get(groupScope);
        if (!queue) {
            queue = new PQueue({ concurrency: 1 });
            this.locks.set(groupScope, queue);
        }

        try {
            return await queue.add(() => run());
        } finally {
            this.releaseIdleLock(groupScope, queue);
        }
    }

    private releaseIdleLock(groupScope: string, queue: PQueue): void {
        if (queue.size > 0 || queue.pending > 0) return;
        if (this.locks.get(groupScope) !== queue) return;
        if (this.rooms.has(roomIdForScope(groupScope))) return;
        if (this.pendingSearches.has(groupScope)) return;
        this.locks.delete(groupScope);
    }
}

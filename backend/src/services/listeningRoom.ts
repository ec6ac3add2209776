/**
 * A listening room: one shared playlist, a playback cursor and the set of
 * members bound to a group scope.
 *
 * The room trusts its caller for permissions (owner-only operations and the
 * owner's membership are checked by the registry) and for serialization. Every method validates
 * before it mutates, so a thrown RoomError leaves the room untouched.
 */

import type { Song } from "@circlecast/song-contract";
import { ErrorCode, RoomError } from "../utils/errors";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PlayMode = "sequential" | "random";

export interface RoomIdentity {
    userId: string;
    displayName: string;
}

export type PlayResult =
    | { status: "started"; song: Song; index: number }
    | { status: "already_playing"; song: Song | null; index: number }
    | { status: "empty" };

export type PauseResult = { status: "paused" } | { status: "already_paused" };

export type ModeResult =
    | { status: "changed"; mode: PlayMode }
    | { status: "unchanged"; mode: PlayMode }
    | { status: "query"; mode: PlayMode };

/** Serialisable view returned to callers. */
export interface RoomSnapshot {
    id: string;
    groupScope: string;
    owner: RoomIdentity;
    members: RoomIdentity[];
    playlist: Song[];
    currentIndex: number;
    currentSong: Song | null;
    isPlaying: boolean;
    mode: PlayMode;
    createdAt: string;
}

export type RandomIndex = (length: number) => number;

const MODE_ALIASES: Record<string, PlayMode> = {
    sequential: "sequential",
    sequence: "sequential",
    order: "sequential",
    random: "random",
    shuffle: "random",
};

/** Maps free-form mode text to a mode, or null when unrecognised. */
export function parsePlayMode(input: string): PlayMode | null {
    return MODE_ALIASES[input.trim().toLowerCase()] ?? null;
}

export function roomIdForScope(groupScope: string): string {
    return `room_${groupScope}`;
}

const uniformRandomIndex: RandomIndex = (length) =>
    Math.floor(Math.random() * length);

function wrapIndex(index: number, length: number): number {
    return ((index % length) + length) % length;
}

// ---------------------------------------------------------------------------
// Room
// ---------------------------------------------------------------------------

export class ListeningRoom {
    readonly id: string;
    readonly owner: RoomIdentity;
    readonly createdAt: Date;

    private readonly playlist: Song[] = [];
    private readonly members = new Map<string, string>();
    private cursor = -1;
    private playing = false;
    private playMode: PlayMode = "sequential";
    private readonly randomIndex: RandomIndex;

    constructor(
        readonly groupScope: string,
        owner: RoomIdentity,
        options: { createdAt?: Date; randomIndex?: RandomIndex } = {}
    ) {
        this.id = roomIdForScope(groupScope);
        this.owner = { ...owner };
        this.createdAt = options.createdAt ?? new Date();
        this.randomIndex = options.randomIndex ?? uniformRandomIndex;
        this.members.set(owner.userId, owner.displayName);
    }

    // -----------------------------------------------------------------------
    // Read access
    // -----------------------------------------------------------------------

    get currentIndex(): number {
        return this.cursor;
    }

    get isPlaying(): boolean {
        return this.playing;
    }

    get mode(): PlayMode {
        return this.playMode;
    }

    get length(): number {
        return this.playlist.length;
    }

    songs(): Song[] {
        return [...this.playlist];
    }

    isOwner(userId: string): boolean {
        return this.owner.userId === userId;
    }

    hasMember(userId: string): boolean {
        return this.members.has(userId);
    }

    memberIds(): string[] {
        return Array.from(this.members.keys());
    }

    listMembers(): RoomIdentity[] {
        return Array.from(this.members, ([userId, displayName]) => ({
            userId,
            displayName,
        }));
    }

    currentSong(): Song | null {
        if (this.cursor < 0 || this.cursor >= this.playlist.length) return null;
        return this.playlist[this.cursor] ?? null;
    }

    snapshot(): RoomSnapshot {
        return {
            id: this.id,
            groupScope: this.groupScope,
            owner: { ...this.owner },
            members: this.listMembers(),
            playlist: this.songs(),
            currentIndex: this.cursor,
            currentSong: this.currentSong(),
            isPlaying: this.playing,
            mode: this.playMode,
            createdAt: this.createdAt.toISOString(),
        };
    }

    // -----------------------------------------------------------------------
    // Membership
    // -----------------------------------------------------------------------

    addMember(userId: string, displayName: string): void {
        this.members.set(userId, displayName);
    }

    /** Reports whether `userId` was present. */
    removeMember(userId: string): boolean {
        return this.members.delete(userId);
    }

    // -----------------------------------------------------------------------
    // Playlist
    // -----------------------------------------------------------------------

    addSong(song: Song): number {
        this.playlist.push(song);
        return this.playlist.length;
    }

    removeSong(index: number): Song {
        this.requireIndex(index);

        const [removed] = this.playlist.splice(index, 1);
        if (this.playlist.length === 0) {
            this.cursor = -1;
        } else if (this.cursor >= this.playlist.length) {
            this.cursor = this.playlist.length - 1;
        }
        return removed;
    }

    clear(): void {
        this.playlist.length = 0;
        this.cursor = -1;
        this.playing = false;
    }

    // -----------------------------------------------------------------------
    // Navigation
    // -----------------------------------------------------------------------

    advance(): Song | null {
        const length = this.playlist.length;
        if (length === 0) return null;

        this.cursor =
            this.playMode === "random"
                ? wrapIndex(this.randomIndex(length), length)
                : wrapIndex(this.cursor + 1, length);
        return this.currentSong();
    }

    /** Always steps back in playlist order, whatever the mode. */
    retreat(): Song | null {
        const length = this.playlist.length;
        if (length === 0) return null;

        this.cursor = wrapIndex(this.cursor - 1, length);
        return this.currentSong();
    }

    skipTo(index: number): Song {
        this.requireIndex(index);
        this.cursor = index;
        return this.playlist[index];
    }

    setMode(input: string): ModeResult {
        const mode = parsePlayMode(input);
        if (!mode) return { status: "query", mode: this.playMode };
        if (mode === this.playMode) return { status: "unchanged", mode };

        this.playMode = mode;
        return { status: "changed", mode };
    }

    // -----------------------------------------------------------------------
    // Playing flag
    // -----------------------------------------------------------------------

    play(): PlayResult {
        if (this.playlist.length === 0) return { status: "empty" };
        if (this.playing) {
            return {
                status: "already_playing",
                song: this.currentSong(),
                index: this.cursor,
            };
        }

        if (this.cursor < 0) this.cursor = 0;
        this.playing = true;
        return {
            status: "started",
            song: this.playlist[this.cursor],
            index: this.cursor,
        };
    }

    pause(): PauseResult {
        if (!this.playing) return { status: "already_paused" };
        this.playing = false;
        return { status: "paused" };
    }

    private requireIndex(index: number): void {
        if (!Number.isInteger(index) || index < 0 || index >= this.playlist.length) {
            throw new RoomError(
                ErrorCode.INDEX_OUT_OF_RANGE,
                "Song index is out of range",
                { index, length: this.playlist.length }
            );
        }
    }
}

import {
    formatDuration,
    formatSongLine,
    isDirectStreamUrl,
    SONG_SOURCE_LABELS,
    type Song,
} from "@circlecast/song-contract";
import { ErrorCode, type RoomErrorCode } from "../utils/errors";
import type { PlayMode, RoomSnapshot } from "./listeningRoom";
import type { NowPlaying } from "./listeningRoomRegistry";

const MODE_LABELS: Record<PlayMode, string> = {
    sequential: "sequential",
    random: "random",
};

const GUIDANCE: Record<RoomErrorCode, string> = {
    [ErrorCode.ROOM_ALREADY_EXISTS]:
        "This chat already has a room. Close it before creating a new one.",
    [ErrorCode.NO_ACTIVE_ROOM]:
        "There is no room in this chat. Create one with `create`.",
    [ErrorCode.NOT_A_MEMBER]: "You are not in a room. Join one with `join`.",
    [ErrorCode.OWNER_CANNOT_LEAVE]:
        "You own this room. Close it instead of leaving.",
    [ErrorCode.NOT_OWNER]: "Only the room owner can do that.",
    [ErrorCode.INDEX_OUT_OF_RANGE]: "That number is out of range.",
    [ErrorCode.NO_PENDING_SEARCH]:
        "Search for a song first, e.g. `search sunrise`.",
};

export const INVALID_NUMBER_GUIDANCE = "Please give a valid number, e.g. `select 1`.";
export const MISSING_KEYWORD_GUIDANCE = "Please give a song name, e.g. `search sunrise`.";

export const HELP_TEXT = [
    "Listening room commands",
    "",
    "Rooms",
    "  create - open a room in this chat",
    "  join - join the room",
    "  leave - leave the room",
    "  close - close the room (owner only)",
    "  info - show room details",
    "",
    "Songs",
    "  search <keyword> - search QQ Music, then NetEase",
    "  select <number> - add a search result to the playlist",
    "  playlist - show the playlist",
    "  remove <number> - remove a song",
    "  clear - empty the playlist (owner only)",
    "",
    "Playback",
    "  play / pause",
    "  next / previous",
    "  jump <number> - switch to a song",
    "  mode [sequential|random] - show or set the play mode",
].join("\n");

export function guidanceFor(code: RoomErrorCode): string {
    return GUIDANCE[code];
}

function sourceLabel(song: Song): string {
    return SONG_SOURCE_LABELS[song.source];
}

export function formatSearchResults(songs: Song[]): string {
    const lines = ["Search results:"];
    songs.forEach((song, i) => {
        lines.push(
            `  ${i + 1}. ${song.name} - ${song.artist} (${formatDuration(song.duration)}) [${sourceLabel(song)}]`
        );
    });
    lines.push("", "Use `select <number>` to add one to the playlist.");
    return lines.join("\n");
}

export function formatPlaylist(room: RoomSnapshot): string {
    if (room.playlist.length === 0) {
        return "The playlist is empty.";
    }

    const lines = ["Playlist:"];
    room.playlist.forEach((song, i) => {
        const isCurrent = i === room.currentIndex;
        const prefix = isCurrent ? "> " : `${i + 1}. `;
        const marker = isCurrent ? " [now playing]" : "";
        lines.push(
            `  ${prefix}${song.name} - ${song.artist} (${formatDuration(song.duration)}) [${sourceLabel(song)}]${marker}`
        );
    });
    return lines.join("\n");
}

export function formatNowPlaying(heading: string, nowPlaying: NowPlaying): string {
    const linkLabel = isDirectStreamUrl(nowPlaying.url) ? "Stream" : "Song page";
    return [
        heading,
        formatSongLine(nowPlaying.song),
        `Duration: ${formatDuration(nowPlaying.song.duration)}`,
        `${linkLabel}: ${nowPlaying.url}`,
    ].join("\n");
}

export function formatMode(mode: PlayMode): string {
    return `Play mode: ${MODE_LABELS[mode]}`;
}

export function formatModeQuery(mode: PlayMode): string {
    return [
        `Current play mode: ${MODE_LABELS[mode]}`,
        "Use `mode sequential` or `mode random` to switch.",
    ].join("\n");
}

export function formatRoomInfo(room: RoomSnapshot): string {
    const members = room.members.map((member) => member.displayName);
    const lines = [
        "Room info",
        `Owner: ${room.owner.displayName}`,
        `Members: ${members.length > 0 ? members.join(", ") : "none"}`,
        `Songs: ${room.playlist.length}`,
        `Status: ${room.isPlaying ? "playing" : "paused"}`,
        `Mode: ${MODE_LABELS[room.mode]}`,
    ];
    if (room.currentSong) {
        lines.push(`Current: ${formatSongLine(room.currentSong)}`);
    }
    return lines.join("\n");
}

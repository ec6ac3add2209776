export const SONG_SOURCE_VALUES = ["qq", "netease"] as const;

export type SongSource = (typeof SONG_SOURCE_VALUES)[number];

/** Fixed order in which providers are asked during a search. */
export const SONG_SOURCE_PRIORITY: readonly SongSource[] = ["qq", "netease"];

export const SONG_SOURCE_LABELS: Record<SongSource, string> = {
    qq: "QQ Music",
    netease: "NetEase Cloud Music",
};

const DIRECT_STREAM_EXTENSIONS = [".mp3", ".m4a", ".flac", ".ogg"];

export interface Song {
    readonly id: string;
    readonly name: string;
    /** Comma-joined artist names. */
    readonly artist: string;
    readonly album: string;
    /** Whole seconds. */
    readonly duration: number;
    /** Empty until resolved; see `assignSongUrl`. */
    url: string;
    readonly cover: string;
    readonly source: SongSource;
}

export interface SongInput {
    id: string | number;
    name?: unknown;
    artist?: unknown;
    album?: unknown;
    duration?: unknown;
    cover?: unknown;
    source: SongSource;
}

const normalizeString = (value: unknown): string => {
    if (typeof value === "string") {
        return value.trim();
    }
    if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
    }
    return "";
};

const normalizeArtist = (value: unknown): string => {
    if (Array.isArray(value)) {
        return value
            .map(normalizeString)
            .filter((name) => name.length > 0)
            .join(", ");
    }
    return normalizeString(value);
};

const normalizeDuration = (value: unknown): number => {
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
        return 0;
    }
    return Math.floor(value);
};

export const normalizeSongSource = (value: unknown): SongSource | null => {
    if (typeof value !== "string") {
        return null;
    }
    const normalized = value.trim().toLowerCase();
    if (normalized === "qq" || normalized === "tencent") {
        return "qq";
    }
    if (normalized === "netease" || normalized === "163") {
        return "netease";
    }
    return null;
};

export const createSong = (input: SongInput): Song => ({
    id: normalizeString(input.id),
    name: normalizeString(input.name),
    artist: normalizeArtist(input.artist),
    album: normalizeString(input.album),
    duration: normalizeDuration(input.duration),
    url: "",
    cover: normalizeString(input.cover),
    source: input.source,
});

/**
 * Stores a resolved playback URL on the song. The first non-empty URL wins;
 * later candidates are ignored. Returns the URL the song holds afterwards.
 */
export const assignSongUrl = (song: Song, url: string): string => {
    const candidate = url.trim();
    if (song.url.length === 0 && candidate.length > 0) {
        song.url = candidate;
    }
    return song.url;
};

/** Provider webpage for a song. Not a stream, but always available. */
export const buildSongPageUrl = (source: SongSource, id: string): string => {
    const encoded = encodeURIComponent(id);
    if (source === "qq") {
        return `https://y.qq.com/n/ryqq/songDetail/${encoded}`;
    }
    return `https://music.163.com/song?id=${encoded}`;
};

export const isDirectStreamUrl = (url: string): boolean => {
    const path = url.split(/[?#]/, 1)[0]?.toLowerCase() ?? "";
    return DIRECT_STREAM_EXTENSIONS.some((extension) => path.endsWith(extension));
};

export const formatDuration = (seconds: number): string => {
    const safe = normalizeDuration(seconds);
    const minutes = Math.floor(safe / 60);
    const rest = safe % 60;
    return `${minutes}:${String(rest).padStart(2, "0")}`;
};

export const formatSongLine = (song: Song): string =>
    `${song.name} - ${song.artist} [${SONG_SOURCE_LABELS[song.source]}]`;

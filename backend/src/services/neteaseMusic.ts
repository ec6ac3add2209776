import type { AxiosInstance } from "axios";
import { z } from "zod";
import {
    buildSongPageUrl,
    createSong,
    type Song,
} from "@circlecast/song-contract";
import { logger, withLogTiming } from "../utils/logger";
import {
    createProviderClient,
    lookupFailed,
    parseProviderBody,
    parseProviderItems,
    type ProviderClientOptions,
} from "./providerHttp";
import type { LookupProvider } from "./songLookup";

const SEARCH_URL = "https://music.163.com/api/search/get";
const PLAY_URL_ENDPOINT = "https://music.163.com/api/song/enhance/player/url";
const PLAY_BITRATE = 320_000;
const SONG_SEARCH_TYPE = 1;

const optionalString = z.string().optional().catch(undefined);

const neteaseSearchItemSchema = z.object({
    id: z.union([z.number(), z.string()]),
    name: optionalString,
    artists: z
        .array(z.object({ name: optionalString }).nullable())
        .optional()
        .catch(undefined),
    album: z
        .object({ name: optionalString, picUrl: optionalString })
        .optional()
        .catch(undefined),
    // milliseconds
    duration: z.number().optional().catch(undefined),
});

const neteaseSearchSchema = z.object({
    code: z.number(),
    result: z.object({ songs: z.array(z.unknown()).optional() }).optional(),
});

const neteasePlayUrlSchema = z.object({
    code: z.number(),
    data: z.array(z.object({ url: z.string().nullish() })).optional(),
});

/**
 * NetEase Cloud Music lookups via the legacy web API. Used as the second
 * search source and for every song it produced.
 */
export class NeteaseMusicProvider implements LookupProvider {
    readonly source = "netease" as const;
    private readonly client: AxiosInstance;
    private readonly log = logger.child("netease");

    constructor(options: ProviderClientOptions) {
        this.client = createProviderClient("https://music.163.com", options);
    }

    async search(keyword: string, limit: number): Promise<Song[]> {
        try {
            return await withLogTiming(
                this.log,
                "search",
                () => this.fetchSearch(keyword, limit),
                { keyword, limit }
            );
        } catch {
            return [];
        }
    }

    async resolvePlayUrl(song: Song): Promise<string> {
        try {
            const url = await withLogTiming(
                this.log,
                "resolve play url",
                () => this.fetchPlayUrl(song.id),
                { songId: song.id }
            );
            return url ?? buildSongPageUrl("netease", song.id);
        } catch {
            return buildSongPageUrl("netease", song.id);
        }
    }

    private async fetchSearch(keyword: string, limit: number): Promise<Song[]> {
        const response = await this.client.get(SEARCH_URL, {
            params: { s: keyword, type: SONG_SEARCH_TYPE, limit, offset: 0 },
        });

        const body = parseProviderBody(
            neteaseSearchSchema,
            response.data,
            "NetEase search"
        );
        if (body.code !== 200) {
            throw lookupFailed("NetEase search", { code: body.code });
        }

        return parseProviderItems(neteaseSearchItemSchema, body.result?.songs ?? [])
            .filter((item) => Boolean(item.name))
            .map((item) =>
                createSong({
                    id: item.id,
                    name: item.name,
                    artist: (item.artists ?? []).map((artist) => artist?.name ?? ""),
                    album: item.album?.name,
                    duration: Math.floor((item.duration ?? 0) / 1000),
                    cover: item.album?.picUrl,
                    source: "netease",
                })
            );
    }

    private async fetchPlayUrl(songId: string): Promise<string | null> {
        const response = await this.client.get(PLAY_URL_ENDPOINT, {
            params: { ids: `[${songId}]`, br: PLAY_BITRATE },
        });

        const body = parseProviderBody(
            neteasePlayUrlSchema,
            response.data,
            "NetEase player url"
        );
        if (body.code !== 200) {
            throw lookupFailed("NetEase player url", { code: body.code });
        }

        return body.data?.[0]?.url || null;
    }
}

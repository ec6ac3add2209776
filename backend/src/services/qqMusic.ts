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

const SEARCH_URL = "https://c.y.qq.com/soso/fcgi-bin/client_search_cp";
const PLAY_URL_ENDPOINT = "https://u.y.qq.com/cgi-bin/musicu.fcg";
const COVER_URL_PREFIX = "https://y.qq.com/music/photo_new/T002R300x300M000";
const GUEST_GUID = "1234567890";
const UNKNOWN_ARTIST = "Unknown artist";

const optionalString = z.string().optional().catch(undefined);

const qqSearchItemSchema = z.object({
    mid: optionalString,
    name: optionalString,
    singer: z
        .array(z.object({ name: optionalString }).nullable())
        .optional()
        .catch(undefined),
    album: z
        .object({ mid: optionalString, name: optionalString })
        .optional()
        .catch(undefined),
    interval: z.number().optional().catch(undefined),
});

const qqSearchSchema = z.object({
    code: z.number(),
    data: z
        .object({
            song: z.object({ list: z.array(z.unknown()).optional() }).optional(),
        })
        .optional(),
});

const qqPlayUrlSchema = z.object({
    req_0: z
        .object({
            code: z.number().optional(),
            data: z
                .object({
                    sip: z.array(z.string()).optional(),
                    midurlinfo: z
                        .array(z.object({ purl: z.string().optional() }))
                        .optional(),
                })
                .optional(),
        })
        .optional(),
});

type QqSearchItem = z.infer<typeof qqSearchItemSchema>;

function coverUrl(albumMid: string | undefined): string {
    return albumMid ? `${COVER_URL_PREFIX}${albumMid}.jpg` : "";
}

function toSong(item: QqSearchItem): Song | null {
    if (!item.mid || !item.name) return null;

    const singers = (item.singer ?? [])
        .map((singer) => singer?.name?.trim() ?? "")
        .filter((name) => name.length > 0);

    return createSong({
        id: item.mid,
        name: item.name,
        artist: singers.length > 0 ? singers : UNKNOWN_ARTIST,
        album: item.album?.name,
        duration: item.interval,
        cover: coverUrl(item.album?.mid),
        source: "qq",
    });
}

/**
 * QQ Music lookups against the public web endpoints. Search is unauthenticated;
 * stream links come from the guest vkey service and are often empty for
 * licensed tracks, in which case the song page is returned instead.
 */
export class QqMusicProvider implements LookupProvider {
    readonly source = "qq" as const;
    private readonly client: AxiosInstance;
    private readonly log = logger.child("qq");

    constructor(options: ProviderClientOptions) {
        this.client = createProviderClient("https://y.qq.com", options);
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
            return url ?? buildSongPageUrl("qq", song.id);
        } catch {
            return buildSongPageUrl("qq", song.id);
        }
    }

    private async fetchSearch(keyword: string, limit: number): Promise<Song[]> {
        const response = await this.client.get(SEARCH_URL, {
            params: {
                w: keyword,
                p: 1,
                n: limit,
                format: "json",
                aggr: 1,
                lossless: 0,
                cr: 1,
                new_json: 1,
            },
        });

        const body = parseProviderBody(qqSearchSchema, response.data, "QQ Music search");
        if (body.code !== 0) {
            throw lookupFailed("QQ Music search", { code: body.code });
        }

        const songs: Song[] = [];
        const items = parseProviderItems(qqSearchItemSchema, body.data?.song?.list ?? []);
        for (const item of items) {
            const song = toSong(item);
            if (song) songs.push(song);
        }
        return songs;
    }

    /** `null` when the vkey service has no stream for this song. */
    private async fetchPlayUrl(songMid: string): Promise<string | null> {
        const payload = {
            req_0: {
                module: "vkey.GetVkeyServer",
                method: "CgiGetVkey",
                param: {
                    guid: GUEST_GUID,
                    songmid: [songMid],
                    songtype: [0],
                    uin: "0",
                    loginflag: 1,
                    platform: "20",
                },
            },
        };

        const response = await this.client.get(PLAY_URL_ENDPOINT, {
            params: { data: JSON.stringify(payload) },
        });

        const body = parseProviderBody(qqPlayUrlSchema, response.data, "QQ Music vkey");
        const result = body.req_0;
        if (result?.code !== 0) {
            throw lookupFailed("QQ Music vkey", { code: result?.code ?? null });
        }

        const purl = result.data?.midurlinfo?.[0]?.purl;
        if (!purl) return null;

        const host = result.data?.sip?.[0] ?? "";
        return `${host}${purl}`;
    }
}

/**
 * Song lookup across the configured providers.
 *
 * Search walks providers in fixed priority order and returns the first
 * non-empty result. Playback URLs are resolved by the provider that produced
 * the song and cached on the Song instance, so navigating back to a song
 * never repeats the network call.
 */

import {
    assignSongUrl,
    buildSongPageUrl,
    SONG_SOURCE_PRIORITY,
    type Song,
    type SongSource,
} from "@circlecast/song-contract";
import { logger as rootLogger, type Logger } from "../utils/logger";

/**
 * Contract every provider honours: neither method rejects. Search failures
 * come back as `[]`, URL failures as the provider's song page.
 */
export interface LookupProvider {
    readonly source: SongSource;
    search(keyword: string, limit: number): Promise<Song[]>;
    resolvePlayUrl(song: Song): Promise<string>;
}

export interface SongLookupOptions {
    providers: LookupProvider[];
    logger?: Logger;
}

export class SongLookupService {
    private readonly providers = new Map<SongSource, LookupProvider>();
    private readonly inFlight = new WeakMap<Song, Promise<string>>();
    private readonly log: Logger;

    constructor(options: SongLookupOptions) {
        for (const provider of options.providers) {
            this.providers.set(provider.source, provider);
        }
        this.log = options.logger ?? rootLogger.child("lookup");
    }

    async search(keyword: string, limit: number): Promise<Song[]> {
        const trimmed = keyword.trim();
        if (!trimmed || limit <= 0) return [];

        for (const source of SONG_SOURCE_PRIORITY) {
            const provider = this.providers.get(source);
            if (!provider) continue;

            const songs = await this.searchWith(provider, trimmed, limit);
            if (songs.length > 0) {
                this.log.debug("Search answered", {
                    source,
                    keyword: trimmed,
                    count: songs.length,
                });
                return songs.slice(0, limit);
            }
        }

        this.log.info("Search found nothing", { keyword: trimmed });
        return [];
    }

    /**
     * URL for `song` without writing it. Concurrent and repeated calls for
     * the same Song instance share one provider request.
     */
    lookupPlayUrl(song: Song): Promise<string> {
        if (song.url) return Promise.resolve(song.url);

        const pending = this.inFlight.get(song);
        if (pending) return pending;

        const request = this.fetchPlayUrl(song);
        this.inFlight.set(song, request);
        return request;
    }

    /** Resolves and caches the URL on the song. */
    async resolvePlayUrl(song: Song): Promise<string> {
        const url = await this.lookupPlayUrl(song);
        return assignSongUrl(song, url);
    }

    private async searchWith(
        provider: LookupProvider,
        keyword: string,
        limit: number
    ): Promise<Song[]> {
        try {
            return await provider.search(keyword, limit);
        } catch (error) {
            this.log.warn("Provider search rejected", {
                source: provider.source,
                keyword,
                error,
            });
            return [];
        }
    }

    private async fetchPlayUrl(song: Song): Promise<string> {
        const fallback = buildSongPageUrl(song.source, song.id);
        const provider = this.providers.get(song.source);
        if (!provider) {
            this.log.warn("No provider registered for song source", {
                source: song.source,
                songId: song.id,
            });
            return fallback;
        }

        try {
            const url = await provider.resolvePlayUrl(song);
            return url || fallback;
        } catch (error) {
            this.log.warn("Provider URL resolution rejected", {
                source: song.source,
                songId: song.id,
                error,
            });
            return fallback;
        }
    }
}

import { createSong, type Song, type SongSource } from "@circlecast/song-contract";
import { ErrorCode, isRoomError, type RoomErrorCode } from "../../utils/errors";
import { createLogger } from "../../utils/logger";
import { ListeningRoomRegistry } from "../listeningRoomRegistry";
import { SongLookupService } from "../songLookup";

const song = (id: string, name: string, source: SongSource = "qq"): Song =>
    createSong({ id, name, artist: "Alpha", album: "Dawn", duration: 200, source });

function fakeProvider(source: SongSource) {
    return {
        source,
        search: jest.fn<Promise<Song[]>, [string, number]>().mockResolvedValue([]),
        resolvePlayUrl: jest.fn<Promise<string>, [Song]>(
            async (item) => `https://cdn.example/${source}/${item.id}.mp3`
        ),
    };
}

function deferred<T>() {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((done) => {
        resolve = done;
    });
    return { promise, resolve };
}

async function expectRoomError(promise: Promise<unknown>, code: RoomErrorCode) {
    let caught: unknown;
    try {
        await promise;
    } catch (error) {
        caught = error;
    }
    expect(isRoomError(caught, code)).toBe(true);
}

describe("ListeningRoomRegistry", () => {
    const scope = "group-42";
    let qq: ReturnType<typeof fakeProvider>;
    let netease: ReturnType<typeof fakeProvider>;
    let registry: ListeningRoomRegistry;

    beforeEach(() => {
        qq = fakeProvider("qq");
        netease = fakeProvider("netease");
        const logger = createLogger("registry-test");
        registry = new ListeningRoomRegistry({
            lookup: new SongLookupService({ providers: [qq, netease], logger }),
            searchLimit: 5,
            logger,
        });
    });

    async function openRoomWithMember() {
        await registry.createRoom("owner", "Olivia", scope);
        await registry.joinRoom("member", "Mason", scope);
    }

    describe("room lifecycle", () => {
        it("rejects a second room in the same scope", async () => {
            const room = await registry.createRoom("owner", "Olivia", scope);

            expect(room.id).toBe("room_group-42");
            expect(room.owner).toEqual({ userId: "owner", displayName: "Olivia" });
            await expectRoomError(
                registry.createRoom("someone-else", "Sam", scope),
                ErrorCode.ROOM_ALREADY_EXISTS
            );
        });

        it("lets exactly one of two concurrent creates win", async () => {
            const results = await Promise.allSettled([
                registry.createRoom("a", "Ann", scope),
                registry.createRoom("b", "Ben", scope),
            ]);

            expect(results.map((result) => result.status)).toEqual([
                "fulfilled",
                "rejected",
            ]);
            expect(registry.diagnostics().activeRooms).toBe(1);
        });

        it("keeps scopes independent", async () => {
            await Promise.all([
                registry.createRoom("owner", "Olivia", "group-a"),
                registry.createRoom("owner", "Olivia", "group-b"),
            ]);

            expect(registry.diagnostics()).toEqual({
                activeRooms: 2,
                memberships: 2,
                pendingSearches: 0,
                busyScopes: 0,
            });
        });

        it("reports joins and repeated joins", async () => {
            await registry.createRoom("owner", "Olivia", scope);

            const first = await registry.joinRoom("member", "Mason", scope);
            const second = await registry.joinRoom("member", "Mason", scope);

            expect(first.status).toBe("joined");
            expect(second.status).toBe("already_member");
            expect(second.room.members).toHaveLength(2);
        });

        it("rejects joins when the scope has no room", async () => {
            await expectRoomError(
                registry.joinRoom("member", "Mason", scope),
                ErrorCode.NO_ACTIVE_ROOM
            );
        });

        it("lets members leave but not the owner", async () => {
            await openRoomWithMember();

            await expectRoomError(registry.leaveRoom("owner", scope), ErrorCode.OWNER_CANNOT_LEAVE);
            await expect(registry.leaveRoom("member", scope)).resolves.toBe("Mason");
            await expectRoomError(registry.leaveRoom("member", scope), ErrorCode.NOT_A_MEMBER);
            await expectRoomError(registry.showPlaylist("member", scope), ErrorCode.NOT_A_MEMBER);

            const room = await registry.describeRoom(scope);
            expect(room.members).toEqual([{ userId: "owner", displayName: "Olivia" }]);
        });

        it("only lets the owner close the room and evicts everyone", async () => {
            await openRoomWithMember();

            await expectRoomError(registry.closeRoom("member", scope), ErrorCode.NOT_OWNER);
            await expect(registry.closeRoom("owner", scope)).resolves.toBe(2);

            await expectRoomError(registry.showPlaylist("owner", scope), ErrorCode.NOT_A_MEMBER);
            await expectRoomError(registry.showPlaylist("member", scope), ErrorCode.NOT_A_MEMBER);
            await expectRoomError(registry.describeRoom(scope), ErrorCode.NO_ACTIVE_ROOM);
            await expectRoomError(registry.closeRoom("owner", scope), ErrorCode.NO_ACTIVE_ROOM);
            expect(registry.diagnostics().memberships).toBe(0);

            await expect(registry.createRoom("member", "Mason", scope)).resolves.toMatchObject({
                owner: { userId: "member", displayName: "Mason" },
            });
        });

        it("treats a caller outside the scope as a non-member", async () => {
            await registry.createRoom("owner", "Olivia", scope);

            expect(() => registry.resolveRoomFor("owner", "other-group")).toThrow(
                "You are not in a room in this chat"
            );
            expect(registry.resolveRoomFor("owner", scope).id).toBe("room_group-42");
        });
    });

    describe("search and select", () => {
        it("stashes search results per caller", async () => {
            await openRoomWithMember();
            qq.search.mockResolvedValueOnce([song("001", "Sunrise"), song("002", "Sunset")]);

            const results = await registry.searchSongs("member", scope, "sun");
            expect(results.map((item) => item.id)).toEqual(["001", "002"]);
            expect(qq.search).toHaveBeenCalledWith("sun", 5);

            const selected = await registry.selectSong("member", scope, 0);
            expect(selected).toMatchObject({
                url: "https://cdn.example/qq/001.mp3",
                playlistLength: 1,
            });
            expect(selected.song.url).toBe("https://cdn.example/qq/001.mp3");

            await expectRoomError(registry.selectSong("owner", scope, 0), ErrorCode.NO_PENDING_SEARCH);
            await expectRoomError(registry.selectSong("member", scope, 1), ErrorCode.NO_PENDING_SEARCH);

            const playlist = await registry.showPlaylist("owner", scope);
            expect(playlist.playlist.map((item) => item.id)).toEqual(["001"]);
        });

        it("falls back to the second provider and keeps an earlier stash on empty results", async () => {
            await openRoomWithMember();
            netease.search.mockResolvedValueOnce([song("1827", "Sunrise", "netease")]);

            await registry.searchSongs("member", scope, "sunrise");
            await expect(registry.searchSongs("member", scope, "zzzz")).resolves.toEqual([]);

            const selected = await registry.selectSong("member", scope, 0);
            expect(selected.song.source).toBe("netease");
            expect(selected.url).toBe("https://cdn.example/netease/1827.mp3");
        });

        it("keeps the stash when the selected index is out of range", async () => {
            await openRoomWithMember();
            qq.search.mockResolvedValueOnce([song("001", "Sunrise")]);
            await registry.searchSongs("member", scope, "sun");

            await expectRoomError(registry.selectSong("member", scope, 3), ErrorCode.INDEX_OUT_OF_RANGE);
            await expectRoomError(registry.selectSong("member", scope, -1), ErrorCode.INDEX_OUT_OF_RANGE);
            await expect(registry.selectSong("member", scope, 0)).resolves.toMatchObject({
                playlistLength: 1,
            });
        });

        it("consumes a stash only once under concurrent selects", async () => {
            await openRoomWithMember();
            qq.search.mockResolvedValueOnce([song("001", "Sunrise"), song("002", "Sunset")]);
            await registry.searchSongs("member", scope, "sun");

            const results = await Promise.allSettled([
                registry.selectSong("member", scope, 0),
                registry.selectSong("member", scope, 1),
            ]);

            expect(results[0].status).toBe("fulfilled");
            expect(results[1].status).toBe("rejected");
            expect(
                results[1].status === "rejected" &&
                    isRoomError(results[1].reason, ErrorCode.NO_PENDING_SEARCH)
            ).toBe(true);
            expect(qq.resolvePlayUrl).toHaveBeenCalledTimes(1);
        });

        it("refuses searches from non-members without calling a provider", async () => {
            await registry.createRoom("owner", "Olivia", scope);

            await expectRoomError(registry.searchSongs("stranger", scope, "sun"), ErrorCode.NOT_A_MEMBER);
            expect(qq.search).not.toHaveBeenCalled();
        });

        it("hands a stash out once through takeSearchResults", async () => {
            await openRoomWithMember();
            const songs = [song("001", "Sunrise"), song("002", "Sunset")];
            await registry.stashSearchResults("member", scope, songs);

            await expect(registry.takeSearchResults("member", scope)).resolves.toEqual(songs);
            await expectRoomError(
                registry.takeSearchResults("member", scope),
                ErrorCode.NO_PENDING_SEARCH
            );
            expect(registry.diagnostics().pendingSearches).toBe(0);
        });

        it("lets only one of two concurrent takes receive the stash", async () => {
            await openRoomWithMember();
            await registry.stashSearchResults("member", scope, [song("001", "Sunrise")]);

            const results = await Promise.allSettled([
                registry.takeSearchResults("member", scope),
                registry.takeSearchResults("member", scope),
            ]);

            expect(results[0]).toEqual({ status: "fulfilled", value: [expect.objectContaining({ id: "001" })] });
            expect(
                results[1].status === "rejected" &&
                    isRoomError(results[1].reason, ErrorCode.NO_PENDING_SEARCH)
            ).toBe(true);
        });

        it("refuses to stash results for a non-member", async () => {
            await registry.createRoom("owner", "Olivia", scope);

            await expectRoomError(
                registry.stashSearchResults("stranger", scope, [song("001", "Sunrise")]),
                ErrorCode.NOT_A_MEMBER
            );
        });

        it("drops a leaving member's pending search", async () => {
            await openRoomWithMember();
            qq.search.mockResolvedValueOnce([song("001", "Sunrise")]);
            await registry.searchSongs("member", scope, "sun");
            expect(registry.diagnostics().pendingSearches).toBe(1);

            await registry.leaveRoom("member", scope);

            expect(registry.diagnostics().pendingSearches).toBe(0);
        });
    });

    describe("scope queue", () => {
        it("serves other commands while a URL lookup is in flight", async () => {
            await openRoomWithMember();
            qq.search.mockResolvedValueOnce([song("001", "Sunrise")]);
            await registry.searchSongs("member", scope, "sun");
            const lookup = deferred<string>();
            qq.resolvePlayUrl.mockImplementationOnce(() => lookup.promise);

            let selected = false;
            const selecting = registry.selectSong("member", scope, 0).then((result) => {
                selected = true;
                return result;
            });

            await expect(registry.pause("owner", scope)).resolves.toEqual({
                status: "already_paused",
            });
            await expect(registry.showPlaylist("owner", scope)).resolves.toMatchObject({
                playlist: [],
            });
            expect(selected).toBe(false);

            lookup.resolve("https://cdn.example/slow.m4a");
            await expect(selecting).resolves.toMatchObject({
                url: "https://cdn.example/slow.m4a",
                playlistLength: 1,
            });
        });

        it("fails the commit when the room closes during a lookup", async () => {
            await openRoomWithMember();
            qq.search.mockResolvedValueOnce([song("001", "Sunrise")]);
            await registry.searchSongs("member", scope, "sun");
            const lookup = deferred<string>();
            qq.resolvePlayUrl.mockImplementationOnce(() => lookup.promise);

            const selecting = registry.selectSong("member", scope, 0);
            await registry.closeRoom("owner", scope);
            lookup.resolve("https://cdn.example/late.mp3");

            await expectRoomError(selecting, ErrorCode.NOT_A_MEMBER);
        });

        it("forgets queues of scopes that have no state", async () => {
            await expectRoomError(registry.describeRoom("empty-group"), ErrorCode.NO_ACTIVE_ROOM);

            expect(registry.diagnostics().busyScopes).toBe(0);
        });
    });

    describe("playlist and playback", () => {
        async function roomWithSongs(count: number) {
            await openRoomWithMember();
            for (let i = 1; i <= count; i++) {
                qq.search.mockResolvedValueOnce([song(`00${i}`, `Track ${i}`)]);
                await registry.searchSongs("member", scope, `track ${i}`);
                await registry.selectSong("member", scope, 0);
            }
        }

        it("plays from the first song and reuses cached URLs", async () => {
            await roomWithSongs(3);

            const started = await registry.play("member", scope);
            expect(started).toEqual({
                status: "started",
                nowPlaying: {
                    song: expect.objectContaining({ id: "001" }),
                    index: 0,
                    url: "https://cdn.example/qq/001.mp3",
                },
            });
            expect((await registry.play("owner", scope)).status).toBe("already_playing");

            const order: string[] = [];
            for (let i = 0; i < 4; i++) {
                const now = await registry.next("owner", scope);
                order.push(now?.song.id ?? "none");
            }
            expect(order).toEqual(["002", "003", "001", "002"]);
            expect(qq.resolvePlayUrl).toHaveBeenCalledTimes(3);
        });

        it("steps back and jumps", async () => {
            await roomWithSongs(3);

            await expect(registry.previous("member", scope)).resolves.toMatchObject({
                index: 1,
                url: "https://cdn.example/qq/002.mp3",
            });
            await expect(registry.jumpTo("member", scope, 0)).resolves.toMatchObject({
                index: 0,
                song: expect.objectContaining({ id: "001" }),
            });
            await expectRoomError(registry.jumpTo("member", scope, 3), ErrorCode.INDEX_OUT_OF_RANGE);
        });

        it("returns null when navigating an empty playlist", async () => {
            await openRoomWithMember();

            await expect(registry.next("member", scope)).resolves.toBeNull();
            await expect(registry.previous("member", scope)).resolves.toBeNull();
            await expect(registry.play("member", scope)).resolves.toEqual({ status: "empty" });
        });

        it("removes songs and restricts clearing to the owner", async () => {
            await roomWithSongs(2);

            const removed = await registry.removeSong("member", scope, 1);
            expect(removed.id).toBe("002");
            await expectRoomError(registry.removeSong("member", scope, 5), ErrorCode.INDEX_OUT_OF_RANGE);
            await expectRoomError(registry.clearPlaylist("member", scope), ErrorCode.NOT_OWNER);

            await registry.clearPlaylist("owner", scope);
            const room = await registry.showPlaylist("member", scope);
            expect(room.playlist).toEqual([]);
            expect(room.currentIndex).toBe(-1);
        });

        it("switches play mode", async () => {
            await openRoomWithMember();

            await expect(registry.setMode("member", scope, "random")).resolves.toEqual({
                status: "changed",
                mode: "random",
            });
            await expect(registry.setMode("owner", scope, "whatever")).resolves.toEqual({
                status: "query",
                mode: "random",
            });
        });
    });

    it("drops every room on shutdown", async () => {
        await openRoomWithMember();
        await registry.createRoom("owner", "Olivia", "group-b");

        await registry.shutdown();

        expect(registry.diagnostics()).toEqual({
            activeRooms: 0,
            memberships: 0,
            pendingSearches: 0,
            busyScopes: 0,
        });
    });
});

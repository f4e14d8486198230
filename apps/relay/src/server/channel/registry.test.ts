import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createTestLogger, FakeConnection } from "@/test-utils";
import { ChannelRegistry } from "./registry";

function expectConsistent(registry: ChannelRegistry, connections: FakeConnection[], codes: string[]): void {
    for (const connection of connections) {
        const memberships = codes.filter(code => registry.getMembers(code).includes(connection));

        expect(memberships).toEqual(connection.channelId === null ? [] : [connection.channelId]);
    }
}

describe("ChannelRegistry", () => {
    let registry: ChannelRegistry;

    beforeEach(() => {
        registry = new ChannelRegistry({ config: { reservationTtlSec: 0 }, logger: createTestLogger() });
    });

    afterEach(() => {
        registry.stop();
    });

    describe("createChannel", () => {
        it("registers an empty channel", () => {
            expect(registry.createChannel("WXYZ")).toEqual({ success: true });
            expect(registry.hasChannel("WXYZ")).toBe(true);
            expect(registry.getMembers("WXYZ")).toEqual([]);
        });

        it("refuses a code that is already registered", () => {
            registry.createChannel("WXYZ");

            expect(registry.createChannel("WXYZ")).toEqual({ success: false, errorCode: "CHANNEL_ALREADY_EXISTS" });
        });
    });

    describe("join", () => {
        it("creates an unseen channel on first join", () => {
            const connection = new FakeConnection("a");

            const result = registry.join("WXYZ", connection);

            expect(result).toEqual({ success: true, channelCreated: true, previousChannelId: null });
            expect(connection.channelId).toBe("WXYZ");
            expect(registry.getMembers("WXYZ")).toEqual([connection]);
        });

        it("joins a channel created by a channel id request", () => {
            registry.createChannel("WXYZ");
            const connection = new FakeConnection("a");

            expect(registry.join("WXYZ", connection).channelCreated).toBe(false);
            expect(registry.getMembers("WXYZ")).toEqual([connection]);
        });

        it("is a no-op when joining the current channel again", () => {
            const connection = new FakeConnection("a");
            registry.join("WXYZ", connection);

            const result = registry.join("WXYZ", connection);

            expect(result).toEqual({ success: true, channelCreated: false, previousChannelId: "WXYZ" });
            expect(registry.getMembers("WXYZ")).toHaveLength(1);
        });

        it("leaves the previous channel before joining another", () => {
            const a = new FakeConnection("a");
            const b = new FakeConnection("b");
            registry.join("AAAA", a);
            registry.join("AAAA", b);

            const result = registry.join("BBBB", a);

            expect(result.previousChannelId).toBe("AAAA");
            expect(registry.getMembers("AAAA")).toEqual([b]);
            expect(registry.getMembers("BBBB")).toEqual([a]);
            expect(a.channelId).toBe("BBBB");
        });

        it("destroys the previous channel when the move empties it", () => {
            const a = new FakeConnection("a");
            registry.join("AAAA", a);

            registry.join("BBBB", a);

            expect(registry.hasChannel("AAAA")).toBe(false);
        });
    });

    describe("leave", () => {
        it("reports a connection that belongs to no channel", () => {
            expect(registry.leave(new FakeConnection("a"))).toEqual({ removed: false, reason: "not_member" });
        });

        it("removes the member and clears its channel reference", () => {
            const a = new FakeConnection("a");
            const b = new FakeConnection("b");
            registry.join("WXYZ", a);
            registry.join("WXYZ", b);

            const result = registry.leave(b);

            expect(result).toEqual({ removed: true, channelId: "WXYZ", channelDestroyed: false, remainingMembers: 1 });
            expect(b.channelId).toBeNull();
            expect(registry.getMembers("WXYZ")).toEqual([a]);
        });

        it("deletes the channel when its last member leaves", () => {
            const a = new FakeConnection("a");
            registry.join("WXYZ", a);

            const result = registry.leave(a);

            expect(result).toEqual({ removed: true, channelId: "WXYZ", channelDestroyed: true, remainingMembers: 0 });
            expect(registry.hasChannel("WXYZ")).toBe(false);
        });

        it("clears a stale reference to a channel that no longer exists", () => {
            const a = new FakeConnection("a");
            a.channelId = "GONE";

            expect(registry.leave(a)).toEqual({ removed: false, reason: "not_member" });
            expect(a.channelId).toBeNull();
        });
    });

    describe("broadcast", () => {
        it("delivers to every other member exactly once and never to the sender", () => {
            const sender = new FakeConnection("a");
            const b = new FakeConnection("b");
            const c = new FakeConnection("c");
            for (const connection of [sender, b, c]) {
                registry.join("WXYZ", connection);
            }
            const message = { cmd: "send", channel: "WXYZ", data: "hello" };

            const delivered = registry.broadcast("WXYZ", message, sender);

            expect(delivered).toBe(2);
            expect(sender.sent).toEqual([]);
            expect(b.sent).toEqual([message]);
            expect(c.sent).toEqual([message]);
        });

        it("delivers to all members when the sender is not one of them", () => {
            const outsider = new FakeConnection("x");
            const b = new FakeConnection("b");
            registry.join("WXYZ", b);

            expect(registry.broadcast("WXYZ", { cmd: "send", channel: "WXYZ", data: "" }, outsider)).toBe(1);
            expect(b.sent).toHaveLength(1);
        });

        it("returns zero for an unknown channel", () => {
            expect(registry.broadcast("NONE", { cmd: "send", channel: "NONE", data: "" }, null)).toBe(0);
        });

        it("keeps per-sender order for each recipient", () => {
            const sender = new FakeConnection("a");
            const b = new FakeConnection("b");
            registry.join("WXYZ", sender);
            registry.join("WXYZ", b);

            for (const data of ["offer", "candidate-1", "candidate-2"]) {
                registry.broadcast("WXYZ", { cmd: "send", channel: "WXYZ", data }, sender);
            }

            expect(b.sent).toEqual([
                { cmd: "send", channel: "WXYZ", data: "offer" },
                { cmd: "send", channel: "WXYZ", data: "candidate-1" },
                { cmd: "send", channel: "WXYZ", data: "candidate-2" },
            ]);
        });

        it("continues past a recipient whose send fails", async () => {
            const sender = new FakeConnection("a");
            const broken = new FakeConnection("b");
            const healthy = new FakeConnection("c");
            for (const connection of [sender, broken, healthy]) {
                registry.join("WXYZ", connection);
            }
            broken.failSends = true;

            const delivered = registry.broadcast("WXYZ", { cmd: "send", channel: "WXYZ", data: "x" }, sender);

            expect(delivered).toBe(2);
            expect(healthy.sent).toHaveLength(1);
            await vi.waitFor(() => expect(registry.getStats().deliveryFailures).toBe(1));
            expect(registry.getStats().deliveriesAttempted).toBe(2);
        });

        it("skips a member that left before the broadcast", () => {
            const sender = new FakeConnection("a");
            const gone = new FakeConnection("b");
            registry.join("WXYZ", sender);
            registry.join("WXYZ", gone);
            registry.leave(gone);

            expect(registry.broadcast("WXYZ", { cmd: "send", channel: "WXYZ", data: "x" }, sender)).toBe(0);
            expect(gone.sent).toEqual([]);
        });
    });

    it("keeps every connection in at most one channel across mixed operations", () => {
        const connections = ["a", "b", "c", "d"].map(id => new FakeConnection(id));
        const codes = ["AAAA", "BBBB", "CCCC"];

        for (let step = 0; step < 60; step++) {
            const connection = connections[(step * 7) % connections.length];
            const code = codes[(step * 5) % codes.length];
            if (!connection || !code) continue;

            if (step % 4 === 3) {
                registry.leave(connection);
            } else {
                registry.join(code, connection);
            }

            expectConsistent(registry, connections, codes);
        }
    });

    it("summarizes channels and members", () => {
        registry.createChannel("AAAA");
        registry.join("BBBB", new FakeConnection("a"));
        registry.join("BBBB", new FakeConnection("b"));

        expect(registry.getStats()).toEqual({
            activeChannels: 2,
            activeMembers: 2,
            deliveriesAttempted: 0,
            deliveryFailures: 0,
        });
    });
});

describe("ChannelRegistry reservations", () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it("prunes reservations nobody joined once they expire", () => {
        let clock = 0;
        const registry = new ChannelRegistry({
            config: { reservationTtlSec: 300 },
            logger: createTestLogger(),
            now: () => clock,
        });
        registry.createChannel("AAAA");
        registry.createChannel("BBBB");
        registry.join("BBBB", new FakeConnection("a"));

        clock = 299_999;
        expect(registry.pruneUnclaimed()).toBe(0);

        clock = 300_000;
        expect(registry.pruneUnclaimed()).toBe(1);
        expect(registry.hasChannel("AAAA")).toBe(false);
        expect(registry.hasChannel("BBBB")).toBe(true);

        registry.stop();
    });

    it("sweeps expired reservations on a timer", () => {
        vi.useFakeTimers();
        const registry = new ChannelRegistry({
            config: { reservationTtlSec: 1, sweepIntervalSec: 1 },
            logger: createTestLogger(),
        });
        registry.createChannel("AAAA");

        vi.advanceTimersByTime(1000);

        expect(registry.hasChannel("AAAA")).toBe(false);
        registry.stop();
    });
});

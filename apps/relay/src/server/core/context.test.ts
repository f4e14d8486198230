import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { FakeConnection } from "@/test-utils";
import { getContext, initContext, resetContext } from "./context";

describe("app context", () => {
    beforeEach(() => {
        vi.stubEnv("LOG_LEVEL", "error");
        vi.stubEnv("CHANNEL_RESERVATION_TTL_SEC", "60");
    });

    afterEach(() => {
        vi.unstubAllEnvs();
        resetContext();
    });

    it("is unavailable before initialization", () => {
        expect(() => getContext()).toThrow("Context not initialized");
    });

    it("builds the wiring once from the environment", () => {
        const context = initContext();

        expect(getContext()).toBe(context);
        expect(context.config.logLevel).toBe("error");
        expect(context.config.channelReservationTtlSec).toBe(60);
        expect(() => initContext()).toThrow("Context already initialized");
    });

    it("routes through the shared registry", () => {
        const { registry, router, logger } = initContext();
        const connection = new FakeConnection("a");

        router.route(connection, { cmd: "connectChannel", channel: "WXYZ", data: "" }, logger);

        expect(registry.getMembers("WXYZ")).toEqual([connection]);
    });

    it("can be initialized again after a reset", () => {
        const first = initContext();

        resetContext();

        expect(() => getContext()).toThrow("Context not initialized");
        expect(initContext()).not.toBe(first);
    });

    it("refuses to reset outside the test environment", () => {
        initContext();
        vi.stubEnv("NODE_ENV", "production");

        expect(() => resetContext()).toThrow("Reset only available in test environment");
    });
});

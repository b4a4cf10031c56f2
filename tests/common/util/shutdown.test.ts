import { afterEach, beforeAll, describe, expect, it, vi } from "vitest";
import { getOrCreateGlobalLogger } from "../../../src/common/util/logger.js";
import { runShutdownSubscribers, subscribeShutdown, unsubscribeShutdown } from "../../../src/common/util/shutdown.js";

describe("Shutdown", () => {
    const subscribed: (() => void | Promise<void>)[] = [];

    function subscribe(fn: () => void | Promise<void>) {
        subscribed.push(fn);
        subscribeShutdown(fn);
    }

    beforeAll(() => {
        getOrCreateGlobalLogger().configure({ silent: true });
    });

    afterEach(() => {
        for (const fn of subscribed.splice(0)) unsubscribeShutdown(fn);
    });

    it("runs subscribers once each, in subscription order", async () => {
        const calls: string[] = [];
        const first = () => { calls.push("first"); };
        subscribe(first);
        subscribe(async () => { calls.push("second"); });
        subscribeShutdown(first);

        await runShutdownSubscribers();

        expect(calls).toEqual(["first", "second"]);
    });

    it("skips unsubscribed functions", async () => {
        const fn = vi.fn();
        subscribe(fn);
        unsubscribeShutdown(fn);

        await runShutdownSubscribers();

        expect(fn).not.toHaveBeenCalled();
    });

    it("keeps going after a failing subscriber", async () => {
        const error = vi.spyOn(getOrCreateGlobalLogger(), "error");
        const after = vi.fn();
        const failure = new Error("subscriber failed");
        subscribe(() => { throw failure; });
        subscribe(after);

        await runShutdownSubscribers();

        expect(after).toHaveBeenCalledTimes(1);
        expect(error).toHaveBeenCalledWith("Shutdown subscriber failed:", failure);
        error.mockRestore();
    });
});

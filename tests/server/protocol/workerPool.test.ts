import { describe, expect, it, vi } from "vitest";
import { Deferred } from "../../../src/common/util/deferred.js";
import { DefaultLogger } from "../../../src/common/util/logger.js";
import { WorkerPool } from "../../../src/server/protocol/workerPool.js";
import { nextTick } from "../../utils/wait-for.js";

const logger = new DefaultLogger({ silent: true });

/**
 * A runner whose units only complete when released.
 */
function gatedRunner() {
    const gates = new Map<number, Deferred<void>>();
    const started: number[] = [];

    const runner = (unit: number) => {
        started.push(unit);
        const gate = new Deferred<void>();
        gates.set(unit, gate);
        return gate.promise;
    };

    const release = (unit: number) => gates.get(unit)?.resolve();
    const releaseAll = () => {
        for (const gate of gates.values()) gate.resolve();
    };

    return { runner, started, release, releaseAll };
}

describe("WorkerPool", () => {
    it("rejects a non-positive size or capacity", () => {
        expect(() => new WorkerPool(0, () => {}, { logger })).toThrow(RangeError);
        expect(() => new WorkerPool(1, () => {}, { capacity: 0, logger })).toThrow(RangeError);
    });

    it("never runs a unit inside submit", async () => {
        const runner = vi.fn();
        const pool = new WorkerPool<number>(1, runner, { logger });

        expect(pool.submit(1)).toBe("accepted");
        expect(runner).not.toHaveBeenCalled();
        expect(pool.pending).toBe(1);

        await pool.drain();
        expect(runner).toHaveBeenCalledWith(1);
    });

    it("runs at most size units at once", async () => {
        const { runner, started, release, releaseAll } = gatedRunner();
        const pool = new WorkerPool<number>(2, runner, { logger });

        for (let i = 1; i <= 5; i++) pool.submit(i);
        await nextTick();

        expect(pool.active).toBe(2);
        expect(pool.pending).toBe(3);
        expect(started).toEqual([1, 2]);

        release(1);
        await nextTick();
        expect(started).toEqual([1, 2, 3]);
        expect(pool.active).toBe(2);

        releaseAll();
        await vi.waitFor(() => expect(started).toHaveLength(5));
        releaseAll();
        await pool.drain();

        expect(pool.active).toBe(0);
        expect(pool.pending).toBe(0);
    });

    it("drops the newest unit when full under the reject policy", async () => {
        const onDrop = vi.fn();
        const ran: number[] = [];
        const pool = new WorkerPool<number>(1, (unit) => { ran.push(unit); }, { capacity: 2, overloadPolicy: "reject", onDrop, logger });

        expect(pool.submit(1)).toBe("accepted");
        expect(pool.submit(2)).toBe("accepted");
        expect(pool.submit(3)).toBe("rejected");
        expect(onDrop).toHaveBeenCalledTimes(1);
        expect(onDrop).toHaveBeenCalledWith(3);

        await pool.drain();
        expect(ran).toEqual([1, 2]);
    });

    it("drops the oldest queued unit when full under the drop-oldest policy", async () => {
        const onDrop = vi.fn();
        const ran: number[] = [];
        const pool = new WorkerPool<number>(1, (unit) => { ran.push(unit); }, { capacity: 2, overloadPolicy: "drop-oldest", onDrop, logger });

        pool.submit(1);
        pool.submit(2);
        expect(pool.submit(3)).toBe("displaced");
        expect(onDrop).toHaveBeenCalledWith(1);

        await pool.drain();
        expect(ran).toEqual([2, 3]);
    });

    it("reports a failing unit and keeps the worker running", async () => {
        const failure = new Error("unit failed");
        const onFailure = vi.fn();
        const ran: number[] = [];
        const pool = new WorkerPool<number>(1, async (unit) => {
            if (unit === 1) throw failure;
            ran.push(unit);
        }, { onFailure, logger });

        pool.submit(1);
        pool.submit(2);
        await pool.drain();

        expect(onFailure).toHaveBeenCalledTimes(1);
        expect(onFailure).toHaveBeenCalledWith(1, failure);
        expect(ran).toEqual([2]);
    });

    it("finishes queued units after close but accepts no new ones", async () => {
        const onDrop = vi.fn();
        const ran: number[] = [];
        const pool = new WorkerPool<number>(1, (unit) => { ran.push(unit); }, { onDrop, logger });

        pool.submit(1);
        pool.submit(2);
        pool.close();

        expect(pool.closed).toBe(true);
        expect(pool.submit(3)).toBe("rejected");
        expect(onDrop).toHaveBeenCalledWith(3);

        await pool.drain();
        expect(ran).toEqual([1, 2]);
    });

    it("resolves drain immediately when idle", async () => {
        const pool = new WorkerPool<number>(1, () => {}, { logger });
        await expect(pool.drain()).resolves.toBeUndefined();
    });
});

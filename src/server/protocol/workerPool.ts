/**
 * @module WorkerPool
 *
 * Fixed-size pool of asynchronous workers that execute submitted units of work with no ordering guarantee.
 * The queue in front of the workers is bounded; what happens when it is full is decided by an {@link OverloadPolicy}.
 */

import { DefaultLogger, getOrCreateGlobalLogger } from "../../common/util/logger.js";

//#region ============== Types ==============
/**
 * - `reject`: the newly submitted unit is dropped.
 * - `drop-oldest`: the oldest queued unit is dropped to make room for the new one.
 */
type OverloadPolicy = "reject" | "drop-oldest";

type SubmitResult = "accepted" | "rejected" | "displaced";

type WorkRunner<T> = (unit: T) => void | Promise<void>;

interface WorkerPoolOptions<T> {
    /**
     * Maximum number of units waiting for a free worker.
     */
    capacity?: number,
    overloadPolicy?: OverloadPolicy,
    /**
     * Called with every unit that threw or rejected. The worker moves on to the next unit afterwards.
     */
    onFailure?: (unit: T, error: unknown) => void,
    /**
     * Called with every unit dropped because of the overload policy or because the pool was closed.
     */
    onDrop?: (unit: T) => void,
    logger?: DefaultLogger
}
//#endregion ============== Types ==============

//#region ============== Constants ==============
const DEFAULT_QUEUE_CAPACITY = 1024;
const OVERLOAD_POLICIES: readonly OverloadPolicy[] = ["reject", "drop-oldest"];
//#endregion ============== Constants ==============

class WorkerPool<T> {
    private readonly _size: number;
    private readonly runner: WorkRunner<T>;
    private readonly capacity: number;
    private readonly policy: OverloadPolicy;
    private readonly onFailure?: (unit: T, error: unknown) => void;
    private readonly onDrop?: (unit: T) => void;
    private readonly logger: DefaultLogger;

    private queue: T[];
    private _active: number;
    private _closed: boolean;
    private scheduled: boolean;
    private idleWaiters: (() => void)[];

    public constructor(size: number, runner: WorkRunner<T>, options: WorkerPoolOptions<T> = {}) {
        if (!Number.isInteger(size) || size < 1) throw new RangeError(`Worker pool size must be a positive integer, got ${size}.`);

        const capacity = options.capacity ?? DEFAULT_QUEUE_CAPACITY;
        if (capacity !== Infinity && (!Number.isInteger(capacity) || capacity < 1))
            throw new RangeError(`Worker pool capacity must be a positive integer, got ${capacity}.`);

        this._size = size;
        this.runner = runner;
        this.capacity = capacity;
        this.policy = options.overloadPolicy ?? "reject";
        this.onFailure = options.onFailure;
        this.onDrop = options.onDrop;
        this.logger = options.logger ?? getOrCreateGlobalLogger();

        this.queue = [];
        this._active = 0;
        this._closed = false;
        this.scheduled = false;
        this.idleWaiters = [];
    }

    /**
     * Number of workers.
     */
    public get size(): number { return this._size; }

    /**
     * Number of units currently being executed.
     */
    public get active(): number { return this._active; }

    /**
     * Number of units waiting for a free worker.
     */
    public get pending(): number { return this.queue.length; }

    public get closed(): boolean { return this._closed; }

    /**
     * Enqueues a unit of work. Never waits for it to run.
     */
    public submit(unit: T): SubmitResult {
        if (this._closed) {
            this.onDrop?.(unit);
            return "rejected";
        }

        let result: SubmitResult = "accepted";
        if (this.queue.length >= this.capacity) {
            if (this.policy === "reject") {
                this.onDrop?.(unit);
                return "rejected";
            }

            const oldest = this.queue.shift();
            if (oldest !== undefined) this.onDrop?.(oldest);
            result = "displaced";
        }

        this.queue.push(unit);
        this.schedule();

        return result;
    }

    /**
     * Stops accepting new units. Units already queued or running still complete.
     */
    public close(): void {
        this._closed = true;
    }

    /**
     * Resolves once no unit is queued or running.
     */
    public drain(): Promise<void> {
        if (this.idle) return Promise.resolve();
        return new Promise((resolve) => this.idleWaiters.push(resolve));
    }

    private get idle(): boolean {
        return this._active === 0 && this.queue.length === 0;
    }

    /**
     * Starts queued units on the next turn of the event loop, so a submitter never runs a unit inline.
     */
    private schedule(): void {
        if (this.scheduled) return;
        this.scheduled = true;

        setImmediate(() => {
            this.scheduled = false;
            this.pump();
        });
    }

    private pump(): void {
        while (this._active < this._size && this.queue.length > 0) {
            const unit = this.queue.shift();
            if (unit === undefined) break;

            this._active++;
            this.execute(unit).catch((err) => this.logger.error("Worker pool failure callback threw:", err));
        }
    }

    private async execute(unit: T): Promise<void> {
        try {
            await this.runner(unit);
        } catch (err) {
            this.onFailure?.(unit, err);
        } finally {
            this._active--;
            this.pump();
            this.notifyIdle();
        }
    }

    private notifyIdle(): void {
        if (!this.idle) return;

        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
    }
}

export {
    type OverloadPolicy,
    type SubmitResult,
    type WorkRunner,
    type WorkerPoolOptions,

    DEFAULT_QUEUE_CAPACITY,
    OVERLOAD_POLICIES,

    WorkerPool
};

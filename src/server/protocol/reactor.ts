/**
 * @module Reactor
 *
 * The single reader of a run's socket. Every datagram it receives is copied into its own buffer and handed to the
 * worker pool as a {@link WorkUnit}; the reactor never waits for a unit to be processed.
 */

import dgram from "dgram";
import { Packet } from "../../common/datagram/packet.js";
import { ConnectionTarget } from "../../common/protocol/connection.js";
import { UDPConnection } from "../../common/protocol/udp.js";
import { Deferred } from "../../common/util/deferred.js";
import { toError } from "../../common/util/errors.js";
import { DefaultLogger } from "../../common/util/logger.js";
import { Diagnostics } from "./diagnostics.js";
import { CoAPHandler } from "./handler.js";
import { PeerResponder } from "./responder.js";
import { OverloadPolicy, WorkerPool } from "./workerPool.js";

//#region ============== Types ==============
/**
 * One captured datagram. The buffer is owned by the unit and never shared with another.
 */
interface WorkUnit {
    data: Buffer,
    source: ConnectionTarget
}

type ReactorExit =
    | { reason: "shutdown" }
    | { reason: "fault", error: Error };

interface ReactorOptions {
    workers: number,
    queueCapacity: number,
    overloadPolicy: OverloadPolicy,
    maxDatagramSize: number,
    /**
     * Whether a shutdown waits for queued and running units before closing the socket.
     */
    drainOnStop: boolean,
    diagnostics: Diagnostics,
    logger?: DefaultLogger
}

interface ReactorRun {
    /**
     * Resolves once the socket is being listened to, rejects if registration failed.
     */
    ready: Promise<void>,
    /**
     * Resolves once the reactor has released its socket.
     */
    done: Promise<ReactorExit>
}
//#endregion ============== Types ==============

//#region ============== Constants ==============
const DEFAULT_MAX_DATAGRAM_SIZE = 1500;
//#endregion ============== Constants ==============

class Reactor extends UDPConnection {
    private readonly handler: CoAPHandler;
    private readonly pool: WorkerPool<WorkUnit>;
    private readonly options: ReactorOptions;
    private readonly diagnostics: Diagnostics;

    private exit?: Deferred<ReactorExit>;
    private signal?: AbortSignal;
    private stopping: boolean;

    public constructor(socket: dgram.Socket, handler: CoAPHandler, options: ReactorOptions) {
        super(socket, options.logger);

        this.handler = handler;
        this.options = options;
        this.diagnostics = options.diagnostics;
        this.stopping = false;

        this.pool = new WorkerPool<WorkUnit>(options.workers, this.process.bind(this), {
            capacity: options.queueCapacity,
            overloadPolicy: options.overloadPolicy,
            onFailure: (unit, err) => this.report("handlerFailure", () => this.diagnostics.handlerFailure?.(unit.source, err)),
            onDrop: (unit) => this.report("overload", () => this.diagnostics.overload?.(unit.source, options.overloadPolicy)),
            logger: this.logger
        });
    }

    /**
     * The pool this reactor submits to. Exposed for observation.
     */
    public get workerPool(): WorkerPool<WorkUnit> {
        return this.pool;
    }

    /**
     * Registers the socket and starts dispatching datagrams until the signal is aborted or the socket faults.
     * A reactor can only be run once.
     */
    public run(signal: AbortSignal): ReactorRun {
        if (this.exit) throw new Error("Reactor has already been run.");

        const ready = new Deferred<void>();
        const exit = new Deferred<ReactorExit>();
        this.exit = exit;
        this.signal = signal;

        try {
            if (signal.aborted) throw new Error("Shutdown was requested before registration.");

            // Throws ERR_SOCKET_DGRAM_NOT_RUNNING when the socket is not bound.
            const address = this.socket.address();

            this.attach();
            signal.addEventListener("abort", this.onAbort, { once: true });

            this.logger.debug(`Reactor registered on ${address.address}:${address.port} with ${this.pool.size} worker(s).`);
            ready.resolve();
        } catch (e) {
            const error = toError(e);
            ready.reject(error);
            this.terminate({ reason: "fault", error });
        }

        return { ready: ready.promise, done: exit.promise };
    }

    //#region ======= Events =======
    protected onMessage(msg: Buffer, rinfo: dgram.RemoteInfo): void {
        // An empty read carries no datagram.
        if (msg.byteLength === 0) return;

        const source = new ConnectionTarget(rinfo);
        const limit = this.options.maxDatagramSize;
        if (msg.byteLength > limit) this.report("datagramTruncated", () => this.diagnostics.datagramTruncated?.(source, msg.byteLength, limit));

        const data = Buffer.alloc(Math.min(msg.byteLength, limit));
        msg.copy(data, 0, 0, data.byteLength);

        this.pool.submit({ data, source });
    }

    protected onError(err: Error): void {
        this.report("reactorFault", () => this.diagnostics.reactorFault?.(err));
        this.terminate({ reason: "fault", error: err });
    }

    protected onClose(): void {
        if (this.stopping) return;

        const error = new Error("Socket was closed while the reactor was running.");
        this.report("reactorFault", () => this.diagnostics.reactorFault?.(error));
        this.terminate({ reason: "fault", error });
    }

    private onAbort = (): void => {
        this.terminate({ reason: "shutdown" });
    };
    //#endregion ======= Events =======

    /**
     * Decodes one unit and hands it to the handler. Runs inside a worker.
     */
    private async process(unit: WorkUnit): Promise<void> {
        let request: Packet;
        try {
            request = Packet.deserialize(unit.data);
        } catch (e) {
            const error = toError(e);
            this.report("decodeFailure", () => this.diagnostics.decodeFailure?.(unit.source, error));
            return;
        }

        let responder: PeerResponder;
        try {
            responder = new PeerResponder(this.socket, unit.source);
        } catch (e) {
            const error = toError(e);
            this.report("responderFailure", () => this.diagnostics.responderFailure?.(unit.source, error));
            return;
        }

        await this.handler.handle(request, responder);
    }

    /**
     * Runs a diagnostics callback. A sink that throws is logged and never reaches the socket listeners or the pool.
     */
    private report(event: keyof Diagnostics, fn: () => void): void {
        try {
            fn();
        } catch (err) {
            this.logger.error(`Diagnostics sink '${event}' threw:`, err);
        }
    }

    private terminate(exit: ReactorExit): void {
        if (this.stopping) return;
        this.stopping = true;

        this.teardown(exit)
            .then(() => this.exit?.resolve(exit))
            .catch((err) => this.exit?.resolve({ reason: "fault", error: toError(err) }));
    }

    private async teardown(exit: ReactorExit): Promise<void> {
        this.signal?.removeEventListener("abort", this.onAbort);
        this.detach();
        this.socket.on("error", (err) => this.logger.warn("Socket error while the reactor was exiting:", err));
        this.pool.close();

        if (exit.reason === "shutdown" && this.options.drainOnStop) await this.pool.drain();

        await this.closeSocket();
        this.logger.debug(`Reactor exited (${exit.reason}).`);
    }
}

export {
    type WorkUnit,
    type ReactorExit,
    type ReactorOptions,
    type ReactorRun,

    DEFAULT_MAX_DATAGRAM_SIZE,

    Reactor
};

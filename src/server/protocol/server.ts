/**
 * @module Server
 *
 * Lifecycle of a CoAP server: binding, starting a run of the reactor with a handler, and stopping it.
 *
 * A run goes through `idle → starting → running → stopping → idle`. At most one run is active at a time.
 */

import dgram from "dgram";
import dns from "dns";
import { ConnectionTarget, HostPort } from "../../common/protocol/connection.js";
import { bindSocket, closeSocket } from "../../common/protocol/udp.js";
import { errorMessage } from "../../common/util/errors.js";
import { DefaultLogger, getOrCreateGlobalLogger } from "../../common/util/logger.js";
import { subscribeShutdown, unsubscribeShutdown } from "../../common/util/shutdown.js";
import { createLoggerDiagnostics, Diagnostics } from "./diagnostics.js";
import { AlreadyRunningError, CoAPServerError, EventLoopError, NetworkError } from "./errors.js";
import { CoAPHandler, CoAPHandlerLike, toHandler } from "./handler.js";
import { DEFAULT_MAX_DATAGRAM_SIZE, Reactor, ReactorExit, ReactorRun } from "./reactor.js";
import { DEFAULT_QUEUE_CAPACITY, OverloadPolicy } from "./workerPool.js";

//#region ============== Types ==============
type ServerState = "idle" | "starting" | "running" | "stopping";

/**
 * Anything accepted as a bind target: "host:port", "[ipv6]:port", or a host and port pair.
 */
type BindAddress = string | HostPort;

interface CoAPServerOptions {
    /**
     * Number of workers of the pool created by each start. Defaults to {@link DEFAULT_WORKER_COUNT}.
     */
    workers?: number,
    queueCapacity?: number,
    overloadPolicy?: OverloadPolicy,
    /**
     * Datagrams longer than this are truncated before being decoded.
     */
    maxDatagramSize?: number,
    /**
     * Whether {@link CoAPServer.stop} waits for queued and running handlers before returning.
     */
    drainOnStop?: boolean,
    diagnostics?: Diagnostics,
    logger?: DefaultLogger
}

/**
 * The controller-side record of an active run.
 */
interface RunningHandle {
    shutdown: AbortController,
    reactor: Reactor,
    done: Promise<ReactorExit>
}
//#endregion ============== Types ==============

//#region ============== Constants ==============
const DEFAULT_WORKER_COUNT = 4;
//#endregion ============== Constants ==============

/**
 * Creates and binds a socket.
 *
 * @throws {NetworkError} If the socket cannot be bound.
 */
async function openSocket(type: dgram.SocketType, address: string, port: number): Promise<dgram.Socket> {
    const socket = dgram.createSocket(type);

    try {
        await bindSocket(socket, port, address);
    } catch (e) {
        await closeSocket(socket);
        throw new NetworkError(`Could not bind ${ConnectionTarget.toQualifiedName(new ConnectionTarget(address, port))}: ${errorMessage(e)}`, e);
    }

    return socket;
}

function assertWorkerCount(workers: number): void {
    if (!Number.isInteger(workers) || workers < 1) throw new RangeError(`Worker count must be a positive integer, got ${workers}.`);
}

/**
 * A CoAP server dispatching every received request to a handler through a pool of workers.
 *
 * @example
 * const server = await CoAPServer.bind("127.0.0.1:5683");
 * await server.start((request, responder) => responder.reply(request, Buffer.from("hello")));
 * // ...
 * await server.close();
 */
class CoAPServer {
    private readonly _address: ConnectionTarget;
    private readonly socketType: dgram.SocketType;
    private readonly options: CoAPServerOptions;
    private readonly logger: DefaultLogger;
    private readonly diagnostics: Diagnostics;

    /**
     * The bound socket while no run owns it.
     */
    private socket?: dgram.Socket;
    private _state: ServerState;
    private _workerCount: number;
    private running?: RunningHandle;
    private starting?: Promise<void>;
    private stopping?: Promise<void>;
    private closed: boolean;

    private constructor(socket: dgram.Socket, socketType: dgram.SocketType, options: CoAPServerOptions) {
        const bound = socket.address();

        this._address = new ConnectionTarget(bound.address, bound.port);
        this.socketType = socketType;
        this.options = options;
        this.logger = options.logger ?? getOrCreateGlobalLogger();
        this.diagnostics = options.diagnostics ?? createLoggerDiagnostics(this.logger);

        this._state = "idle";
        this._workerCount = options.workers ?? DEFAULT_WORKER_COUNT;
        this.closed = false;

        this.reserve(socket);
        subscribeShutdown(this.onShutdown);
    }

    /**
     * Resolves the address, keeping only its first result, and binds a UDP socket to it. No run is started.
     *
     * @throws {NetworkError} If the address is malformed, resolves to nothing, or cannot be bound.
     */
    public static async bind(address: BindAddress, options: CoAPServerOptions = {}): Promise<CoAPServer> {
        if (options.workers !== undefined) assertWorkerCount(options.workers);

        let target: HostPort;
        try {
            target = typeof address === "string" ? ConnectionTarget.parseHostPort(address) : address;
        } catch (e) {
            throw new NetworkError(errorMessage(e), e);
        }

        let resolved: dns.LookupAddress | undefined;
        try {
            [resolved] = await dns.promises.lookup(target.host, { all: true });
        } catch (e) {
            throw new NetworkError(`Could not resolve '${target.host}': ${errorMessage(e)}`, e);
        }
        if (!resolved) throw new NetworkError(`Address '${target.host}' resolved to no candidate.`);

        const socketType = resolved.family === 6 ? "udp6" : "udp4";
        const socket = await openSocket(socketType, resolved.address, target.port);

        const server = new CoAPServer(socket, socketType, options);
        server.logger.debug(`CoAP server bound at ${server.address.qualifiedName}.`);

        return server;
    }

    /**
     * The bound address. When bound to port 0, this holds the port picked by the system.
     */
    public get address(): ConnectionTarget {
        return this._address;
    }

    public get state(): ServerState {
        return this._state;
    }

    public get workerCount(): number {
        return this._workerCount;
    }

    /**
     * Sets the number of workers used by the next {@link start}. A run already active keeps its pool.
     */
    public setWorkerCount(workers: number): void {
        assertWorkerCount(workers);
        this._workerCount = workers;
    }

    /**
     * Starts handling requests with the handler. Resolves once the socket is being listened to, so traffic sent right
     * after this resolves is processed.
     *
     * @throws {AlreadyRunningError} If a run is active. Nothing else happens in that case.
     * @throws {NetworkError} If the socket released by a previous run could not be bound again.
     * @throws {EventLoopError} If the reactor failed to register the socket.
     */
    public start(handler: CoAPHandlerLike): Promise<void> {
        if (this.closed) return Promise.reject(new CoAPServerError("Server has been closed."));
        if (this._state !== "idle") return Promise.reject(new AlreadyRunningError());

        let normalized: CoAPHandler;
        try {
            normalized = toHandler(handler);
        } catch (e) {
            return Promise.reject(e);
        }

        this._state = "starting";
        const starting = this._start(normalized).finally(() => {
            this.starting = undefined;
        });
        this.starting = starting;

        return starting;
    }

    private async _start(handler: CoAPHandler): Promise<void> {
        let socket: dgram.Socket;
        try {
            socket = await this.takeSocket();
        } catch (e) {
            this._state = "idle";
            throw e;
        }

        const shutdown = new AbortController();
        const reactor = new Reactor(socket, handler, {
            workers: this._workerCount,
            queueCapacity: this.options.queueCapacity ?? DEFAULT_QUEUE_CAPACITY,
            overloadPolicy: this.options.overloadPolicy ?? "reject",
            maxDatagramSize: this.options.maxDatagramSize ?? DEFAULT_MAX_DATAGRAM_SIZE,
            drainOnStop: this.options.drainOnStop ?? false,
            diagnostics: this.diagnostics,
            logger: this.logger
        });

        let run: ReactorRun | undefined;
        try {
            run = reactor.run(shutdown.signal);
            await run.ready;
        } catch (e) {
            if (run) await run.done;
            else await closeSocket(socket);

            this._state = "idle";
            throw new EventLoopError(e);
        }

        const handle: RunningHandle = { shutdown, reactor, done: run.done };
        this.running = handle;
        this._state = "running";

        handle.done
            .then((exit) => this.onReactorExit(handle, exit))
            .catch((err) => this.logger.error("Failed to process reactor exit:", err));

        this.logger.info(`CoAP server running at ${this._address.qualifiedName} with ${this._workerCount} worker(s).`);
    }

    /**
     * Stops the active run and waits for the reactor to release its socket. Handlers still in flight may finish
     * after this resolves, unless the server was created with `drainOnStop`. Does nothing when idle.
     */
    public async stop(): Promise<void> {
        if (this.stopping) return this.stopping;

        if (this.starting) {
            // Start failures are reported to the caller of start.
            await this.starting.catch(() => undefined);
        }

        const handle = this.running;
        if (!handle || this.stopping) return this.stopping;

        this._state = "stopping";
        this.stopping = this.join(handle).finally(() => {
            this.stopping = undefined;
        });

        return this.stopping;
    }

    /**
     * Stops the active run and releases the address. The server cannot be started again afterwards.
     */
    public async close(): Promise<void> {
        await this.stop();
        if (this.closed) return;

        this.closed = true;
        unsubscribeShutdown(this.onShutdown);

        const socket = this.socket;
        this.socket = undefined;
        if (socket) {
            await closeSocket(socket);
            socket.off("error", this.onIdleError);
        }

        this.logger.debug(`CoAP server at ${this._address.qualifiedName} closed.`);
    }

    private async join(handle: RunningHandle): Promise<void> {
        handle.shutdown.abort();
        await handle.done;

        if (this.running === handle) this.running = undefined;
        this._state = "idle";

        this.logger.info(`CoAP server at ${this._address.qualifiedName} stopped.`);
    }

    private onReactorExit(handle: RunningHandle, exit: ReactorExit): void {
        // Exits requested through stop are handled by join.
        if (this.running !== handle || this._state !== "running") return;

        this.running = undefined;
        this._state = "idle";

        if (exit.reason === "fault") this.logger.warn(`CoAP server at ${this._address.qualifiedName} is idle after a reactor fault.`);
    }

    /**
     * Hands the bound socket to a new run, binding a new one if the previous run released it.
     */
    private async takeSocket(): Promise<dgram.Socket> {
        const socket = this.socket;
        if (socket) {
            this.socket = undefined;
            socket.off("error", this.onIdleError);
            return socket;
        }

        return openSocket(this.socketType, this._address.address, this._address.port);
    }

    private reserve(socket: dgram.Socket): void {
        socket.on("error", this.onIdleError);
        this.socket = socket;
    }

    private onIdleError = (err: Error): void => {
        this.logger.warn(`Idle socket at ${this._address.qualifiedName} got an error:`, err);
    };

    private onShutdown = (): Promise<void> => this.close();
}

export {
    type ServerState,
    type BindAddress,
    type CoAPServerOptions,

    DEFAULT_WORKER_COUNT,

    CoAPServer
};

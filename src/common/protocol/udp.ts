/**
 * @module UDP
 * Common definitions for UDP connections. Used in both the CLIENT and SERVER solutions for the implementation
 * of UDP Clients and the server reactor, respectively.
 */

import dgram from "dgram";
import { DefaultLogger, getOrCreateGlobalLogger } from "../util/logger.js";

/**
 * This class is a wrapper around a UDP Socket that represents a UDP Connection.
 *
 * A UDPConnection cannot be directly instantiated, and needs to be extended and implemented before being usable.
 *
 * Once {@link attach} is called, the most used socket events are bound to their respective method handlers, which
 * can be implemented by any subclass. {@link detach} removes them again, leaving the socket untouched.
 */
abstract class UDPConnection {
    /**
     * The socket used for this UDP connection.
     */
    protected socket: dgram.Socket;

    /**
     * An easy access point to the global logger instance.
     */
    protected logger: DefaultLogger;

    private listeners?: {
        error: (err: Error) => void,
        message: (msg: Buffer, rinfo: dgram.RemoteInfo) => void,
        listening: () => void,
        close: () => void
    };

    /**
     * @param socket An existing socket to wrap, or the type of a new socket to create.
     */
    public constructor(socket: dgram.Socket | dgram.SocketType = "udp4", logger?: DefaultLogger) {
        this.socket = typeof socket === "string" ? dgram.createSocket(socket) : socket;
        this.logger = logger ?? getOrCreateGlobalLogger();
    }

    /**
     * Whether the event handlers are currently bound to the socket.
     */
    protected get attached(): boolean {
        return this.listeners !== undefined;
    }

    /**
     * Binds the socket events to this connection's handlers. Calling it twice has no effect.
     */
    protected attach(): void {
        if (this.listeners) return;

        this.listeners = {
            error: this.onError.bind(this),
            message: this.onMessage.bind(this),
            listening: this.onListen.bind(this),
            close: this.onClose.bind(this)
        };

        this.socket.on("error", this.listeners.error);
        this.socket.on("message", this.listeners.message);
        this.socket.on("listening", this.listeners.listening);
        this.socket.on("close", this.listeners.close);
    }

    /**
     * Unbinds the handlers bound by {@link attach}.
     */
    protected detach(): void {
        if (!this.listeners) return;

        this.socket.off("error", this.listeners.error);
        this.socket.off("message", this.listeners.message);
        this.socket.off("listening", this.listeners.listening);
        this.socket.off("close", this.listeners.close);
        this.listeners = undefined;
    }

    /**
     * Closes the socket, resolving once it is closed. Resolves immediately if it was already closed.
     */
    protected closeSocket(): Promise<void> {
        return closeSocket(this.socket);
    }

    /**
     * Event method fired when an error occurs within the UDP connection.
     *
     * @param err The error that was passed to this event.
     */
    protected abstract onError(err: Error): void;

    /**
     * Event method fired when a message is received by the UDP connection.
     *
     * @param msg A Buffer instance containing the byte stream payload.
     * @param rinfo An object containing metadata about the remote connection.
     */
    protected abstract onMessage(msg: Buffer, rinfo: dgram.RemoteInfo): void;

    /**
     * Event method fired when the UDP connection is initialized and ready to listen for connections.
     * This event is only fired once.
     */
    protected onListen(): void {}

    /**
     * Event method fired when the UDP connection is closed.
     * This event is only fired once.
     */
    protected onClose(): void {}
}

/**
 * Closes a socket, resolving once the close event has fired.
 */
function closeSocket(socket: dgram.Socket): Promise<void> {
    return new Promise((resolve) => {
        try {
            socket.close(() => resolve());
        } catch (e) {
            // ERR_SOCKET_DGRAM_NOT_RUNNING: already closed.
            if (e instanceof Error && "code" in e && e.code === "ERR_SOCKET_DGRAM_NOT_RUNNING") resolve();
            else throw e;
        }
    });
}

/**
 * Binds a socket, resolving once it is listening.
 */
function bindSocket(socket: dgram.Socket, port: number, address: string): Promise<void> {
    return new Promise((resolve, reject) => {
        const onError = (err: Error) => {
            socket.off("listening", onListening);
            reject(err);
        };
        const onListening = () => {
            socket.off("error", onError);
            resolve();
        };

        socket.once("error", onError);
        socket.once("listening", onListening);
        socket.bind(port, address);
    });
}

export {
    UDPConnection,

    closeSocket,
    bindSocket
};

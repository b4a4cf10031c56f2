/**
 * @module UDP
 * CoAP client over UDP.
 */

import crypto from "crypto";
import dgram from "dgram";
import { OptionType, Packet, PacketType } from "../../common/datagram/packet.js";
import { ConnectionTarget } from "../../common/protocol/connection.js";
import { UDPConnection } from "../../common/protocol/udp.js";
import { CustomError, errorMessage } from "../../common/util/errors.js";
import { DefaultLogger } from "../../common/util/logger.js";

//#region ============== Constants ==============
const DEFAULT_RECEIVE_TIMEOUT = 5000;
const DEFAULT_COAP_PORT = 5683;
//#endregion ============== Constants ==============

class ReceiveTimeoutError extends CustomError {
    constructor(timeoutMs: number) {
        super(`No response received within ${timeoutMs}ms.`);
    }
}

class ClientClosedError extends CustomError {
    constructor() {
        super("The client has been closed.");
    }
}

type PacketFilter = (packet: Packet) => boolean;

interface Waiter {
    accepts: PacketFilter,
    resolve: (packet: Packet) => void,
    reject: (err: Error) => void,
    timer: NodeJS.Timeout
}

/**
 * A UDP client exchanging CoAP messages with a single server.
 * Messages that arrive while nobody is receiving are queued until the next {@link receive}.
 *
 * @example
 * const client = new CoAPClient(new ConnectionTarget("127.0.0.1", 5683));
 * const response = await client.request("coap://127.0.0.1/status");
 * client.close();
 */
class CoAPClient extends UDPConnection {
    private readonly target: ConnectionTarget;
    private inbox: Packet[];
    private waiters: Waiter[];
    private closed: boolean;

    public constructor(target: ConnectionTarget, logger?: DefaultLogger) {
        super(target.family === "IPv6" ? "udp6" : "udp4", logger);

        this.target = target.clone();
        this.inbox = [];
        this.waiters = [];
        this.closed = false;

        this.attach();
    }

    public onError(err: Error): void {
        this.logger.error("UDP Client got an error:", err);
    }

    public onMessage(msg: Buffer, rinfo: dgram.RemoteInfo): void {
        let packet: Packet;
        try {
            packet = Packet.deserialize(msg);
        } catch (e) {
            this.logger.warn(`UDP Client dropped a malformed message from ${ConnectionTarget.toQualifiedName(rinfo)}: ${errorMessage(e)}`);
            return;
        }

        const waiter = this.waiters.find((w) => w.accepts(packet));
        if (waiter) {
            this.waiters = this.waiters.filter((w) => w !== waiter);
            clearTimeout(waiter.timer);
            waiter.resolve(packet);
        } else {
            this.inbox.push(packet);
        }
    }

    /**
     * Sends a message to the target.
     */
    public send(packet: Packet): Promise<void> {
        if (this.closed) return Promise.reject(new ClientClosedError());

        const buf = packet.serialize();
        return new Promise((resolve, reject) => {
            this.socket.send(buf, this.target.port, this.target.address, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    /**
     * Resolves with the next message received that passes the filter, or rejects with {@link ReceiveTimeoutError}.
     * Queued messages that arrived before the call are considered first.
     */
    public receive(timeoutMs: number = DEFAULT_RECEIVE_TIMEOUT, accepts: PacketFilter = () => true): Promise<Packet> {
        if (this.closed) return Promise.reject(new ClientClosedError());

        const index = this.inbox.findIndex(accepts);
        if (index !== -1) return Promise.resolve(this.inbox.splice(index, 1)[0]);

        return new Promise((resolve, reject) => {
            const waiter: Waiter = {
                accepts,
                resolve,
                reject,
                timer: setTimeout(() => {
                    this.waiters = this.waiters.filter((w) => w !== waiter);
                    reject(new ReceiveTimeoutError(timeoutMs));
                }, timeoutMs)
            };

            this.waiters.push(waiter);
        });
    }

    /**
     * Sends a Confirmable GET for the path of a `coap://` URL to the target and resolves with the response carrying
     * the request's token. Queued messages with another token are discarded.
     *
     * @throws {TypeError} If the URL does not point at this client's target.
     */
    public async request(url: string, timeoutMs: number = DEFAULT_RECEIVE_TIMEOUT): Promise<Packet> {
        const target = CoAPClient.targetOf(url);
        if (!this.target.match(target)) throw new TypeError(`URL target '${target.qualifiedName}' does not match the client target '${this.target.qualifiedName}'.`);

        const packet = CoAPClient.makeGetRequest(url);
        const token = packet.getToken();
        const accepts = (response: Packet) => response.getToken().equals(token);

        const stale = this.inbox.length;
        this.inbox = this.inbox.filter(accepts);
        if (stale > this.inbox.length) this.logger.debug(`UDP Client discarded ${stale - this.inbox.length} stale message(s).`);

        await this.send(packet);
        return this.receive(timeoutMs, accepts);
    }

    /**
     * Closes the socket. Pending receives are rejected.
     */
    public async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;

        for (const waiter of this.waiters) {
            clearTimeout(waiter.timer);
            waiter.reject(new ClientClosedError());
        }
        this.waiters = [];

        this.detach();
        await this.closeSocket();
    }

    //#region ======= STATIC =======
    /**
     * Builds a Confirmable GET with a random message id and token from a `coap://` URL.
     *
     * @throws {TypeError} If the URL is not a `coap://` URL.
     */
    public static makeGetRequest(url: string): Packet {
        const parsed = new URL(url);
        if (parsed.protocol !== "coap:") throw new TypeError(`Unsupported URL scheme '${parsed.protocol}'.`);

        const packet = new Packet();
        packet.setType(PacketType.CONFIRMABLE);
        packet.setCode("0.01");
        packet.setMessageId(crypto.randomInt(0, 0x10000));
        packet.setToken(crypto.randomBytes(4));

        for (const segment of parsed.pathname.split("/").filter((s) => s.length > 0)) {
            packet.addOption(OptionType.URI_PATH, Buffer.from(decodeURIComponent(segment), "utf8"));
        }
        for (const [key, value] of parsed.searchParams) {
            packet.addOption(OptionType.URI_QUERY, Buffer.from(value ? `${key}=${value}` : key, "utf8"));
        }

        return packet;
    }

    /**
     * Extracts the target of a `coap://` URL, defaulting to port 5683.
     */
    public static targetOf(url: string): ConnectionTarget {
        const parsed = new URL(url);
        const host = parsed.hostname.replace(/^\[(.*)\]$/, "$1");

        return new ConnectionTarget(host, parsed.port ? Number(parsed.port) : DEFAULT_COAP_PORT);
    }
    //#endregion ======= STATIC =======
}

export {
    DEFAULT_RECEIVE_TIMEOUT,
    DEFAULT_COAP_PORT,

    ReceiveTimeoutError,
    ClientClosedError,

    CoAPClient
};

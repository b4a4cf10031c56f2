/**
 * @module Responder
 *
 * Per-datagram capability to send CoAP messages back to the peer that sent the datagram.
 */

import dgram from "dgram";
import { Packet, PacketType } from "../../common/datagram/packet.js";
import { ConnectionTarget } from "../../common/protocol/connection.js";
import { ResponderError } from "./errors.js";

/**
 * Sends messages to one peer through the socket that received the peer's datagram, so that responses leave
 * from the server's own address.
 *
 * Send failures are returned to the caller of {@link send} or {@link reply}; they never reach the dispatch core.
 */
class PeerResponder {
    private readonly socket: dgram.Socket;
    private readonly _target: ConnectionTarget;

    /**
     * @throws {ResponderError} If the target is not a routable IP address and port.
     */
    public constructor(socket: dgram.Socket, target: ConnectionTarget) {
        if (!target.isRoutable()) throw new ResponderError(`Cannot respond to unroutable peer '${target.qualifiedName}'.`);

        this.socket = socket;
        this._target = target.clone();
    }

    public get target(): ConnectionTarget {
        return this._target;
    }

    /**
     * Serializes and sends a message to the peer.
     */
    public send(packet: Packet): Promise<void> {
        const buf = packet.serialize();

        return new Promise((resolve, reject) => {
            this.socket.send(buf, this._target.port, this._target.address, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    /**
     * Answers a request with a 2.05 (Content) response carrying the given payload.
     * A Confirmable request is answered with a piggybacked Acknowledgement, a NonConfirmable one with a
     * NonConfirmable response. The message id and token of the request are echoed.
     *
     * @throws {ResponderError} If the request is an Acknowledgement or a Reset, which cannot be answered.
     */
    public async reply(request: Packet, payload: Buffer): Promise<void> {
        await this.send(PeerResponder.makeResponse(request, payload));
    }

    public static makeResponse(request: Packet, payload: Buffer): Packet {
        const response = new Packet();

        switch (request.getType()) {
            case PacketType.CONFIRMABLE: response.setType(PacketType.ACKNOWLEDGEMENT); break;
            case PacketType.NON_CONFIRMABLE: response.setType(PacketType.NON_CONFIRMABLE); break;
            default: throw new ResponderError(`Cannot reply to a message of type ${PacketType[request.getType()]}.`);
        }

        response.setCode("2.05");
        response.setMessageId(request.getMessageId());
        response.setToken(request.getToken());
        response.payload = payload;

        return response;
    }
}

export {
    PeerResponder
};

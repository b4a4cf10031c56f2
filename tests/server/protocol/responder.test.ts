import dgram from "dgram";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { Packet, PacketType } from "../../../src/common/datagram/packet.js";
import { ConnectionTarget } from "../../../src/common/protocol/connection.js";
import { ResponderError } from "../../../src/server/protocol/errors.js";
import { PeerResponder } from "../../../src/server/protocol/responder.js";
import { closeSocket, makeRequest, openLoopbackSocket } from "../../utils/udp.js";

describe("PeerResponder", () => {
    let socket: dgram.Socket;
    let peer: dgram.Socket;

    beforeEach(async () => {
        socket = await openLoopbackSocket();
        peer = await openLoopbackSocket();
    });

    afterEach(async () => {
        await closeSocket(socket);
        await closeSocket(peer);
    });

    it("refuses an unroutable peer", () => {
        expect(() => new PeerResponder(socket, new ConnectionTarget("127.0.0.1", 0))).toThrow(ResponderError);
        expect(() => new PeerResponder(socket, new ConnectionTarget("localhost", 5683))).toThrow("Cannot respond to unroutable peer 'localhost:5683'.");
    });

    it("keeps its own copy of the target", () => {
        const target = new ConnectionTarget("127.0.0.1", 5683);
        const responder = new PeerResponder(socket, target);

        expect(responder.target).not.toBe(target);
        expect(responder.target.match(target)).toBe(true);
    });

    it("sends replies from the receiving socket to the peer", async () => {
        const responder = new PeerResponder(socket, new ConnectionTarget("127.0.0.1", peer.address().port));
        const received = new Promise<[Buffer, dgram.RemoteInfo]>((resolve) => {
            peer.once("message", (msg, rinfo) => resolve([msg, rinfo]));
        });

        await responder.reply(makeRequest("ping", 42), Buffer.from("pong"));

        const [msg, rinfo] = await received;
        expect(rinfo.port).toBe(socket.address().port);

        const response = Packet.deserialize(msg);
        expect(response.getType()).toBe(PacketType.ACKNOWLEDGEMENT);
        expect(response.getMessageId()).toBe(42);
        expect(response.payload).toEqual(Buffer.from("pong"));
    });

    describe("makeResponse", () => {
        it("piggybacks the response of a Confirmable request", () => {
            const response = PeerResponder.makeResponse(makeRequest("a", 7), Buffer.from("x"));

            expect(response.getType()).toBe(PacketType.ACKNOWLEDGEMENT);
            expect(response.getCode()).toBe("2.05");
            expect(response.getMessageId()).toBe(7);
            expect(response.getToken()).toEqual(Buffer.from([0x51, 0x55, 0x77, 0xE8]));
            expect(response.getOptionNumbers()).toEqual([]);
        });

        it("answers a NonConfirmable request with a NonConfirmable response", () => {
            const response = PeerResponder.makeResponse(makeRequest("a", 7, PacketType.NON_CONFIRMABLE), Buffer.alloc(0));

            expect(response.getType()).toBe(PacketType.NON_CONFIRMABLE);
        });

        it.each([PacketType.ACKNOWLEDGEMENT, PacketType.RESET])("refuses to answer type %i", (type) => {
            expect(() => PeerResponder.makeResponse(makeRequest("a", 7, type), Buffer.alloc(0))).toThrow(ResponderError);
        });
    });
});

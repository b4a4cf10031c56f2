import dgram from "dgram";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { OptionType, Packet } from "../../../src/common/datagram/packet.js";
import { ConnectionTarget } from "../../../src/common/protocol/connection.js";
import { echoHandler } from "../../../src/server/handlers/echo.js";
import { PeerResponder } from "../../../src/server/protocol/responder.js";
import { closeSocket, makeRequest, openLoopbackSocket } from "../../utils/udp.js";

describe("echoHandler", () => {
    let socket: dgram.Socket;
    let peer: dgram.Socket;
    let responder: PeerResponder;

    beforeEach(async () => {
        socket = await openLoopbackSocket();
        peer = await openLoopbackSocket();
        responder = new PeerResponder(socket, new ConnectionTarget("127.0.0.1", peer.address().port));
    });

    afterEach(async () => {
        await closeSocket(socket);
        await closeSocket(peer);
    });

    function nextMessage(): Promise<Packet> {
        return new Promise((resolve) => peer.once("message", (msg) => resolve(Packet.deserialize(msg))));
    }

    it("replies with the joined path segments", async () => {
        const request = makeRequest("sensors");
        request.addOption(OptionType.URI_PATH, Buffer.from("temp"));
        const response = nextMessage();

        await echoHandler(request, responder);

        expect((await response).payload.toString()).toBe("sensors/temp");
    });

    it("replies with an empty payload when there is no path", async () => {
        const request = makeRequest("x");
        request.clearOption(OptionType.URI_PATH);
        const response = nextMessage();

        await echoHandler(request, responder);

        expect((await response).payload.byteLength).toBe(0);
    });
});

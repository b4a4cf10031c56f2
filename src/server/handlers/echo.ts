import { OptionType, Packet } from "../../common/datagram/packet.js";
import { PeerResponder } from "../protocol/responder.js";

/**
 * Replies with the request's Uri-Path segments joined by "/". Requests without a Uri-Path get an empty payload.
 */
async function echoHandler(request: Packet, responder: PeerResponder): Promise<void> {
    const segments = request.getOption(OptionType.URI_PATH) ?? [];
    const payload = Buffer.from(segments.map((segment) => segment.toString("utf8")).join("/"), "utf8");

    await responder.reply(request, payload);
}

export {
    echoHandler
};

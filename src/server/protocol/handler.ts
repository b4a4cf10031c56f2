/**
 * @module Handler
 *
 * The application-level capability invoked once per decoded request.
 */

import { Packet } from "../../common/datagram/packet.js";
import { PeerResponder } from "./responder.js";

/**
 * Handles one decoded request. The returned value, if any, is ignored; a returned promise is awaited by the worker
 * that runs the handler.
 *
 * A handler is invoked from several workers at once, for different datagrams, and must be safe to interleave:
 * any state it keeps across invocations is its own to synchronize.
 */
interface CoAPHandler {
    handle(request: Packet, responder: PeerResponder): void | Promise<void>;
}

type CoAPHandlerFn = (request: Packet, responder: PeerResponder) => void | Promise<void>;

type CoAPHandlerLike = CoAPHandler | CoAPHandlerFn;

/**
 * Normalizes a handler function or object into a {@link CoAPHandler}.
 */
function toHandler(handler: CoAPHandlerLike): CoAPHandler {
    if (typeof handler === "function") return { handle: handler };
    if (typeof handler === "object" && handler !== null && typeof handler.handle === "function") return handler;

    throw new TypeError("Handler must be a function or an object with a handle method.");
}

export {
    type CoAPHandler,
    type CoAPHandlerFn,
    type CoAPHandlerLike,

    toHandler
};

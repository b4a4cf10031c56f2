/**
 * @module Errors
 *
 * Errors surfaced to callers of the {@link CoAPServer} lifecycle.
 */

import { CustomError } from "../../common/util/errors.js";

/**
 * Base class of every lifecycle error of the CoAP server.
 *
 * @class CoAPServerError
 * @extends {CustomError}
 */
class CoAPServerError extends CustomError {}

/**
 * Address resolution failed, yielded no candidate, or the socket could not be bound.
 *
 * @class NetworkError
 * @extends {CoAPServerError}
 */
class NetworkError extends CoAPServerError {
    constructor(message: string, cause?: unknown) {
        super(message, { cause });
    }
}

/**
 * The reactor failed to confirm that its socket is being polled.
 *
 * @class EventLoopError
 * @extends {CoAPServerError}
 */
class EventLoopError extends CoAPServerError {
    constructor(cause?: unknown) {
        super("Reactor failed to register its socket.", { cause });
    }
}

/**
 * A start was attempted while another run is active.
 *
 * @class AlreadyRunningError
 * @extends {CoAPServerError}
 */
class AlreadyRunningError extends CoAPServerError {
    constructor() {
        super("Another handler is already running on this server.");
    }
}

/**
 * A peer responder could not be built or cannot answer the given request.
 *
 * @class ResponderError
 * @extends {CustomError}
 */
class ResponderError extends CustomError {}

export {
    CoAPServerError,
    NetworkError,
    EventLoopError,
    AlreadyRunningError,
    ResponderError
};

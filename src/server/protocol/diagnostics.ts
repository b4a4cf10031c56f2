/**
 * @module Diagnostics
 *
 * Fault reporting for the dispatch core. None of these events reach the caller of the lifecycle API; they are routed
 * here instead of being dropped silently.
 */

import { ConnectionTarget } from "../../common/protocol/connection.js";
import { errorMessage } from "../../common/util/errors.js";
import { DefaultLogger, getOrCreateGlobalLogger } from "../../common/util/logger.js";
import type { OverloadPolicy } from "./workerPool.js";

//#region ============== Types ==============
/**
 * Sink for faults raised while dispatching datagrams. Every member is optional.
 *
 * Methods are called synchronously from the reactor or from a worker task. A method that throws is logged by the reactor
 * and otherwise ignored.
 */
interface Diagnostics {
    /**
     * A datagram could not be decoded. No response was sent.
     */
    decodeFailure?(source: ConnectionTarget, error: Error): void;
    /**
     * A responder could not be built for the source of a decoded datagram. The handler was not invoked.
     */
    responderFailure?(source: ConnectionTarget, error: Error): void;
    /**
     * The handler threw or rejected while handling a datagram.
     */
    handlerFailure?(source: ConnectionTarget, error: unknown): void;
    /**
     * A datagram longer than the maximum datagram size was truncated before dispatch.
     */
    datagramTruncated?(source: ConnectionTarget, size: number, limit: number): void;
    /**
     * The worker pool queue was full and a datagram was dropped.
     */
    overload?(source: ConnectionTarget, policy: OverloadPolicy): void;
    /**
     * The reactor's socket failed. The run has ended and the server is idle again.
     */
    reactorFault?(error: Error): void;
}
//#endregion ============== Types ==============

/**
 * Creates a {@link Diagnostics} sink that reports every event to the given logger.
 */
function createLoggerDiagnostics(logger: DefaultLogger = getOrCreateGlobalLogger()): Required<Diagnostics> {
    return {
        decodeFailure(source, error) {
            logger.debug(`Dropped malformed datagram from ${source.qualifiedName}: ${error.message}`);
        },
        responderFailure(source, error) {
            logger.warn(`Could not build a responder for ${source.qualifiedName}: ${error.message}`);
        },
        handlerFailure(source, error) {
            logger.error(`Handler failed for datagram from ${source.qualifiedName}:`, error);
        },
        datagramTruncated(source, size, limit) {
            logger.warn(`Datagram from ${source.qualifiedName} truncated from ${size} to ${limit} bytes.`);
        },
        overload(source, policy) {
            logger.warn(`Worker queue full, dropped a datagram (${policy}) while receiving from ${source.qualifiedName}.`);
        },
        reactorFault(error) {
            logger.error(`Reactor stopped after a socket fault: ${errorMessage(error)}`);
        }
    };
}

export {
    type Diagnostics,

    createLoggerDiagnostics
};

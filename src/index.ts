/**
 * Public exports of the library.
 */

//#region ============== Protocol ==============
export * from "./common/datagram/packet.js";
export * from "./common/protocol/connection.js";
export * from "./server/protocol/diagnostics.js";
export * from "./server/protocol/errors.js";
export * from "./server/protocol/handler.js";
export * from "./server/protocol/reactor.js";
export * from "./server/protocol/responder.js";
export * from "./server/protocol/server.js";
export * from "./server/protocol/workerPool.js";
export * from "./client/protocol/udp.js";
//#endregion ============== Protocol ==============

//#region ============== Util ==============
export * as logger from "./common/util/logger.js";
export * as Shutdown from "./common/util/shutdown.js";
export * as Validation from "./common/util/validation.js";
//#endregion ============== Util ==============

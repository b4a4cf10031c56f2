#!/usr/bin/env node
/**
 * Entry point for the SERVER Solution.
 */

import { cac } from "cac";
import dotenv from "dotenv";
import isBinMode from "../common/util/isBinMode.js";
import { getOrCreateGlobalLogger } from "../common/util/logger.js";
import { registerShutdown } from "../common/util/shutdown.js";
import { loadConfig, RawConfig } from "./config.js";
import { echoHandler } from "./handlers/echo.js";
import { CoAPServer } from "./protocol/server.js";

//#region ============== Types ==============
interface CLIOptions {
    debug: boolean,
    config?: string,
    host?: string,
    port?: number,
    workers?: number
}
//#endregion ============== Types ==============

//#region ============== Constants ==============
const NAME = "coap-server";
const VERSION = "1.0.0";
//#endregion ============== Constants ==============

/**
 * Entry point for SERVER solution. Starts an echo server that answers every request with its Uri-Path.
 */
export async function serverInit(options: CLIOptions): Promise<CoAPServer> {
    const logger = getOrCreateGlobalLogger();

    const overrides: RawConfig = {};
    if (options.host !== undefined) overrides.host = options.host;
    if (options.port !== undefined) overrides.port = options.port;
    if (options.workers !== undefined) overrides.workers = options.workers;

    const config = await loadConfig({ file: options.config, overrides });
    logger.debug("Loaded config:", config);

    registerShutdown();

    const server = await CoAPServer.bind({ host: config.host, port: config.port }, {
        workers: config.workers,
        queueCapacity: config.queueCapacity,
        overloadPolicy: config.overloadPolicy,
        maxDatagramSize: config.maxDatagramSize,
        drainOnStop: config.drainOnStop
    });
    await server.start(echoHandler);

    logger.success(`Echo server ready at ${server.address.qualifiedName}.`);
    return server;
}

//#region ============== CLI ==============
const cli = cac(NAME).version(VERSION);
cli.help();
cli.option("--debug, -d", "Enable debug mode");
cli.option("--config [config]", "JSON configuration file.", { type: <never>String });
cli.option("--host [host]", "The address to bind to.", { type: <never>String });
cli.option("--port [port]", "The port to bind to.", { type: <never>Number });
cli.option("--workers [workers]", "Number of workers handling requests.", { type: <never>Number });

async function cliHandler() {
    const { options } = cli.parse();
    if (options.help || options.version) return; // Do not execute script if help message was requested.

    dotenv.config();
    getOrCreateGlobalLogger({ printCallerFile: options.debug, debug: options.debug });

    await serverInit({
        debug: options.debug === true,
        config: typeof options.config === "string" ? options.config : undefined,
        host: typeof options.host === "string" ? options.host : undefined,
        port: typeof options.port === "number" ? options.port : undefined,
        workers: typeof options.workers === "number" ? options.workers : undefined
    });
}
if (isBinMode(import.meta.url)) {
    cliHandler().catch((err) => {
        getOrCreateGlobalLogger().error("Server failed to start:", err);
        process.exitCode = 1;
    });
}
//#endregion ============== CLI ==============

export {
    type CLIOptions
};

#!/usr/bin/env node
/**
 * Entry point for the CLIENT Solution.
 */

import { cac } from "cac";
import isBinMode from "../common/util/isBinMode.js";
import { getOrCreateGlobalLogger } from "../common/util/logger.js";
import { CoAPClient, DEFAULT_RECEIVE_TIMEOUT } from "./protocol/udp.js";

//#region ============== Types ==============
interface CLIOptions {
    debug: boolean,
    timeout: number
}
//#endregion ============== Types ==============

//#region ============== Constants ==============
const NAME = "coap-client";
const VERSION = "1.0.0";
//#endregion ============== Constants ==============

/**
 * Sends a GET to the URL and returns the response payload as text.
 */
export async function clientRequest(url: string, options: CLIOptions): Promise<string> {
    const logger = getOrCreateGlobalLogger();

    const client = new CoAPClient(CoAPClient.targetOf(url));
    try {
        const response = await client.request(url, options.timeout);
        logger.debug(`Response ${response.getCode()} for message ${response.getMessageId()}.`);

        return response.payload.toString("utf8");
    } finally {
        await client.close();
    }
}

//#region ============== CLI ==============
const cli = cac(NAME).version(VERSION);
cli.help();
cli.usage("<url>");
cli.option("--debug, -d", "Enable debug mode");
cli.option("--timeout [timeout]", "Milliseconds to wait for a response.", { type: <never>Number, default: DEFAULT_RECEIVE_TIMEOUT });

async function cliHandler() {
    const { args, options } = cli.parse();
    if (options.help || options.version) return; // Do not execute script if help message was requested.

    getOrCreateGlobalLogger({ printCallerFile: options.debug, debug: options.debug });

    const url = args[0];
    if (!url) {
        cli.outputHelp();
        process.exitCode = 1;
        return;
    }

    const payload = await clientRequest(url, {
        debug: options.debug === true,
        timeout: typeof options.timeout === "number" ? options.timeout : DEFAULT_RECEIVE_TIMEOUT
    });
    process.stdout.write(payload + "\n");
}
if (isBinMode(import.meta.url)) {
    cliHandler().catch((err) => {
        getOrCreateGlobalLogger().error("Request failed:", err);
        process.exitCode = 1;
    });
}
//#endregion ============== CLI ==============

export {
    type CLIOptions
};

/**
 * @module Shutdown
 *
 * This module implements a gracious shutdown mechanism, where multiple subscribers can hook into this event,
 * to be called in subscription order before the application exits.
 *
 * **NOTE:** This module only handles exits via SIGINT and SIGTERM. Other signals like SIGKILL or SIGSEGV are not handled.
 */

import { getOrCreateGlobalLogger } from "./logger.js";

type ShutdownSubscriber = (() => void) | (() => Promise<void>);

/**
 * A list containing all subscribers to be triggered on a shutdown.
 */
const subscribers: ShutdownSubscriber[] = [];

let shuttingDown = false;

/**
 * Subscribes to the shutdown event. A function subscribed to the shutdown event will be ran when a gracious shutdown occurs.
 * @param subscriber The function to subscribe to the shutdown event.
 */
function subscribeShutdown(subscriber: ShutdownSubscriber): void {
    if (subscribers.includes(subscriber)) return;

    subscribers.push(subscriber);
}

/**
 * Unsubscribes from the shutdown event. The passed function must be an existing subscriber to the shutdown event.
 * @param subscriber The function to unsubscribe from the shutdown event.
 */
function unsubscribeShutdown(subscriber: ShutdownSubscriber): void {
    const index = subscribers.findIndex((e) => e === subscriber);
    if (index === -1) return;

    subscribers.splice(index, 1);
}

/**
 * Runs every subscriber in subscription order. A failing subscriber is logged and does not prevent the others from running.
 */
async function runShutdownSubscribers(): Promise<void> {
    const logger = getOrCreateGlobalLogger();

    for (const subscriber of [...subscribers]) {
        try {
            await subscriber();
        } catch (err) {
            logger.error("Shutdown subscriber failed:", err);
        }
    }
}

function _handleShutdown() {
    if (shuttingDown) return;
    shuttingDown = true;

    runShutdownSubscribers()
        .then(() => process.exit(0))
        .catch((err) => {
            getOrCreateGlobalLogger().error("Shutdown failed:", err);
            process.exit(1);
        });
}

/**
 * Register the shutdown event handler. Should be called on the entry point after a successful CLI processing.
 */
function registerShutdown() {
    process.on("SIGINT", _handleShutdown);
    process.on("SIGTERM", _handleShutdown);
}

export {
    type ShutdownSubscriber,

    subscribeShutdown,
    unsubscribeShutdown,
    runShutdownSubscribers,

    registerShutdown
};

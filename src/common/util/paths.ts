/**
 * @module Paths
 *
 * Filesystem path helpers.
 */

import fsp from "fs/promises";

/**
 * Reads and parses a JSON file. The result is not validated.
 */
async function readJsonFile(filePath: string): Promise<unknown> {
    const content = await fsp.readFile(filePath, "utf8");
    return JSON.parse(content);
}

export {
    readJsonFile
};

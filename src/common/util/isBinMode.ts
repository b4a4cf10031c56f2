import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";

/**
 * Checks whether the module with the given `import.meta.url` is the script node was started with,
 * as opposed to being imported by another module.
 */
function isBinMode(metaUrl: string): boolean {
    const entry = process.argv[1];
    if (!entry) return false;

    const modulePath = fileURLToPath(metaUrl);
    try {
        return fs.realpathSync(path.resolve(entry)) === fs.realpathSync(modulePath);
    } catch {
        return path.resolve(entry) === modulePath;
    }
}

export default isBinMode;
export {
    isBinMode
};

import path from "path";
import { readJsonFile } from "../common/util/paths.js";
import { isInvalid, makeInvalid, makeValid, Validation } from "../common/util/validation.js";
import { getOrCreateGlobalLogger } from "../common/util/logger.js";
import { DEFAULT_MAX_DATAGRAM_SIZE } from "./protocol/reactor.js";
import { DEFAULT_WORKER_COUNT } from "./protocol/server.js";
import { DEFAULT_QUEUE_CAPACITY, OVERLOAD_POLICIES, OverloadPolicy } from "./protocol/workerPool.js";

//#region ============== Types ==============
interface ServerConfig {
    host: string,
    port: number,
    workers: number,
    queueCapacity: number,
    overloadPolicy: OverloadPolicy,
    maxDatagramSize: number,
    drainOnStop: boolean
}

type RawConfig = Record<string, unknown>;

interface LoadConfigOptions {
    /**
     * JSON file to read, relative to the working directory.
     */
    file?: string,
    env?: NodeJS.ProcessEnv,
    /**
     * Values taking precedence over every other layer, typically from the CLI.
     */
    overrides?: RawConfig
}
//#endregion ============== Types ==============

//#region ============== Constants ==============
const DEFAULT_CONFIG: Readonly<ServerConfig> = {
    host: "127.0.0.1",
    port: 5683,
    workers: DEFAULT_WORKER_COUNT,
    queueCapacity: DEFAULT_QUEUE_CAPACITY,
    overloadPolicy: "reject",
    maxDatagramSize: DEFAULT_MAX_DATAGRAM_SIZE,
    drainOnStop: false
};

const CONFIG_KEYS = Object.keys(DEFAULT_CONFIG);

/**
 * Largest payload a UDP datagram can carry over IPv4.
 */
const MAX_UDP_PAYLOAD = 65507;

const ENV_KEYS: Record<string, keyof ServerConfig> = {
    COAP_HOST: "host",
    COAP_PORT: "port",
    COAP_WORKERS: "workers",
    COAP_QUEUE_CAPACITY: "queueCapacity",
    COAP_OVERLOAD_POLICY: "overloadPolicy",
    COAP_MAX_DATAGRAM_SIZE: "maxDatagramSize",
    COAP_DRAIN_ON_STOP: "drainOnStop"
};
//#endregion ============== Constants ==============

function isRecord(value: unknown): value is RawConfig {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function invalidKey(key: string, expected: string, value: unknown): Validation<never> {
    return makeInvalid(new Error(`Config property '${key}' must be ${expected}, got ${JSON.stringify(value)}.`));
}

function readInteger(raw: RawConfig, key: string, min: number, max: number): Validation<number | undefined> {
    const value = raw[key];
    if (value === undefined) return makeValid(undefined);
    if (typeof value !== "number" || !Number.isInteger(value) || value < min || value > max)
        return invalidKey(key, `an integer between ${min} and ${max}`, value);

    return makeValid(value);
}

/**
 * Converts the string values of the environment into the types of a {@link ServerConfig}.
 * Strings that cannot be converted are kept as they are, so that validation reports them.
 */
function parseEnvConfig(env: NodeJS.ProcessEnv): RawConfig {
    const raw: RawConfig = {};

    for (const [envKey, key] of Object.entries(ENV_KEYS)) {
        const value = env[envKey];
        if (value === undefined || value === "") continue;

        switch (typeof DEFAULT_CONFIG[key]) {
            case "number":
                raw[key] = /^-?\d+$/.test(value) ? Number(value) : value;
                break;
            case "boolean":
                raw[key] = value === "true" || value === "1" ? true : value === "false" || value === "0" ? false : value;
                break;
            default:
                raw[key] = value;
        }
    }

    return raw;
}

/**
 * Validates one layer of configuration. Every property is optional; unknown properties are warned about and ignored.
 */
function validateConfig(raw: unknown): Validation<Partial<ServerConfig>> {
    const logger = getOrCreateGlobalLogger();

    if (!isRecord(raw)) return makeInvalid(new Error("Config must be a JSON object."));

    const config: Partial<ServerConfig> = {};

    if (raw.host !== undefined) {
        if (typeof raw.host !== "string" || raw.host.length === 0) return invalidKey("host", "a non-empty string", raw.host);
        config.host = raw.host;
    }

    const integers = [
        ["port", 0, 0xFFFF],
        ["workers", 1, Number.MAX_SAFE_INTEGER],
        ["queueCapacity", 1, Number.MAX_SAFE_INTEGER],
        ["maxDatagramSize", 1, MAX_UDP_PAYLOAD]
    ] as const;

    for (const [key, min, max] of integers) {
        const val = readInteger(raw, key, min, max);
        if (isInvalid(val)) return val;
        if (val.value !== undefined) config[key] = val.value;
    }

    if (raw.overloadPolicy !== undefined) {
        const policy = OVERLOAD_POLICIES.find((p) => p === raw.overloadPolicy);
        if (!policy) return invalidKey("overloadPolicy", `one of ${OVERLOAD_POLICIES.join(", ")}`, raw.overloadPolicy);
        config.overloadPolicy = policy;
    }

    if (raw.drainOnStop !== undefined) {
        if (typeof raw.drainOnStop !== "boolean") return invalidKey("drainOnStop", "a boolean", raw.drainOnStop);
        config.drainOnStop = raw.drainOnStop;
    }

    // Emit warnings for additional unknown properties, but ignore them.
    for (const key of Object.keys(raw).filter((k) => !CONFIG_KEYS.includes(k))) {
        logger.warn(`Config has unknown property '${key}'.`);
    }

    return makeValid(config);
}

/**
 * Builds the server configuration from, in increasing precedence: defaults, a JSON file, the environment
 * and the overrides.
 *
 * @throws {Error} If any layer is invalid. The cause names the offending property.
 */
async function loadConfig(options: LoadConfigOptions = {}): Promise<ServerConfig> {
    const layers: { source: string, raw: unknown }[] = [];

    if (options.file) {
        const filePath = path.resolve(process.cwd(), options.file);
        layers.push({ source: filePath, raw: await readJsonFile(filePath) });
    }
    layers.push({ source: "environment", raw: parseEnvConfig(options.env ?? process.env) });
    if (options.overrides) layers.push({ source: "overrides", raw: options.overrides });

    let config: ServerConfig = { ...DEFAULT_CONFIG };
    for (const layer of layers) {
        const validation = validateConfig(layer.raw);
        if (isInvalid(validation)) throw new Error(`Invalid config from ${layer.source}.`, { cause: validation.error });

        config = { ...config, ...validation.value };
    }

    return config;
}

export {
    type ServerConfig,
    type RawConfig,
    type LoadConfigOptions,

    DEFAULT_CONFIG,

    parseEnvConfig,
    validateConfig,
    loadConfig
};

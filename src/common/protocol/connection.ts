/**
 * @module Connection
 *
 * Utility for representation and usage of remote target addresses.
 * Should be preferred in place of direct address/port values.
 */

import net from "net";

//#region ============== Types ==============
/**
 * This interface represents a remote target.
 */
interface RemoteInfo {
    address: string;
    family: "IPv4" | "IPv6";
    port: number;
    size: number;
}

/**
 * Any object that represents a remote target following the structure of a ConnectionTarget.
 */
type ConnectionTargetLike = ConnectionTarget | RemoteInfo;

/**
 * A host and port pair, where the host may still need to be resolved.
 */
interface HostPort {
    host: string;
    port: number;
}
//#endregion ============== Types ==============

/**
 * Represents a remote target that can be connected to.
 */
class ConnectionTarget {
    private _address: string;
    private _port: number;

    constructor(rinfo: RemoteInfo);
    constructor(address: string, port: number);
    constructor(first: RemoteInfo | string, port?: number) {
        if (typeof first === "string") {
            this._address = first;
            this._port = port ?? 0;
        } else {
            this._address = first.address;
            this._port = first.port;
        }
    }

    /**
     * The public IP address for the target.
     */
    public get address(): string {
        return this._address;
    }

    /**
     * The connection port for the target.
     */
    public get port(): number {
        return this._port;
    }

    /**
     * The IP family of the address, or undefined if the address is not an IP literal.
     */
    public get family(): "IPv4" | "IPv6" | undefined {
        switch (net.isIP(this._address)) {
            case 4: return "IPv4";
            case 6: return "IPv6";
            default: return undefined;
        }
    }

    /**
     * The qualified address for the target, with the format "<IP>:<PORT>", or "[<IP>]:<PORT>" for IPv6.
     */
    public get qualifiedName(): string {
        return ConnectionTarget.toQualifiedName(this);
    }

    /**
     * Whether the target can be sent datagrams to: an IP literal and a port in 1..65535.
     */
    public isRoutable(): boolean {
        return this.family !== undefined && Number.isInteger(this._port) && this._port > 0 && this._port <= 0xFFFF;
    }

    /**
     * Compares a {@link ConnectionTargetLike} with the current instance to check whether they point to the same target.
     * @param rinfo The ConnectionTargetLike to compare with.
     * @returns Whether the instances point to the same target.
     */
    public match(rinfo: ConnectionTargetLike): boolean {
        return rinfo.address === this._address && rinfo.port === this._port;
    }

    public clone(): ConnectionTarget {
        return new ConnectionTarget(this._address, this._port);
    }

    //#region ======= STATIC =======
    /**
     * Converts a {@link ConnectionTargetLike} to it's qualified name.
     *
     * @param rinfo The ConnectionTargetLike to convert.
     * @returns The qualified address for the target, with the format "<IP>:<PORT>".
     */
    public static toQualifiedName(rinfo: ConnectionTargetLike): string {
        const host = net.isIPv6(rinfo.address) ? `[${rinfo.address}]` : rinfo.address;
        return `${host}:${rinfo.port}`;
    }

    /**
     * Splits a "host:port" or "[ipv6]:port" string. The host is not resolved.
     *
     * @throws {TypeError} If the string has no port, or the port is not a number in 0..65535.
     */
    public static parseHostPort(address: string): HostPort {
        const match = /^\[([^\]]+)\]:(\d+)$/.exec(address) ?? /^([^:]+):(\d+)$/.exec(address);
        if (!match) throw new TypeError(`Address '${address}' is not in the form host:port.`);

        const port = Number(match[2]);
        if (port > 0xFFFF) throw new TypeError(`Port ${port} is out of range.`);

        return { host: match[1], port };
    }
    //#endregion ======= STATIC =======
}

export {
    type RemoteInfo,
    type ConnectionTargetLike,
    type HostPort,

    ConnectionTarget
};

/**
 * @module Packet
 *
 * Definition of the CoAP message (RFC 7252) exchanged between the SERVER and CLIENT solutions,
 * together with its wire codec.
 */

import { BufferReader, BufferUnderflowError, BufferWriter } from "../util/buffer.js";
import { CustomError } from "../util/errors.js";

//#region ============== Constants ==============
const COAP_VERSION = 1;
const PAYLOAD_MARKER = 0xFF;
const MAX_TOKEN_LENGTH = 8;
const MAX_MESSAGE_ID = 0xFFFF;

enum PacketType {
    CONFIRMABLE     = 0,
    NON_CONFIRMABLE = 1,
    ACKNOWLEDGEMENT = 2,
    RESET           = 3
}

enum OptionType {
    IF_MATCH       = 1,
    URI_HOST       = 3,
    ETAG           = 4,
    IF_NONE_MATCH  = 5,
    OBSERVE        = 6,
    URI_PORT       = 7,
    LOCATION_PATH  = 8,
    URI_PATH       = 11,
    CONTENT_FORMAT = 12,
    MAX_AGE        = 14,
    URI_QUERY      = 15,
    ACCEPT         = 17,
    LOCATION_QUERY = 20,
    BLOCK2         = 23,
    BLOCK1         = 27,
    SIZE2          = 28,
    PROXY_URI      = 35,
    PROXY_SCHEME   = 39,
    SIZE1          = 60
}
//#endregion ============== Constants ==============

//#region ============== Errors ==============
class PacketDecodeError extends CustomError {
    constructor(reason: string) {
        super(`Malformed CoAP message: ${reason}`);
    }
}

class PacketEncodeError extends CustomError {}
//#endregion ============== Errors ==============

//#region ============== Option Encoding ==============
/**
 * Splits an option delta or length into its 4-bit nibble and extended bytes.
 */
function encodeOptionField(value: number): { nibble: number, extended?: { size: 1 | 2, value: number } } {
    if (value < 13) return { nibble: value };
    if (value < 269) return { nibble: 13, extended: { size: 1, value: value - 13 } };
    if (value <= 0xFFFF + 269) return { nibble: 14, extended: { size: 2, value: value - 269 } };

    throw new PacketEncodeError(`Option field value ${value} is too large.`);
}

function decodeOptionField(nibble: number, reader: BufferReader): number {
    switch (nibble) {
        case 13: return reader.readUInt8() + 13;
        case 14: return reader.readUInt16() + 269;
        case 15: throw new PacketDecodeError("reserved option nibble 15.");
        default: return nibble;
    }
}
//#endregion ============== Option Encoding ==============

/**
 * A single CoAP message.
 *
 * @example
 * const packet = new Packet();
 * packet.setType(PacketType.CONFIRMABLE);
 * packet.setCode("0.01");
 * packet.setMessageId(1);
 * packet.addOption(OptionType.URI_PATH, Buffer.from("status"));
 * socket.send(packet.serialize(), port, address);
 */
class Packet {
    protected version: number;
    protected type: PacketType;
    protected code: number;
    protected messageId: number;
    protected token: Buffer;
    protected options: Map<number, Buffer[]>;
    public payload: Buffer;

    public constructor() {
        this.version = COAP_VERSION;
        this.type = PacketType.CONFIRMABLE;
        this.code = 0;
        this.messageId = 0;
        this.token = Buffer.alloc(0);
        this.options = new Map();
        this.payload = Buffer.alloc(0);
    }

    public getVersion(): number { return this.version; }
    public getType(): PacketType { return this.type; }
    public getMessageId(): number { return this.messageId; }
    public getToken(): Buffer { return this.token; }

    public setType(type: PacketType): void {
        if (!Number.isInteger(type) || type < PacketType.CONFIRMABLE || type > PacketType.RESET)
            throw new PacketEncodeError(`Message type ${type} is out of range.`);

        this.type = type;
    }

    public setMessageId(messageId: number): void {
        if (!Number.isInteger(messageId) || messageId < 0 || messageId > MAX_MESSAGE_ID)
            throw new PacketEncodeError(`Message id ${messageId} is out of range.`);

        this.messageId = messageId;
    }

    public setToken(token: Buffer | number[]): void {
        const buf = Buffer.from(token);
        if (buf.byteLength > MAX_TOKEN_LENGTH)
            throw new PacketEncodeError(`Token length ${buf.byteLength} exceeds ${MAX_TOKEN_LENGTH} bytes.`);

        this.token = buf;
    }

    /**
     * Returns the code in its dotted "class.detail" form, e.g. "2.05".
     */
    public getCode(): string {
        return `${this.code >> 5}.${String(this.code & 0x1F).padStart(2, "0")}`;
    }

    /**
     * Sets the code from its dotted "class.detail" form, e.g. "0.01" for GET.
     */
    public setCode(code: string): void {
        const match = /^([0-7])\.(\d{1,2})$/.exec(code);
        if (!match || Number(match[2]) > 31) throw new PacketEncodeError(`Invalid code '${code}'.`);

        this.code = (Number(match[1]) << 5) | Number(match[2]);
    }

    //#region ======= Options =======
    public addOption(option: OptionType | number, value: Buffer): void {
        const values = this.options.get(option);
        if (values) values.push(value);
        else this.options.set(option, [value]);
    }

    public getOption(option: OptionType | number): Buffer[] | undefined {
        return this.options.get(option);
    }

    public clearOption(option: OptionType | number): void {
        this.options.delete(option);
    }

    public getOptionNumbers(): number[] {
        return [...this.options.keys()].sort((a, b) => a - b);
    }
    //#endregion ======= Options =======

    //#region ======= Codec =======
    public serialize(): Buffer {
        const writer = new BufferWriter();
        writer.writeUInt8((this.version << 6) | (this.type << 4) | this.token.byteLength);
        writer.writeUInt8(this.code);
        writer.writeUInt16(this.messageId);
        writer.write(this.token);

        let previous = 0;
        for (const number of this.getOptionNumbers()) {
            for (const value of this.options.get(number) ?? []) {
                const delta = encodeOptionField(number - previous);
                const length = encodeOptionField(value.byteLength);

                writer.writeUInt8((delta.nibble << 4) | length.nibble);
                for (const ext of [delta.extended, length.extended]) {
                    if (ext?.size === 1) writer.writeUInt8(ext.value);
                    else if (ext?.size === 2) writer.writeUInt16(ext.value);
                }
                writer.write(value);

                previous = number;
            }
        }

        if (this.payload.byteLength > 0) {
            writer.writeUInt8(PAYLOAD_MARKER);
            writer.write(this.payload);
        }

        return writer.finish();
    }

    /**
     * Decodes a datagram into a {@link Packet}.
     *
     * @throws {PacketDecodeError} If the datagram is not a well-formed CoAP message.
     */
    public static deserialize(buf: Buffer): Packet {
        try {
            return Packet._deserialize(new BufferReader(buf));
        } catch (e) {
            if (e instanceof BufferUnderflowError) throw new PacketDecodeError("unexpected end of datagram.");
            throw e;
        }
    }

    private static _deserialize(reader: BufferReader): Packet {
        if (reader.remaining() < 4) throw new PacketDecodeError("header is shorter than 4 bytes.");

        const first = reader.readUInt8();
        const packet = new Packet();

        const version = first >> 6;
        if (version !== COAP_VERSION) throw new PacketDecodeError(`unsupported version ${version}.`);

        const tokenLength = first & 0x0F;
        if (tokenLength > MAX_TOKEN_LENGTH) throw new PacketDecodeError(`token length ${tokenLength} is reserved.`);

        packet.type = (first >> 4) & 0x03;
        packet.code = reader.readUInt8();
        packet.messageId = reader.readUInt16();
        packet.token = Buffer.from(reader.read(tokenLength));

        let number = 0;
        while (!reader.eof()) {
            const header = reader.readUInt8();
            if (header === PAYLOAD_MARKER) {
                if (reader.eof()) throw new PacketDecodeError("payload marker followed by an empty payload.");
                packet.payload = Buffer.from(reader.readRest());
                break;
            }

            number += decodeOptionField(header >> 4, reader);
            const length = decodeOptionField(header & 0x0F, reader);
            packet.addOption(number, Buffer.from(reader.read(length)));
        }

        return packet;
    }
    //#endregion ======= Codec =======
}

export {
    COAP_VERSION,
    MAX_TOKEN_LENGTH,

    PacketType,
    OptionType,

    PacketDecodeError,
    PacketEncodeError,

    Packet
};

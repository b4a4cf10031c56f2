import { describe, expect, it } from "vitest";
import { OptionType, Packet, PacketDecodeError, PacketEncodeError, PacketType } from "../../../src/common/datagram/packet.js";

describe("Packet", () => {
    describe("serialize", () => {
        it("encodes header, token and a single option", () => {
            const packet = new Packet();
            packet.setType(PacketType.CONFIRMABLE);
            packet.setCode("0.01");
            packet.setMessageId(1);
            packet.setToken([0x51, 0x55, 0x77, 0xE8]);
            packet.addOption(OptionType.URI_PATH, Buffer.from("test-echo"));

            expect(packet.serialize()).toEqual(Buffer.concat([
                Buffer.from([0x44, 0x01, 0x00, 0x01, 0x51, 0x55, 0x77, 0xE8, 0xB9]),
                Buffer.from("test-echo")
            ]));
        });

        it("uses an extended delta and appends the payload after the marker", () => {
            const packet = new Packet();
            packet.setType(PacketType.ACKNOWLEDGEMENT);
            packet.setCode("2.05");
            packet.setMessageId(0x1234);
            packet.addOption(OptionType.SIZE1, Buffer.from([0x10]));
            packet.payload = Buffer.from("hi");

            expect(packet.serialize()).toEqual(Buffer.from([0x60, 0x45, 0x12, 0x34, 0xD1, 0x2F, 0x10, 0xFF, 0x68, 0x69]));
        });

        it("writes options in ascending number order with deltas", () => {
            const packet = new Packet();
            packet.setCode("0.01");
            packet.addOption(OptionType.URI_PATH, Buffer.from("a"));
            packet.addOption(OptionType.URI_HOST, Buffer.from("h"));

            expect(packet.serialize()).toEqual(Buffer.from([0x40, 0x01, 0x00, 0x00, 0x31, 0x68, 0x81, 0x61]));
        });

        it("encodes repeated options with a zero delta", () => {
            const packet = new Packet();
            packet.addOption(OptionType.URI_PATH, Buffer.from("a"));
            packet.addOption(OptionType.URI_PATH, Buffer.from("b"));

            expect(packet.serialize()).toEqual(Buffer.from([0x40, 0x00, 0x00, 0x00, 0xB1, 0x61, 0x01, 0x62]));
        });

        it("uses a two-byte extended length for long option values", () => {
            const packet = new Packet();
            packet.addOption(OptionType.PROXY_URI, Buffer.alloc(300, 0x61));

            const buf = packet.serialize();
            // Delta 35 -> nibble 13 (+22), length 300 -> nibble 14 (+31).
            expect(buf.subarray(4, 8)).toEqual(Buffer.from([0xDE, 0x16, 0x00, 0x1F]));
            expect(buf.byteLength).toBe(4 + 4 + 300);

            expect(Packet.deserialize(buf).getOption(OptionType.PROXY_URI)).toEqual([Buffer.alloc(300, 0x61)]);
        });
    });

    describe("deserialize", () => {
        it("decodes every field of a request", () => {
            const packet = Packet.deserialize(Buffer.concat([
                Buffer.from([0x44, 0x01, 0x00, 0x01, 0x51, 0x55, 0x77, 0xE8, 0xB9]),
                Buffer.from("test-echo"),
                Buffer.from([0xFF, 0x70])
            ]));

            expect(packet.getVersion()).toBe(1);
            expect(packet.getType()).toBe(PacketType.CONFIRMABLE);
            expect(packet.getCode()).toBe("0.01");
            expect(packet.getMessageId()).toBe(1);
            expect(packet.getToken()).toEqual(Buffer.from([0x51, 0x55, 0x77, 0xE8]));
            expect(packet.getOption(OptionType.URI_PATH)).toEqual([Buffer.from("test-echo")]);
            expect(packet.getOptionNumbers()).toEqual([OptionType.URI_PATH]);
            expect(packet.payload).toEqual(Buffer.from("p"));
        });

        it("accumulates option deltas", () => {
            const packet = Packet.deserialize(Buffer.from([0x40, 0x01, 0x00, 0x00, 0x31, 0x68, 0x81, 0x61]));

            expect(packet.getOption(OptionType.URI_HOST)).toEqual([Buffer.from("h")]);
            expect(packet.getOption(OptionType.URI_PATH)).toEqual([Buffer.from("a")]);
        });

        it.each([
            ["a datagram shorter than the header", [0x40], "header is shorter than 4 bytes."],
            ["an unsupported version", [0x80, 0x01, 0x00, 0x00], "unsupported version 2."],
            ["a reserved token length", [0x49, 0x01, 0x00, 0x00], "token length 9 is reserved."],
            ["a truncated token", [0x44, 0x01, 0x00, 0x01, 0x51], "unexpected end of datagram."],
            ["a truncated option value", [0x40, 0x01, 0x00, 0x00, 0xB3, 0x61], "unexpected end of datagram."],
            ["a reserved option nibble", [0x40, 0x01, 0x00, 0x00, 0xF1], "reserved option nibble 15."],
            ["a payload marker without payload", [0x40, 0x01, 0x00, 0x00, 0xFF], "payload marker followed by an empty payload."]
        ])("rejects %s", (_name, bytes, reason) => {
            expect(() => Packet.deserialize(Buffer.from(bytes))).toThrow(new PacketDecodeError(reason));
        });
    });

    describe("fields", () => {
        it("formats and parses dotted codes", () => {
            const packet = new Packet();
            packet.setCode("4.04");

            expect(packet.getCode()).toBe("4.04");
            expect(packet.serialize()[1]).toBe(0x84);
        });

        it("rejects invalid codes, tokens, message ids and types", () => {
            const packet = new Packet();

            expect(() => packet.setCode("8.01")).toThrow(PacketEncodeError);
            expect(() => packet.setCode("2.32")).toThrow(PacketEncodeError);
            expect(() => packet.setToken(Buffer.alloc(9))).toThrow(PacketEncodeError);
            expect(() => packet.setMessageId(0x10000)).toThrow(PacketEncodeError);
            const unknownType: number = 5;
            expect(() => packet.setType(unknownType)).toThrow(new PacketEncodeError("Message type 5 is out of range."));
            expect(packet.serialize()[0]).toBe(0x40);
        });

        it("clears options", () => {
            const packet = new Packet();
            packet.addOption(OptionType.URI_PATH, Buffer.from("a"));
            packet.clearOption(OptionType.URI_PATH);

            expect(packet.getOption(OptionType.URI_PATH)).toBeUndefined();
        });
    });
});

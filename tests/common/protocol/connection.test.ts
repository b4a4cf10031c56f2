import { describe, expect, it } from "vitest";
import { ConnectionTarget } from "../../../src/common/protocol/connection.js";

describe("ConnectionTarget", () => {
    it("builds from remote info and from an address and port", () => {
        const fromInfo = new ConnectionTarget({ address: "10.0.0.1", family: "IPv4", port: 5683, size: 12 });
        const fromPair = new ConnectionTarget("10.0.0.1", 5683);

        expect(fromInfo.match(fromPair)).toBe(true);
        expect(fromPair.qualifiedName).toBe("10.0.0.1:5683");
        expect(fromPair.family).toBe("IPv4");
    });

    it("brackets IPv6 addresses in qualified names", () => {
        const target = new ConnectionTarget("::1", 5683);

        expect(target.family).toBe("IPv6");
        expect(target.qualifiedName).toBe("[::1]:5683");
    });

    it("only considers IP literals with a non-zero port routable", () => {
        expect(new ConnectionTarget("127.0.0.1", 5683).isRoutable()).toBe(true);
        expect(new ConnectionTarget("127.0.0.1", 0).isRoutable()).toBe(false);
        expect(new ConnectionTarget("localhost", 5683).isRoutable()).toBe(false);
    });

    it("clones into an independent equal target", () => {
        const target = new ConnectionTarget("127.0.0.1", 1234);
        const clone = target.clone();

        expect(clone).not.toBe(target);
        expect(clone.match(target)).toBe(true);
    });

    describe("parseHostPort", () => {
        it.each([
            ["127.0.0.1:5683", { host: "127.0.0.1", port: 5683 }],
            ["localhost:0", { host: "localhost", port: 0 }],
            ["[::1]:5684", { host: "::1", port: 5684 }]
        ])("parses %s", (address, expected) => {
            expect(ConnectionTarget.parseHostPort(address)).toEqual(expected);
        });

        it("rejects addresses without a port or with an out of range port", () => {
            expect(() => ConnectionTarget.parseHostPort("localhost")).toThrow("Address 'localhost' is not in the form host:port.");
            expect(() => ConnectionTarget.parseHostPort("::1:5683")).toThrow(TypeError);
            expect(() => ConnectionTarget.parseHostPort("127.0.0.1:70000")).toThrow("Port 70000 is out of range.");
        });
    });
});

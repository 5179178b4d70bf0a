import { describe, expect, it } from "vitest";
import { isOpenInternet, parseCidr } from "./cidr.js";

describe("parseCidr", () => {
    describe("given a well-formed IPv4 CIDR", () => {
        it("should return the address and prefix length", () => {
            // Act
            const result = parseCidr("10.20.0.0/16", "ipv4");

            // Assert
            expect(result).toEqual({
                ok: true,
                cidr: { address: "10.20.0.0", prefixLength: 16, family: "ipv4" },
            });
        });

        it("should accept host bits set", () => {
            // Act
            const result = parseCidr("10.20.1.5/16", "ipv4");

            // Assert
            expect(result.ok).toBe(true);
        });
    });

    describe("given a bare IPv4 address", () => {
        it("should treat it as a single-host network", () => {
            // Act
            const result = parseCidr("192.0.2.10", "ipv4");

            // Assert
            expect(result.ok && result.cidr.prefixLength).toBe(32);
        });
    });

    describe("given an out-of-range octet", () => {
        it("should reject the address", () => {
            // Act
            const result = parseCidr("10.0.0.256/24", "ipv4");

            // Assert
            expect(result).toEqual({
                ok: false,
                reason: "'10.0.0.256' is not a valid IPv4 address",
            });
        });
    });

    describe("given an IPv4 prefix longer than 32", () => {
        it("should reject the netmask", () => {
            // Act
            const result = parseCidr("10.0.0.0/33", "ipv4");

            // Assert
            expect(result).toEqual({
                ok: false,
                reason: "'33' is not a valid netmask (expected 0-32)",
            });
        });
    });

    describe("given an IPv6 CIDR checked as IPv4", () => {
        it("should reject it", () => {
            // Act
            const result = parseCidr("2001:db8::/32", "ipv4");

            // Assert
            expect(result.ok).toBe(false);
        });
    });

    describe("given a well-formed IPv6 CIDR", () => {
        it("should accept prefixes up to 128", () => {
            // Act
            const result = parseCidr("2001:db8::/128", "ipv6");

            // Assert
            expect(result.ok && result.cidr.prefixLength).toBe(128);
        });
    });

    describe("given a non-numeric prefix", () => {
        it("should reject the netmask", () => {
            // Act
            const result = parseCidr("2001:db8::/abc", "ipv6");

            // Assert
            expect(result.ok).toBe(false);
        });
    });
});

describe("isOpenInternet", () => {
    it("should match 0.0.0.0/0 only for IPv4", () => {
        expect(isOpenInternet("0.0.0.0/0", "ipv4")).toBe(true);
        expect(isOpenInternet("0.0.0.0/0", "ipv6")).toBe(false);
    });

    it("should match ::/0 for IPv6", () => {
        expect(isOpenInternet("::/0", "ipv6")).toBe(true);
    });
});

import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { createGuardrailsParser } from "./parse-guardrails.js";
import { YamlSyntaxError } from "./parse-yaml.js";

describe("ParseGuardrails", () => {
    const parser = createGuardrailsParser();

    describe("given a document with only some sections", () => {
        it("should fill the rest from defaults", () => {
            // Arrange
            const input = [
                "validation:",
                "  blocked_ports: [23, 3389]",
                "  naming:",
                "    required_tags: [team]",
                "type_overrides:",
                "  database:",
                "    allowed_protocols: [tcp, 6]",
                "    max_rules: 20",
            ].join("\n");

            // Act
            const result = parser.parse(input);

            // Assert
            expect(result.blockedPorts).toEqual([23, 3389]);
            expect(result.maxRangeSize).toBe(1000);
            expect(result.maxIngressRules).toBe(60);
            expect(result.naming).toEqual({
                securityGroupPattern: "^[a-z0-9][a-z0-9-]*[a-z0-9]$",
                maxNameLength: 63,
                requiredTags: ["team"],
                reservedPrefixes: ["default", "baseline", "aws-", "amazon-"],
            });
            expect(result.typeOverrides.database).toEqual({
                allowedProtocols: ["tcp", "6"],
                requiredEgress: undefined,
                maxRules: 20,
                maxRangeSize: undefined,
            });
            expect(result.quotas.warningThresholdPercent).toBe(80);
        });
    });

    describe("given required egress rules", () => {
        it("should convert them to camelCase with empty CIDR lists", () => {
            // Arrange
            const input = [
                "type_overrides:",
                "  eks-nodes:",
                "    required_egress:",
                "      - protocol: tcp",
                "        from_port: 443",
                "        to_port: 443",
                "        cidr_blocks: [0.0.0.0/0]",
            ].join("\n");

            // Act
            const result = parser.parse(input);

            // Assert
            expect(result.typeOverrides["eks-nodes"]?.requiredEgress).toEqual([
                {
                    protocol: "tcp",
                    fromPort: 443,
                    toPort: 443,
                    cidrBlocks: ["0.0.0.0/0"],
                    ipv6CidrBlocks: [],
                },
            ]);
        });
    });

    describe("given a naming pattern that does not compile", () => {
        it("should throw a ZodError", () => {
            // Arrange
            const input = "validation:\n  naming:\n    security_group_pattern: '[a-z'\n";

            // Act & Assert
            expect(() => parser.parse(input)).toThrow(ZodError);
        });
    });

    describe("given an empty document", () => {
        it("should throw", () => {
            // Act & Assert
            expect(() => parser.parse("")).toThrow(
                "guardrails document is empty",
            );
        });
    });

    describe("given a duplicated key", () => {
        it("should throw a YamlSyntaxError", () => {
            // Arrange
            const input = "validation: {}\nvalidation: {}\n";

            // Act & Assert
            expect(() => parser.parse(input)).toThrow(YamlSyntaxError);
        });
    });
});

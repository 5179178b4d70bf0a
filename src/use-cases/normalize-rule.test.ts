import { describe, expect, it } from "vitest";
import { buildRule, buildRuleNode } from "../lib/test-document-builder.js";
import {
    findDuplicateRules,
    normalizedRuleKey,
    normalizeRule,
} from "./normalize-rule.js";

describe("normalizeRule", () => {
    it("should sort source lists and default self to false", () => {
        // Act
        const result = normalizeRule({
            protocol: "tcp",
            from_port: 443,
            to_port: 443,
            cidr_blocks: ["10.2.0.0/16", "10.1.0.0/16"],
            description: "ignored",
        });

        // Assert
        expect(result).toEqual([
            "tcp",
            443,
            443,
            ["10.1.0.0/16", "10.2.0.0/16"],
            [],
            [],
            [],
            false,
        ]);
    });

    it("should ignore the description when comparing rules", () => {
        // Act
        const first = normalizedRuleKey(buildRule({ description: "one" }));
        const second = normalizedRuleKey(buildRule({ description: "two" }));

        // Assert
        expect(first).toBe(second);
    });

    it("should tell self: true apart from an absent self", () => {
        // Act
        const withSelf = normalizedRuleKey(buildRule({ self: true }));
        const withoutSelf = normalizedRuleKey(buildRule());

        // Assert
        expect(withSelf).not.toBe(withoutSelf);
    });
});

describe("findDuplicateRules", () => {
    it("should point every repeat at the first occurrence", () => {
        // Arrange
        const rules = [
            buildRuleNode(buildRule(), 0),
            { kind: "malformed" as const, index: 1, value: "x" },
            { ...buildRuleNode(buildRule(), 0), index: 2 },
            { ...buildRuleNode(buildRule(), 0), index: 3 },
        ];

        // Act
        const result = findDuplicateRules("app-servers", "egress", rules);

        // Assert
        expect(result.map((f) => f.context)).toEqual([
            "security_group.app-servers.egress[2]",
            "security_group.app-servers.egress[3]",
        ]);
        expect(result[1]?.message).toBe(
            "Duplicate rule: app-servers egress[3] is identical to egress[0] — AWS will silently dedupe this but it indicates a copy-paste error.\n   → Remove the duplicate rule.",
        );
    });
});

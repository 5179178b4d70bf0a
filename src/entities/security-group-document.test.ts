import { describe, expect, it } from "vitest";
import {
    ruleContext,
    securityGroupContext,
    securityGroupNameFromContext,
} from "./security-group-document.js";

describe("securityGroupNameFromContext", () => {
    describe("given a security group context", () => {
        it("should return the group name", () => {
            // Act
            const result = securityGroupNameFromContext(
                securityGroupContext("web"),
            );

            // Assert
            expect(result).toBe("web");
        });
    });

    describe("given a group name containing dots", () => {
        it("should keep the dots for a rule context", () => {
            // Act
            const result = securityGroupNameFromContext(
                ruleContext("my.sg", "egress", 2),
            );

            // Assert
            expect(result).toBe("my.sg");
        });

        it("should strip field suffixes", () => {
            // Arrange
            const contexts = [
                "security_group.my.sg.name",
                "security_group.my.sg.description",
                "security_group.my.sg.tags.value.team",
                "security_group.my.sg.ingress[0].cidr_blocks[1]",
            ];

            // Act
            const result = contexts.map(securityGroupNameFromContext);

            // Assert
            expect(result).toEqual(["my.sg", "my.sg", "my.sg", "my.sg"]);
        });
    });

    describe("given a context outside security_groups", () => {
        it("should return undefined", () => {
            // Act
            const result = securityGroupNameFromContext("prefix_lists");

            // Assert
            expect(result).toBeUndefined();
        });
    });
});

import { describe, expect, it } from "vitest";
import { resolveAwsRegion } from "./aws-quota-oracle.js";

describe("resolveAwsRegion", () => {
    it("should prefer the explicit region", () => {
        // Act
        const result = resolveAwsRegion("eu-west-1", {
            AWS_REGION: "us-west-2",
        });

        // Assert
        expect(result).toBe("eu-west-1");
    });

    it("should fall back to AWS_REGION, then AWS_DEFAULT_REGION", () => {
        expect(
            resolveAwsRegion(undefined, {
                AWS_REGION: "us-west-2",
                AWS_DEFAULT_REGION: "ap-southeast-2",
            }),
        ).toBe("us-west-2");
        expect(
            resolveAwsRegion(undefined, { AWS_DEFAULT_REGION: "ap-southeast-2" }),
        ).toBe("ap-southeast-2");
    });

    it("should default to us-east-1", () => {
        expect(resolveAwsRegion(undefined, {})).toBe("us-east-1");
    });
});

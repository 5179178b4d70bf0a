import { describe, expect, it, vi } from "vitest";
import {
    buildDocument,
    buildGuardrails,
    buildRule,
    buildSecurityGroup,
} from "../lib/test-document-builder.js";
import {
    calculateProposedUsage,
    createQuotaChecker,
    SECURITY_GROUPS_PER_VPC_QUOTA_CODE,
} from "./check-quotas.js";
import type { QuotaOracle, UsageScope } from "./quota-oracle.port.js";

const quotas = buildGuardrails().quotas;

function buildProposedDocument() {
    return buildDocument({
        web: buildSecurityGroup({
            ingress: [
                buildRule(),
                buildRule({ from_port: 8443, to_port: 8443 }),
            ],
            egress: [buildRule()],
        }),
        db: buildSecurityGroup(),
    });
}

function createFakeOracle(options: {
    readonly vpcIds?: readonly string[];
    readonly usage?: Readonly<Record<string, number>>;
    readonly limits?: Readonly<Record<string, number>>;
    readonly failingScope?: string;
}): QuotaOracle {
    const scopeKey = (scope: UsageScope) =>
        scope.kind === "vpc" ? scope.vpcId : "account";
    return {
        listVpcIds: vi.fn(async () => options.vpcIds ?? []),
        async currentUsage(scope) {
            const key = scopeKey(scope);
            if (key === options.failingScope) {
                throw new Error("Rate exceeded");
            }
            return { securityGroups: options.usage?.[key] ?? 0, totalRules: 0 };
        },
        async serviceLimit(quotaCode) {
            return options.limits?.[quotaCode];
        },
    };
}

describe("calculateProposedUsage", () => {
    it("should count groups, rules and the largest group", () => {
        // Act
        const result = calculateProposedUsage(buildProposedDocument());

        // Assert
        expect(result).toEqual({
            securityGroups: 2,
            totalRules: 4,
            maxRulesPerSecurityGroup: 3,
        });
    });

    it("should count a malformed group as a group without rules", () => {
        // Act
        const result = calculateProposedUsage(buildDocument({ web: "x" }));

        // Assert
        expect(result).toEqual({
            securityGroups: 1,
            totalRules: 0,
            maxRulesPerSecurityGroup: 0,
        });
    });
});

describe("QuotaChecker", () => {
    describe("given no proposed security groups", () => {
        it("should return a single passing result without calling AWS", async () => {
            // Arrange
            const oracle = createFakeOracle({});
            const checker = createQuotaChecker({ oracle });

            // Act
            const result = await checker.check(undefined, { quotas });

            // Assert
            expect(result).toEqual([
                {
                    quotaName: "No Changes",
                    scope: "account",
                    currentUsage: 0,
                    proposedUsage: 0,
                    quotaLimit: 0,
                    utilizationPercent: 0,
                    level: "ok",
                    message: "No security group changes proposed",
                },
            ]);
            expect(oracle.listVpcIds).not.toHaveBeenCalled();
        });
    });

    describe("given several VPCs", () => {
        it("should check VPCs in sorted order and the account last", async () => {
            // Arrange
            const checker = createQuotaChecker({
                oracle: createFakeOracle({
                    vpcIds: ["vpc-b", "vpc-a"],
                    usage: { "vpc-a": 10, "vpc-b": 3, account: 13 },
                    limits: { [SECURITY_GROUPS_PER_VPC_QUOTA_CODE]: 15 },
                }),
            });

            // Act
            const result = await checker.check(buildProposedDocument(), {
                quotas,
            });

            // Assert
            expect(
                result.map((r) => [r.quotaName, r.scope, r.level, r.message]),
            ).toEqual([
                [
                    "Security Groups per VPC (vpc-a)",
                    "vpc-a",
                    "warning",
                    "Approaching security groups per VPC limit in vpc-a (80.0%)",
                ],
                [
                    "Rules per Security Group",
                    "vpc-a",
                    "ok",
                    "Rules per security group usage is within limits",
                ],
                [
                    "Security Groups per VPC (vpc-b)",
                    "vpc-b",
                    "ok",
                    "Security groups per VPC usage in vpc-b is within limits",
                ],
                [
                    "Rules per Security Group",
                    "vpc-b",
                    "ok",
                    "Rules per security group usage is within limits",
                ],
                [
                    "Security Groups per Account",
                    "account",
                    "ok",
                    "Security groups per account usage is within limits",
                ],
            ]);
            expect(result[0]).toMatchObject({
                currentUsage: 10,
                proposedUsage: 12,
                quotaLimit: 15,
                utilizationPercent: 80,
            });
            expect(result[4]).toMatchObject({
                quotaLimit: 10000,
                proposedUsage: 15,
            });
        });
    });

    describe("given a single VPC that would go over its limit", () => {
        it("should report an error without listing VPCs", async () => {
            // Arrange
            const oracle = createFakeOracle({
                usage: { "vpc-c": 14 },
                limits: { [SECURITY_GROUPS_PER_VPC_QUOTA_CODE]: 15 },
            });
            const checker = createQuotaChecker({ oracle });

            // Act
            const result = await checker.check(buildProposedDocument(), {
                quotas,
                vpcId: "vpc-c",
            });

            // Assert
            expect(result[0]).toMatchObject({
                level: "error",
                message: "Would exceed security groups per VPC limit in vpc-c",
                proposedUsage: 16,
            });
            expect(oracle.listVpcIds).not.toHaveBeenCalled();
        });
    });

    describe("given no quota from AWS", () => {
        it("should use the guardrails limits", async () => {
            // Arrange
            const checker = createQuotaChecker({
                oracle: createFakeOracle({
                    limits: { [SECURITY_GROUPS_PER_VPC_QUOTA_CODE]: 0 },
                }),
            });

            // Act
            const result = await checker.check(buildProposedDocument(), {
                quotas: buildGuardrails({
                    quotas: {
                        security_groups_per_vpc: 4,
                        rules_per_security_group: 3,
                    },
                }).quotas,
                vpcId: "vpc-a",
            });

            // Assert
            expect(result.map((r) => [r.quotaLimit, r.level])).toEqual([
                [4, "ok"],
                [3, "warning"],
                [10000, "ok"],
            ]);
            expect(result[1]?.message).toBe(
                "Largest proposed security group approaches rules per SG limit (100.0%)",
            );
        });
    });

    describe("given a VPC whose usage cannot be read", () => {
        it("should report that VPC as failed and keep checking", async () => {
            // Arrange
            const checker = createQuotaChecker({
                oracle: createFakeOracle({
                    vpcIds: ["vpc-a", "vpc-b"],
                    failingScope: "vpc-a",
                }),
            });

            // Act
            const result = await checker.check(buildProposedDocument(), {
                quotas,
            });

            // Assert
            expect(result[0]).toEqual({
                quotaName: "Security Groups per VPC (vpc-a)",
                scope: "vpc-a",
                currentUsage: 0,
                proposedUsage: 0,
                quotaLimit: 0,
                utilizationPercent: 0,
                level: "error",
                message: "Failed to check quotas for vpc-a: Rate exceeded",
            });
            expect(result.map((r) => r.scope)).toEqual([
                "vpc-a",
                "vpc-b",
                "vpc-b",
                "account",
            ]);
        });
    });
});

import pLimit from "p-limit";
import type { QuotaPolicy } from "../entities/guardrails.js";
import {
    ACCOUNT_SCOPE,
    formatPercent,
    type ProposedUsage,
    type QuotaCheckResult,
    type QuotaLevel,
} from "../entities/quota-check.js";
import {
    ruleCount,
    type SecurityGroupDocument,
    securityGroupEntries,
} from "../entities/security-group-document.js";
import type { QuotaOracle } from "./quota-oracle.port.js";

export const SECURITY_GROUPS_PER_VPC_QUOTA_CODE = "L-E79EC296";
export const RULES_PER_SECURITY_GROUP_QUOTA_CODE = "L-0EA8095F";

const DEFAULT_CONCURRENCY = 4;

export interface QuotaCheckOptions {
    readonly quotas: QuotaPolicy;
    readonly vpcId?: string | undefined;
    readonly concurrency?: number | undefined;
}

export interface QuotaChecker {
    check(
        document: SecurityGroupDocument | undefined,
        options: QuotaCheckOptions,
    ): Promise<readonly QuotaCheckResult[]>;
}

export interface QuotaCheckerDeps {
    readonly oracle: QuotaOracle;
}

interface Limits {
    readonly securityGroupsPerVpc: number;
    readonly rulesPerSecurityGroup: number;
    readonly securityGroupsPerAccount: number;
}

interface QuotaMessages {
    readonly exceeded: string;
    readonly approaching: (utilization: string) => string;
    readonly within: string;
}

export function calculateProposedUsage(
    document: SecurityGroupDocument | undefined,
): ProposedUsage {
    const groups = document === undefined ? [] : securityGroupEntries(document);
    const ruleCounts = groups.map((group) =>
        group.kind === "security_group"
            ? ruleCount(group.ingress) + ruleCount(group.egress)
            : 0,
    );
    return {
        securityGroups: groups.length,
        totalRules: ruleCounts.reduce((sum, count) => sum + count, 0),
        maxRulesPerSecurityGroup: Math.max(0, ...ruleCounts),
    };
}

function evaluate(
    quotaName: string,
    scope: string,
    usage: { readonly current: number; readonly proposed: number },
    limit: number,
    warningThresholdPercent: number,
    messages: QuotaMessages,
): QuotaCheckResult {
    const utilizationPercent = (usage.proposed / limit) * 100;
    let level: QuotaLevel = "ok";
    let message = messages.within;
    if (usage.proposed > limit) {
        level = "error";
        message = messages.exceeded;
    } else if (utilizationPercent >= warningThresholdPercent) {
        level = "warning";
        message = messages.approaching(formatPercent(utilizationPercent));
    }
    return {
        quotaName,
        scope,
        currentUsage: usage.current,
        proposedUsage: usage.proposed,
        quotaLimit: limit,
        utilizationPercent,
        level,
        message,
    };
}

function failure(
    quotaName: string,
    scope: string,
    error: unknown,
): QuotaCheckResult {
    const reason = error instanceof Error ? error.message : String(error);
    return {
        quotaName,
        scope,
        currentUsage: 0,
        proposedUsage: 0,
        quotaLimit: 0,
        utilizationPercent: 0,
        level: "error",
        message: `Failed to check quotas for ${scope}: ${reason}`,
    };
}

function noChanges(): QuotaCheckResult {
    return {
        quotaName: "No Changes",
        scope: ACCOUNT_SCOPE,
        currentUsage: 0,
        proposedUsage: 0,
        quotaLimit: 0,
        utilizationPercent: 0,
        level: "ok",
        message: "No security group changes proposed",
    };
}

function preferOracle(limit: number | undefined, fallback: number): number {
    return limit !== undefined && limit > 0 ? limit : fallback;
}

export function createQuotaChecker(deps: QuotaCheckerDeps): QuotaChecker {
    async function resolveLimits(quotas: QuotaPolicy): Promise<Limits> {
        const [perVpc, perGroup] = await Promise.all([
            deps.oracle.serviceLimit(SECURITY_GROUPS_PER_VPC_QUOTA_CODE),
            deps.oracle.serviceLimit(RULES_PER_SECURITY_GROUP_QUOTA_CODE),
        ]);
        return {
            securityGroupsPerVpc: preferOracle(
                perVpc,
                quotas.securityGroupsPerVpc,
            ),
            rulesPerSecurityGroup: preferOracle(
                perGroup,
                quotas.rulesPerSecurityGroup,
            ),
            securityGroupsPerAccount: quotas.securityGroupsPerAccount,
        };
    }

    async function checkVpc(
        vpcId: string,
        proposed: ProposedUsage,
        limits: Limits,
        threshold: number,
    ): Promise<QuotaCheckResult[]> {
        const quotaName = `Security Groups per VPC (${vpcId})`;
        try {
            const current = await deps.oracle.currentUsage({
                kind: "vpc",
                vpcId,
            });
            const results = [
                evaluate(
                    quotaName,
                    vpcId,
                    {
                        current: current.securityGroups,
                        proposed:
                            current.securityGroups + proposed.securityGroups,
                    },
                    limits.securityGroupsPerVpc,
                    threshold,
                    {
                        exceeded: `Would exceed security groups per VPC limit in ${vpcId}`,
                        approaching: (utilization) =>
                            `Approaching security groups per VPC limit in ${vpcId} (${utilization})`,
                        within: `Security groups per VPC usage in ${vpcId} is within limits`,
                    },
                ),
            ];

            const largest = proposed.maxRulesPerSecurityGroup;
            if (largest > 0) {
                const limit = limits.rulesPerSecurityGroup;
                results.push(
                    evaluate(
                        "Rules per Security Group",
                        vpcId,
                        { current: 0, proposed: largest },
                        limit,
                        threshold,
                        {
                            exceeded: `Proposed security group would exceed rules per SG limit (${largest} > ${limit})`,
                            approaching: (utilization) =>
                                `Largest proposed security group approaches rules per SG limit (${utilization})`,
                            within: "Rules per security group usage is within limits",
                        },
                    ),
                );
            }
            return results;
        } catch (error) {
            return [failure(quotaName, vpcId, error)];
        }
    }

    async function checkAccount(
        proposed: ProposedUsage,
        limits: Limits,
        threshold: number,
    ): Promise<QuotaCheckResult> {
        const quotaName = "Security Groups per Account";
        try {
            const current = await deps.oracle.currentUsage({ kind: "account" });
            return evaluate(
                quotaName,
                ACCOUNT_SCOPE,
                {
                    current: current.securityGroups,
                    proposed: current.securityGroups + proposed.securityGroups,
                },
                limits.securityGroupsPerAccount,
                threshold,
                {
                    exceeded: "Would exceed security groups per account limit",
                    approaching: (utilization) =>
                        `Approaching security groups per account limit (${utilization})`,
                    within: "Security groups per account usage is within limits",
                },
            );
        } catch (error) {
            return failure(quotaName, ACCOUNT_SCOPE, error);
        }
    }

    return {
        async check(
            document: SecurityGroupDocument | undefined,
            options: QuotaCheckOptions,
        ): Promise<readonly QuotaCheckResult[]> {
            const proposed = calculateProposedUsage(document);
            if (proposed.securityGroups === 0) {
                return [noChanges()];
            }

            const limits = await resolveLimits(options.quotas);
            const threshold = options.quotas.warningThresholdPercent;
            const vpcIds =
                options.vpcId === undefined
                    ? await deps.oracle.listVpcIds()
                    : [options.vpcId];

            const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);
            const perVpc = await Promise.all(
                [...vpcIds]
                    .sort()
                    .map((vpcId) =>
                        limit(() => checkVpc(vpcId, proposed, limits, threshold)),
                    ),
            );
            const account = await checkAccount(proposed, limits, threshold);

            return [...perVpc.flat(), account];
        },
    };
}

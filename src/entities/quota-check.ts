import { type ExitCode, exitCodeFor } from "./validation-result.js";

export type QuotaLevel = "ok" | "warning" | "error";

export const ACCOUNT_SCOPE = "account";

export interface QuotaCheckResult {
    readonly quotaName: string;
    /** A VPC id, or `account` for account-wide quotas. */
    readonly scope: string;
    readonly currentUsage: number;
    readonly proposedUsage: number;
    readonly quotaLimit: number;
    readonly utilizationPercent: number;
    readonly level: QuotaLevel;
    readonly message: string;
}

export interface ProposedUsage {
    readonly securityGroups: number;
    readonly totalRules: number;
    readonly maxRulesPerSecurityGroup: number;
}

export function quotaExitCode(results: readonly QuotaCheckResult[]): ExitCode {
    return exitCodeFor(
        results.some((result) => result.level === "error"),
        results.some((result) => result.level === "warning"),
    );
}

export function formatPercent(value: number): string {
    return `${value.toFixed(1)}%`;
}

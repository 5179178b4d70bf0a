import {
    type QuotaCheckResult,
    type QuotaLevel,
    quotaExitCode,
} from "../entities/quota-check.js";

export const QUOTA_REPORT_FORMATS = ["text", "json"] as const;

export type QuotaReportFormat = (typeof QUOTA_REPORT_FORMATS)[number];

export interface QuotaReport {
    readonly accountId: string;
    readonly region: string;
    readonly vpcId?: string | undefined;
    readonly results: readonly QuotaCheckResult[];
}

export function isQuotaReportFormat(value: string): value is QuotaReportFormat {
    return QUOTA_REPORT_FORMATS.some((format) => format === value);
}

function withLevel(
    results: readonly QuotaCheckResult[],
    level: QuotaLevel,
): QuotaCheckResult[] {
    return results.filter((result) => result.level === level);
}

function resultLines(result: QuotaCheckResult, detailed: boolean): string[] {
    const lines = [`   • ${result.message}`];
    if (detailed) {
        lines.push(
            `     Current: ${result.currentUsage}, After: ${result.proposedUsage}, Limit: ${result.quotaLimit}`,
        );
    }
    return lines;
}

function section(
    title: string,
    results: readonly QuotaCheckResult[],
    detailed: boolean,
): string[] {
    if (results.length === 0) {
        return [];
    }
    return [
        title,
        ...results.flatMap((result) => resultLines(result, detailed)),
        "",
    ];
}

export function formatQuotaText(report: QuotaReport, verbose: boolean): string {
    const errors = withLevel(report.results, "error");
    const warnings = withLevel(report.results, "warning");
    const passed = withLevel(report.results, "ok");

    const lines = [
        "Checking security group quotas",
        `Account: ${report.accountId}`,
        `Region: ${report.region}`,
    ];
    if (report.vpcId !== undefined) {
        lines.push(`VPC: ${report.vpcId}`);
    }
    lines.push(
        "",
        ...section("Quota Violations:", errors, verbose),
        ...section("Quota Warnings:", warnings, verbose),
        ...(verbose ? section("Quota Checks Passed:", passed, true) : []),
        "Summary:",
        `   Total checks: ${report.results.length}`,
        `   Errors: ${errors.length}`,
        `   Warnings: ${warnings.length}`,
        `   Passed: ${passed.length}`,
        "",
    );

    switch (quotaExitCode(report.results)) {
        case 0:
            lines.push("All quota checks passed!");
            break;
        case 2:
            lines.push("Quota checks completed with warnings");
            break;
        default:
            lines.push("Quota checks failed - limits would be exceeded");
    }
    return lines.join("\n");
}

export function formatQuotaJson(report: QuotaReport): string {
    return JSON.stringify(
        {
            account_id: report.accountId,
            region: report.region,
            vpc_id: report.vpcId ?? null,
            quota_checks: report.results.map((result) => ({
                quota_name: result.quotaName,
                scope: result.scope,
                current_usage: result.currentUsage,
                proposed_usage: result.proposedUsage,
                quota_limit: result.quotaLimit,
                utilization_percent: result.utilizationPercent,
                level: result.level,
                message: result.message,
            })),
            summary: {
                total_checks: report.results.length,
                errors: withLevel(report.results, "error").length,
                warnings: withLevel(report.results, "warning").length,
                exit_code: quotaExitCode(report.results),
            },
        },
        null,
        2,
    );
}

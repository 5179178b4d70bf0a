import { securityGroupNameFromContext } from "../entities/security-group-document.js";
import type {
    ValidationFinding,
    ValidationSummary,
} from "../entities/validation-result.js";

export const REPORT_FORMATS = ["text", "json", "markdown"] as const;

export type ReportFormat = (typeof REPORT_FORMATS)[number];

export interface ValidationReport {
    readonly accountDir: string;
    readonly accountId: string;
    readonly summary: ValidationSummary;
}

export interface ReportOptions {
    readonly verbose: boolean;
}

export interface ValidationReportFormatter {
    format(
        report: ValidationReport,
        format: ReportFormat,
        options: ReportOptions,
    ): string;
}

const CONFIGURATION_RULES: ReadonlySet<string> = new Set([
    "schema_unknown_key",
    "schema_unknown_sg_key",
    "schema_unknown_rule_key",
    "schema_required_fields",
    "schema_type",
    "schema_invalid_environment",
    "schema_environment_type",
    "schema_tags_type",
    "file_exists",
    "yaml_syntax",
    "yaml_content",
]);

const TAG_RULES: ReadonlySet<string> = new Set(["sg_required_tags"]);

export function isReportFormat(value: string): value is ReportFormat {
    return REPORT_FORMATS.some((format) => format === value);
}

function textLine(finding: ValidationFinding): string {
    const context = finding.context ? ` [${finding.context}]` : "";
    return `   • ${finding.message}${context} (${finding.rule})`;
}

function textSection(
    title: string,
    findings: readonly ValidationFinding[],
): string[] {
    if (findings.length === 0) {
        return [];
    }
    return [title, ...findings.map(textLine), ""];
}

function statusLine(summary: ValidationSummary): string {
    switch (summary.exitCode()) {
        case 0:
            return "All validations passed!";
        case 2:
            return "Validation completed with warnings";
        default:
            return "Validation failed";
    }
}

export function formatText(
    report: ValidationReport,
    options: ReportOptions,
): string {
    const { summary } = report;
    const lines = [
        `Validating security groups for account: ${report.accountId}`,
        `Directory: ${report.accountDir}`,
        "",
        ...textSection("Errors:", summary.errors),
        ...textSection("Warnings:", summary.warnings),
        ...(options.verbose ? textSection("Info:", summary.info) : []),
        "Summary:",
        `   Errors: ${summary.errors.length}`,
        `   Warnings: ${summary.warnings.length}`,
    ];
    if (options.verbose) {
        lines.push(`   Info: ${summary.info.length}`);
    }
    lines.push("", statusLine(summary));
    return lines.join("\n");
}

function jsonFinding(finding: ValidationFinding) {
    return {
        level: finding.level,
        message: finding.message,
        rule: finding.rule,
        context: finding.context ?? null,
    };
}

export function formatJson(
    report: ValidationReport,
    options: ReportOptions,
): string {
    const { summary } = report;
    return JSON.stringify(
        {
            account_dir: report.accountDir,
            account_id: report.accountId,
            validation_results: {
                errors: summary.errors.map(jsonFinding),
                warnings: summary.warnings.map(jsonFinding),
                info: options.verbose ? summary.info.map(jsonFinding) : [],
            },
            summary: {
                error_count: summary.errors.length,
                warning_count: summary.warnings.length,
                info_count: summary.info.length,
                exit_code: summary.exitCode(),
            },
        },
        null,
        2,
    );
}

interface FindingBucket {
    readonly errors: ValidationFinding[];
    readonly warnings: ValidationFinding[];
}

function emptyBucket(): FindingBucket {
    return { errors: [], warnings: [] };
}

function addToBucket(bucket: FindingBucket, finding: ValidationFinding): void {
    if (finding.level === "error") {
        bucket.errors.push(finding);
    } else {
        bucket.warnings.push(finding);
    }
}

function securityGroupOf(finding: ValidationFinding): string | undefined {
    const context = finding.context;
    if (context === undefined || CONFIGURATION_RULES.has(finding.rule)) {
        return undefined;
    }
    return securityGroupNameFromContext(context);
}

function markdownSection(title: string, bucket: FindingBucket): string[] {
    const lines = ["<details>", `<summary>${title}</summary>`, ""];
    if (bucket.errors.length > 0) {
        lines.push(
            "### Errors",
            ...bucket.errors.map((finding) => `- ${finding.message}`),
            "",
        );
    }
    if (bucket.warnings.length > 0) {
        lines.push(
            "### Warnings",
            ...bucket.warnings.map((finding) => `- ${finding.message}`),
            "",
        );
    }
    lines.push("</details>", "");
    return lines;
}

function countsTitle(label: string, bucket: FindingBucket): string {
    return `${label} — ${bucket.errors.length} errors, ${bucket.warnings.length} warnings`;
}

function isEmptyBucket(bucket: FindingBucket): boolean {
    return bucket.errors.length === 0 && bucket.warnings.length === 0;
}

/** Renders a pull-request comment grouped by configuration, tags and security group. */
export function formatMarkdown(report: ValidationReport): string {
    const { summary } = report;
    const errorCount = summary.errors.length;
    const warningCount = summary.warnings.length;

    if (errorCount === 0 && warningCount === 0) {
        return [
            "## Security Group Validation Results",
            `**Account:** ${report.accountId} | **Status:** All checks passed!`,
        ].join("\n\n");
    }

    const configuration = emptyBucket();
    const tags = emptyBucket();
    const groups = new Map<string, FindingBucket>();

    for (const finding of [...summary.errors, ...summary.warnings]) {
        const group = securityGroupOf(finding);
        if (TAG_RULES.has(finding.rule)) {
            addToBucket(tags, finding);
        } else if (group === undefined) {
            addToBucket(configuration, finding);
        } else {
            const bucket = groups.get(group) ?? emptyBucket();
            groups.set(group, bucket);
            addToBucket(bucket, finding);
        }
    }

    const lines = [
        "## Security Group Validation Results",
        `**Account:** ${report.accountId} | **Errors:** ${errorCount} | **Warnings:** ${warningCount}`,
        "",
    ];
    if (!isEmptyBucket(configuration)) {
        lines.push(
            ...markdownSection(
                countsTitle("Configuration Issues", configuration),
                configuration,
            ),
        );
    }
    if (!isEmptyBucket(tags)) {
        lines.push(...markdownSection(countsTitle("Tag Compliance", tags), tags));
    }
    for (const [name, bucket] of groups) {
        lines.push(...markdownSection(countsTitle(name, bucket), bucket));
    }
    return lines.join("\n");
}

export function createValidationReportFormatter(): ValidationReportFormatter {
    return {
        format(
            report: ValidationReport,
            format: ReportFormat,
            options: ReportOptions,
        ): string {
            switch (format) {
                case "json":
                    return formatJson(report, options);
                case "markdown":
                    return formatMarkdown(report);
                default:
                    return formatText(report, options);
            }
        },
    };
}

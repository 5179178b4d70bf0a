import { join } from "node:path";
import { defineCommand } from "citty";
import { consola } from "consola";
import { PolicyDocumentInvalidError } from "../entities/errors.js";
import { quotaExitCode } from "../entities/quota-check.js";
import type { SecurityGroupDocument } from "../entities/security-group-document.js";
import type { ExitCode } from "../entities/validation-result.js";
import { resolveAwsRegion } from "../gateways/aws-quota-oracle.js";
import type { QuotaChecker } from "../use-cases/check-quotas.js";
import {
    formatQuotaJson,
    formatQuotaText,
    isQuotaReportFormat,
    QUOTA_REPORT_FORMATS,
    type QuotaReportFormat,
} from "../use-cases/format-quota-report.js";
import {
    type AccountContext,
    type AccountContextLoader,
    SECURITY_GROUPS_FILE,
} from "../use-cases/load-account-context.js";
import type { ConsoleOutput } from "./console-output.js";

export interface CheckQuotasOptions {
    readonly region: string;
    readonly vpcId?: string | undefined;
    readonly format: QuotaReportFormat;
    readonly verbose: boolean;
}

export interface CheckQuotasCommandDeps {
    readonly loader: AccountContextLoader;
    readonly createQuotaChecker: (region: string) => QuotaChecker;
}

export interface CheckQuotasCommand {
    execute(
        accountDir: string,
        options: CheckQuotasOptions,
        output: ConsoleOutput,
    ): Promise<ExitCode>;
}

// A missing file proposes nothing; any other load failure is fatal.
function proposedDocument(
    account: AccountContext,
): SecurityGroupDocument | undefined {
    if (account.document.ok) {
        return account.document.document;
    }
    if (account.document.finding.rule === "file_exists") {
        return undefined;
    }
    throw new PolicyDocumentInvalidError(
        join(account.accountDir, SECURITY_GROUPS_FILE),
        account.document.finding.message,
    );
}

export function createCheckQuotasCommand(
    deps: CheckQuotasCommandDeps,
): CheckQuotasCommand {
    return {
        async execute(
            accountDir: string,
            options: CheckQuotasOptions,
            output: ConsoleOutput,
        ): Promise<ExitCode> {
            const account = await deps.loader.load(accountDir);
            const checker = deps.createQuotaChecker(options.region);
            const results = await checker.check(proposedDocument(account), {
                quotas: account.guardrails.quotas,
                vpcId: options.vpcId,
            });

            const report = {
                accountId: account.accountId,
                region: options.region,
                vpcId: options.vpcId,
                results,
            };
            output.log(
                options.format === "json"
                    ? formatQuotaJson(report)
                    : formatQuotaText(report, options.verbose),
            );

            const exitCode = quotaExitCode(results);
            if (exitCode !== 0) {
                const failing = results.filter(
                    (result) => result.level !== "ok",
                ).length;
                output.warn(`${failing} quota check(s) need attention`);
            }
            return exitCode;
        },
    };
}

export function parseQuotaReportFormat(value: string): QuotaReportFormat {
    if (!isQuotaReportFormat(value)) {
        throw new Error(
            `Invalid format '${value}' — expected one of: ${QUOTA_REPORT_FORMATS.join(", ")}`,
        );
    }
    return value;
}

export function createCheckQuotasCittyCommand(deps: CheckQuotasCommandDeps) {
    const checkQuotasCommand = createCheckQuotasCommand(deps);

    return defineCommand({
        meta: {
            name: "check-quotas",
            description:
                "Check AWS security group quotas against the changes proposed for an account",
        },
        args: {
            accountDir: {
                type: "positional",
                description:
                    "Path to the account directory containing security-groups.yaml",
                required: true,
            },
            region: {
                type: "string",
                description:
                    "AWS region (defaults to AWS_REGION, AWS_DEFAULT_REGION or us-east-1)",
            },
            "vpc-id": {
                type: "string",
                description: "Check a single VPC instead of every VPC",
            },
            format: {
                type: "string",
                description: `Output format (${QUOTA_REPORT_FORMATS.join(", ")})`,
                default: "text",
            },
            verbose: {
                type: "boolean",
                alias: "v",
                description: "Include usage details and passing checks",
                default: false,
            },
        },
        async run({ args }) {
            const exitCode = await checkQuotasCommand.execute(
                args.accountDir,
                {
                    region: resolveAwsRegion(args.region),
                    vpcId: args["vpc-id"],
                    format: parseQuotaReportFormat(args.format),
                    verbose: args.verbose,
                },
                {
                    log: (msg) => consola.log(msg),
                    warn: (msg) => consola.warn(msg),
                },
            );
            process.exitCode = exitCode;
        },
    });
}

import { defineCommand } from "citty";
import { consola } from "consola";
import {
    type ExitCode,
    withoutWarnings,
    withWarningsAsErrors,
} from "../entities/validation-result.js";
import {
    isReportFormat,
    REPORT_FORMATS,
    type ReportFormat,
    type ValidationReportFormatter,
} from "../use-cases/format-validation-report.js";
import type { AccountContextLoader } from "../use-cases/load-account-context.js";
import type { SecurityGroupConfigValidator } from "../use-cases/validate-security-group-config.js";
import type { ConsoleOutput } from "./console-output.js";

export interface ValidateOptions {
    readonly format: ReportFormat;
    readonly verbose: boolean;
    readonly warningsAsErrors: boolean;
    readonly suppressWarnings: boolean;
}

export interface ValidateCommandDeps {
    readonly loader: AccountContextLoader;
    readonly validator: SecurityGroupConfigValidator;
    readonly formatter: ValidationReportFormatter;
}

export interface ValidateCommand {
    execute(
        accountDir: string,
        options: ValidateOptions,
        output: ConsoleOutput,
    ): Promise<ExitCode>;
}

export function createValidateCommand(
    deps: ValidateCommandDeps,
): ValidateCommand {
    return {
        async execute(
            accountDir: string,
            options: ValidateOptions,
            output: ConsoleOutput,
        ): Promise<ExitCode> {
            const account = await deps.loader.load(accountDir);

            let summary = deps.validator.validate(account);
            if (options.suppressWarnings) {
                summary = withoutWarnings(summary);
            }
            if (options.warningsAsErrors) {
                summary = withWarningsAsErrors(summary);
            }

            output.log(
                deps.formatter.format(
                    {
                        accountDir,
                        accountId: account.accountId,
                        summary,
                    },
                    options.format,
                    { verbose: options.verbose },
                ),
            );

            const exitCode = summary.exitCode();
            if (exitCode !== 0) {
                output.warn(
                    `Validation found ${summary.errors.length} error(s) and ${summary.warnings.length} warning(s)`,
                );
            }
            return exitCode;
        },
    };
}

export function parseReportFormat(value: string): ReportFormat {
    if (!isReportFormat(value)) {
        throw new Error(
            `Invalid format '${value}' — expected one of: ${REPORT_FORMATS.join(", ")}`,
        );
    }
    return value;
}

export function createValidateCittyCommand(deps: ValidateCommandDeps) {
    const validateCommand = createValidateCommand(deps);

    return defineCommand({
        meta: {
            name: "validate",
            description:
                "Validate an account's security-groups.yaml against schema, guardrails, naming and cross-reference rules",
        },
        args: {
            accountDir: {
                type: "positional",
                description:
                    "Path to the account directory containing security-groups.yaml",
                required: true,
            },
            format: {
                type: "string",
                description: `Output format (${REPORT_FORMATS.join(", ")})`,
                default: "text",
            },
            verbose: {
                type: "boolean",
                alias: "v",
                description: "Include info-level findings in the output",
                default: false,
            },
            "warnings-as-errors": {
                type: "boolean",
                description: "Treat warnings as errors when there are no errors",
                default: false,
            },
            warnings: {
                type: "boolean",
                description: "Report warnings (--no-warnings shows errors only)",
                default: true,
            },
        },
        async run({ args }) {
            const exitCode = await validateCommand.execute(
                args.accountDir,
                {
                    format: parseReportFormat(args.format),
                    verbose: args.verbose,
                    warningsAsErrors: args["warnings-as-errors"],
                    suppressWarnings: !args.warnings,
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

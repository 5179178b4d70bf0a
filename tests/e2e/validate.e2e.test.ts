import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import { describe, expect, it, vi } from "vitest";
import { createValidateCommand } from "../../src/commands/validate.js";
import { createLocalPolicyFileStore } from "../../src/gateways/local-policy-file-store.js";
import { createValidationReportFormatter } from "../../src/use-cases/format-validation-report.js";
import { createAccountContextLoader } from "../../src/use-cases/load-account-context.js";
import { createGuardrailsParser } from "../../src/use-cases/parse-guardrails.js";
import { createPrefixListCatalogParser } from "../../src/use-cases/parse-prefix-lists.js";
import { createSecurityGroupDocumentParser } from "../../src/use-cases/parse-security-group-document.js";
import { createSecurityGroupConfigValidator } from "../../src/use-cases/validate-security-group-config.js";

const ACCOUNTS_DIR = resolve(
    dirname(fileURLToPath(import.meta.url)),
    "fixtures/accounts",
);

function buildValidateCommand() {
    return createValidateCommand({
        loader: createAccountContextLoader({
            fileStore: createLocalPolicyFileStore(),
            guardrailsParser: createGuardrailsParser(),
            prefixListParser: createPrefixListCatalogParser(),
            documentParser: createSecurityGroupDocumentParser(),
        }),
        validator: createSecurityGroupConfigValidator(),
        formatter: createValidationReportFormatter(),
    });
}

async function runJson(accountId: string, warningsAsErrors = false) {
    const output = { log: vi.fn(), warn: vi.fn() };
    const exitCode = await buildValidateCommand().execute(
        resolve(ACCOUNTS_DIR, accountId),
        {
            format: "json",
            verbose: true,
            warningsAsErrors,
            suppressWarnings: false,
        },
        output,
    );
    const report = JSON.parse(String(output.log.mock.calls[0]?.[0]));
    return { exitCode, report, output };
}

function rulesOf(findings: readonly { rule: string }[]): string[] {
    return findings.map((finding) => finding.rule);
}

describe("validate command e2e", () => {
    describe("given a compliant account", () => {
        it("should pass with guardrails and prefix lists found in parent directories", async () => {
            // Act
            const { exitCode, report } = await runJson("100000000001");

            // Assert
            expect(exitCode).toBe(0);
            expect(report.account_id).toBe("100000000001");
            expect(report.validation_results.errors).toEqual([]);
            expect(report.validation_results.warnings).toEqual([]);
            expect(rulesOf(report.validation_results.info)).toEqual([
                "baseline_profile_dependency",
                "baseline_profiles_info",
                "rule_required_egress_exception",
            ]);
            expect(report.validation_results.info[2].message).toBe(
                "0.0.0.0/0 egress in eks-workers-node egress[0] matches a required egress rule for eks-nodes security groups",
            );
        });
    });

    describe("given an account with violations", () => {
        it("should report every finding in pass order and fail", async () => {
            // Act
            const { exitCode, report, output } = await runJson("100000000002");

            // Assert
            expect(exitCode).toBe(1);
            expect(rulesOf(report.validation_results.errors)).toEqual([
                "rule_blocked_cidr",
                "rule_open_internet",
                "rule_undefined_prefix_list",
                "sg_required_tags",
                "type_protocol_restriction",
                "undefined_prefix_list_reference",
            ]);
            expect(rulesOf(report.validation_results.warnings)).toEqual([
                "high_risk_pattern",
            ]);
            expect(output.warn).toHaveBeenCalledWith(
                "Validation found 6 error(s) and 1 warning(s)",
            );
        });
    });

    describe("given an account directory without security-groups.yaml", () => {
        it("should fail with file_exists only", async () => {
            // Act
            const { exitCode, report } = await runJson("100000000009");

            // Assert
            expect(exitCode).toBe(1);
            expect(rulesOf(report.validation_results.errors)).toEqual([
                "file_exists",
            ]);
            expect(report.account_id).toBe("100000000009");
        });
    });

    describe("given markdown output", () => {
        it("should render the pull-request summary header", async () => {
            // Arrange
            const output = { log: vi.fn(), warn: vi.fn() };

            // Act
            await buildValidateCommand().execute(
                resolve(ACCOUNTS_DIR, "100000000002"),
                {
                    format: "markdown",
                    verbose: false,
                    warningsAsErrors: false,
                    suppressWarnings: false,
                },
                output,
            );

            // Assert
            const lines = String(output.log.mock.calls[0]?.[0]).split("\n");
            expect(lines.slice(0, 2)).toEqual([
                "## Security Group Validation Results",
                "**Account:** 100000000002 | **Errors:** 6 | **Warnings:** 1",
            ]);
            expect(lines).toContain(
                "<summary>bastion — 2 errors, 1 warnings</summary>",
            );
        });
    });
});

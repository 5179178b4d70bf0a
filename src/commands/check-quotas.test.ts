import { describe, expect, it, vi } from "vitest";
import { PolicyDocumentInvalidError } from "../entities/errors.js";
import type { QuotaCheckResult } from "../entities/quota-check.js";
import { buildAccountContext } from "../lib/test-document-builder.js";
import type { QuotaChecker } from "../use-cases/check-quotas.js";
import type { AccountContext } from "../use-cases/load-account-context.js";
import type { DocumentParseResult } from "../use-cases/parse-security-group-document.js";
import {
    type CheckQuotasOptions,
    createCheckQuotasCommand,
    parseQuotaReportFormat,
} from "./check-quotas.js";

const ACCOUNT_DIR = "accounts/100000000001";

const options: CheckQuotasOptions = {
    region: "us-west-2",
    format: "text",
    verbose: false,
};

const warningResult: QuotaCheckResult = {
    quotaName: "Security Groups per Account",
    scope: "account",
    currentUsage: 8000,
    proposedUsage: 8001,
    quotaLimit: 10000,
    utilizationPercent: 80.01,
    level: "warning",
    message: "Approaching security groups per account limit (80.0%)",
};

function setup(
    document: DocumentParseResult,
    results: readonly QuotaCheckResult[],
) {
    const account: AccountContext = buildAccountContext(document);
    const checker: QuotaChecker = { check: vi.fn(async () => results) };
    const createQuotaChecker = vi.fn(() => checker);
    const command = createCheckQuotasCommand({
        loader: { load: async () => account },
        createQuotaChecker,
    });
    return { account, checker, createQuotaChecker, command };
}

describe("CheckQuotasCommand", () => {
    describe("given an account without security-groups.yaml", () => {
        it("should check quotas with nothing proposed", async () => {
            // Arrange
            const { account, checker, createQuotaChecker, command } = setup(
                {
                    ok: false,
                    finding: {
                        level: "error",
                        message: "security-groups.yaml not found",
                        rule: "file_exists",
                    },
                },
                [],
            );
            const output = { log: vi.fn(), warn: vi.fn() };

            // Act
            const exitCode = await command.execute(ACCOUNT_DIR, options, output);

            // Assert
            expect(exitCode).toBe(0);
            expect(createQuotaChecker).toHaveBeenCalledWith("us-west-2");
            expect(checker.check).toHaveBeenCalledWith(undefined, {
                quotas: account.guardrails.quotas,
                vpcId: undefined,
            });
        });
    });

    describe("given a security-groups.yaml that does not parse", () => {
        it("should reject instead of checking quotas", async () => {
            // Arrange
            const { checker, command } = setup(
                {
                    ok: false,
                    finding: {
                        level: "error",
                        message: "YAML syntax error: bad indentation",
                        rule: "yaml_syntax",
                    },
                },
                [],
            );
            const output = { log: vi.fn(), warn: vi.fn() };

            // Act & Assert
            await expect(
                command.execute(ACCOUNT_DIR, options, output),
            ).rejects.toThrow(PolicyDocumentInvalidError);
            expect(checker.check).not.toHaveBeenCalled();
        });
    });

    describe("given a check that needs attention", () => {
        it("should print json and warn", async () => {
            // Arrange
            const { command } = setup(
                {
                    ok: false,
                    finding: {
                        level: "error",
                        message: "security-groups.yaml not found",
                        rule: "file_exists",
                    },
                },
                [warningResult],
            );
            const output = { log: vi.fn(), warn: vi.fn() };

            // Act
            const exitCode = await command.execute(
                ACCOUNT_DIR,
                { ...options, format: "json", vpcId: "vpc-a" },
                output,
            );

            // Assert
            expect(exitCode).toBe(2);
            const printed = JSON.parse(String(output.log.mock.calls[0]?.[0]));
            expect(printed.vpc_id).toBe("vpc-a");
            expect(printed.summary.exit_code).toBe(2);
            expect(output.warn).toHaveBeenCalledWith(
                "1 quota check(s) need attention",
            );
        });
    });
});

describe("parseQuotaReportFormat", () => {
    it("should reject markdown", () => {
        expect(() => parseQuotaReportFormat("markdown")).toThrow(
            "Invalid format 'markdown' — expected one of: text, json",
        );
    });
});

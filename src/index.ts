#!/usr/bin/env node
import { defineCommand, runMain } from "citty";
import { createCheckQuotasCittyCommand } from "./commands/check-quotas.js";
import { createValidateCittyCommand } from "./commands/validate.js";
import {
    createAwsQuotaOracle,
    createAwsQuotaOracleDeps,
} from "./gateways/aws-quota-oracle.js";
import { createLocalPolicyFileStore } from "./gateways/local-policy-file-store.js";
import { createQuotaChecker } from "./use-cases/check-quotas.js";
import { createValidationReportFormatter } from "./use-cases/format-validation-report.js";
import { createAccountContextLoader } from "./use-cases/load-account-context.js";
import { createGuardrailsParser } from "./use-cases/parse-guardrails.js";
import { createPrefixListCatalogParser } from "./use-cases/parse-prefix-lists.js";
import { createSecurityGroupDocumentParser } from "./use-cases/parse-security-group-document.js";
import { createSecurityGroupConfigValidator } from "./use-cases/validate-security-group-config.js";

const loader = createAccountContextLoader({
    fileStore: createLocalPolicyFileStore(),
    guardrailsParser: createGuardrailsParser(),
    prefixListParser: createPrefixListCatalogParser(),
    documentParser: createSecurityGroupDocumentParser(),
});

const validate = createValidateCittyCommand({
    loader,
    validator: createSecurityGroupConfigValidator(),
    formatter: createValidationReportFormatter(),
});

const checkQuotas = createCheckQuotasCittyCommand({
    loader,
    createQuotaChecker: (region) =>
        createQuotaChecker({
            oracle: createAwsQuotaOracle(createAwsQuotaOracleDeps(region)),
        }),
});

const main = defineCommand({
    meta: {
        name: "sg-guardrails",
        description:
            "Validate declarative AWS security group configurations against organizational guardrails before they are applied",
    },
    subCommands: {
        validate,
        "check-quotas": checkQuotas,
    },
});

runMain(main);

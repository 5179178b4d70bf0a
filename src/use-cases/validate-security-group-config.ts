import {
    createValidationSummary,
    type ValidationSummary,
} from "../entities/validation-result.js";
import type { AccountContext } from "./load-account-context.js";
import { createAccountIdPass } from "./validate-account-id.js";
import { createAsciiPass } from "./validate-ascii.js";
import { createBaselineProfilesPass } from "./validate-baseline-profiles.js";
import { createNamingPass } from "./validate-naming.js";
import { createPrefixListReferencesPass } from "./validate-prefix-list-references.js";
import { createRuleValidator } from "./validate-rule.js";
import { createSchemaPass } from "./validate-schema.js";
import { createSecurityGroupsPass } from "./validate-security-groups.js";
import { createTypeOverridesPass } from "./validate-type-overrides.js";
import type { ValidationPass } from "./validation-pass.js";

export interface SecurityGroupConfigValidatorDeps {
    readonly passes: readonly ValidationPass[];
}

export interface SecurityGroupConfigValidator {
    validate(account: AccountContext): ValidationSummary;
}

export function createDefaultValidationPasses(): readonly ValidationPass[] {
    return [
        createSchemaPass(),
        createAccountIdPass(),
        createBaselineProfilesPass(),
        createSecurityGroupsPass({ ruleValidator: createRuleValidator() }),
        createTypeOverridesPass(),
        createNamingPass(),
        createAsciiPass(),
        createPrefixListReferencesPass(),
    ];
}

export function createSecurityGroupConfigValidator(
    deps: SecurityGroupConfigValidatorDeps = {
        passes: createDefaultValidationPasses(),
    },
): SecurityGroupConfigValidator {
    return {
        validate(account: AccountContext): ValidationSummary {
            const summary = createValidationSummary();

            if (!account.document.ok) {
                summary.add(account.document.finding);
                return summary;
            }

            const context = {
                guardrails: account.guardrails,
                prefixLists: account.prefixLists,
                directoryName: account.directoryName,
            };
            for (const pass of deps.passes) {
                summary.addAll(pass.run(account.document.document, context));
            }

            return summary;
        },
    };
}

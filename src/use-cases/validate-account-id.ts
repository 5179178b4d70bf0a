import type { SecurityGroupDocument } from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import { isAccountId } from "./load-account-context.js";
import {
    formatValue,
    type ValidationContext,
    type ValidationPass,
} from "./validation-pass.js";

export function createAccountIdPass(): ValidationPass {
    return {
        name: "account-id",
        run(
            document: SecurityGroupDocument,
            context: ValidationContext,
        ): readonly ValidationFinding[] {
            const declared = document.fields.account_id;
            if (declared === undefined) {
                return [];
            }

            const findings: ValidationFinding[] = [];
            const accountId = formatValue(declared);

            if (!isAccountId(accountId)) {
                findings.push({
                    level: "error",
                    message: `account_id must be a 12-digit string, got '${accountId}'`,
                    rule: "account_id_format",
                });
            }

            if (
                isAccountId(context.directoryName) &&
                accountId !== context.directoryName
            ) {
                findings.push({
                    level: "warning",
                    message: `account_id '${accountId}' doesn't match directory name '${context.directoryName}'`,
                    rule: "account_id_consistency",
                });
            }

            return findings;
        },
    };
}

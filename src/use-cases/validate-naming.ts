import {
    compileNamePattern,
    type NamingPolicy,
} from "../entities/guardrails.js";
import {
    type SecurityGroupDocument,
    securityGroupContext,
    securityGroupEntries,
} from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import type { ValidationContext, ValidationPass } from "./validation-pass.js";

function validateName(
    name: string,
    naming: NamingPolicy,
): ValidationFinding[] {
    const findings: ValidationFinding[] = [];
    const context = securityGroupContext(name);

    if (!compileNamePattern(naming.securityGroupPattern).test(name)) {
        findings.push({
            level: "error",
            message: `Security group name '${name}' doesn't match required pattern: ${naming.securityGroupPattern}`,
            rule: "naming_pattern_violation",
            context,
        });
    }

    const length = [...name].length;
    if (length > naming.maxNameLength) {
        findings.push({
            level: "error",
            message: `Security group name '${name}' is too long (${length} chars, max ${naming.maxNameLength})`,
            rule: "naming_length_violation",
            context,
        });
    }

    for (const prefix of naming.reservedPrefixes) {
        if (name.startsWith(prefix)) {
            findings.push({
                level: "warning",
                message: `Security group name '${name}' starts with reserved pattern '${prefix}'`,
                rule: "naming_reserved_pattern",
                context,
            });
        }
    }

    return findings;
}

export function createNamingPass(): ValidationPass {
    return {
        name: "naming",
        run(
            document: SecurityGroupDocument,
            context: ValidationContext,
        ): readonly ValidationFinding[] {
            return securityGroupEntries(document).flatMap((group) =>
                validateName(group.name, context.guardrails.naming),
            );
        },
    };
}

import { typeOverrideFor } from "../entities/guardrails.js";
import {
    DIRECTIONS,
    ruleContext,
    ruleCount,
    ruleList,
    ruleNodes,
    type SecurityGroupDocument,
    type SecurityGroupNode,
    securityGroupContext,
    securityGroupNodes,
} from "../entities/security-group-document.js";
import {
    isSecurityGroupType,
    resolveSecurityGroupType,
    SECURITY_GROUP_TYPES,
    type SecurityGroupType,
} from "../entities/security-group-type.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import { protocolText } from "./validate-rule.js";
import {
    formatValue,
    type ValidationContext,
    type ValidationPass,
} from "./validation-pass.js";

function validateDeclaredType(group: SecurityGroupNode): ValidationFinding[] {
    const declared = group.fields.type;
    if (declared === undefined || isSecurityGroupType(declared)) {
        return [];
    }
    return [
        {
            level: "error",
            message: `Invalid type '${formatValue(declared)}' for security group '${group.name}' — must be one of: ${SECURITY_GROUP_TYPES.join(", ")}\n   → Remove 'type' to infer it from the name.`,
            rule: "sg_invalid_type",
            context: securityGroupContext(group.name),
        },
    ];
}

function validateAllowedProtocols(
    group: SecurityGroupNode,
    securityGroupType: SecurityGroupType,
    allowedProtocols: readonly string[],
): ValidationFinding[] {
    const allowed = new Set(allowedProtocols);
    const findings: ValidationFinding[] = [];

    for (const direction of DIRECTIONS) {
        for (const rule of ruleNodes(ruleList(group, direction))) {
            const protocol = protocolText(rule.fields.protocol);
            if (
                protocol === undefined ||
                protocol === "" ||
                allowed.has(protocol)
            ) {
                continue;
            }
            findings.push({
                level: "error",
                message: `Protocol '${protocol}' not allowed for ${securityGroupType} type in ${group.name} ${direction}[${rule.index}]`,
                rule: "type_protocol_restriction",
                context: ruleContext(group.name, direction, rule.index),
            });
        }
    }

    return findings;
}

function validateTotalRules(
    group: SecurityGroupNode,
    securityGroupType: SecurityGroupType,
    maxRules: number,
): ValidationFinding[] {
    const total = ruleCount(group.ingress) + ruleCount(group.egress);
    if (total <= maxRules) {
        return [];
    }
    return [
        {
            level: "error",
            message: `Security group '${group.name}' has ${total} rules, maximum for ${securityGroupType} is ${maxRules}`,
            rule: "type_rule_count_override",
            context: securityGroupContext(group.name),
        },
    ];
}

export function createTypeOverridesPass(): ValidationPass {
    return {
        name: "type-overrides",
        run(
            document: SecurityGroupDocument,
            context: ValidationContext,
        ): readonly ValidationFinding[] {
            const findings: ValidationFinding[] = [];

            for (const group of securityGroupNodes(document)) {
                findings.push(...validateDeclaredType(group));

                const securityGroupType = resolveSecurityGroupType(
                    group.name,
                    group.fields.type,
                );
                const override = typeOverrideFor(
                    context.guardrails,
                    securityGroupType,
                );

                if (override.allowedProtocols !== undefined) {
                    findings.push(
                        ...validateAllowedProtocols(
                            group,
                            securityGroupType,
                            override.allowedProtocols,
                        ),
                    );
                }
                if (override.maxRules !== undefined) {
                    findings.push(
                        ...validateTotalRules(
                            group,
                            securityGroupType,
                            override.maxRules,
                        ),
                    );
                }
            }

            return findings;
        },
    };
}

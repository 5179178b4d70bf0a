import { typeOverrideFor } from "../entities/guardrails.js";
import {
    DIRECTIONS,
    type Direction,
    isMapping,
    ruleContext,
    ruleCount,
    ruleList,
    type SecurityGroupDocument,
    type SecurityGroupNode,
    securityGroupContext,
    securityGroupEntries,
} from "../entities/security-group-document.js";
import { resolveSecurityGroupType } from "../entities/security-group-type.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import { findDuplicateRules } from "./normalize-rule.js";
import type { RuleValidator } from "./validate-rule.js";
import {
    describeType,
    type ValidationContext,
    type ValidationPass,
} from "./validation-pass.js";

export interface SecurityGroupsPassDeps {
    readonly ruleValidator: RuleValidator;
}

function validateDescription(group: SecurityGroupNode): ValidationFinding[] {
    const description = group.fields.description;
    if (typeof description === "string" && description.trim() !== "") {
        return [];
    }
    return [
        {
            level: "error",
            message: `Security group '${group.name}' must have a non-empty description — descriptions help identify the purpose and scope of the security group.\n   → Add a clear description explaining what this security group protects.`,
            rule: "sg_required_description",
            context: securityGroupContext(group.name),
        },
    ];
}

function validateRules(
    group: SecurityGroupNode,
    direction: Direction,
    deps: SecurityGroupsPassDeps,
    context: ValidationContext,
): ValidationFinding[] {
    const list = ruleList(group, direction);
    if (list.kind === "absent") {
        return [];
    }
    if (list.kind === "invalid") {
        return [
            {
                level: "error",
                message: `Security group '${group.name}' ${direction} must be a list, got ${describeType(list.value)}`,
                rule: `sg_${direction}_type`,
                context: securityGroupContext(group.name),
            },
        ];
    }
    if (list.entries.length === 0) {
        return [
            {
                level: "warning",
                message: `Security group '${group.name}' has an empty ${direction} list — remove it or add rules.`,
                rule: "sg_empty_rules",
                context: securityGroupContext(group.name),
            },
        ];
    }

    const securityGroupType = resolveSecurityGroupType(
        group.name,
        group.fields.type,
    );
    const findings: ValidationFinding[] = [];
    for (const entry of list.entries) {
        if (entry.kind === "malformed") {
            findings.push({
                level: "error",
                message: `Rule ${group.name} ${direction}[${entry.index}] must be a mapping, got ${describeType(entry.value)}`,
                rule: "rule_type",
                context: ruleContext(group.name, direction, entry.index),
            });
            continue;
        }
        findings.push(
            ...deps.ruleValidator.validate(
                {
                    securityGroupName: group.name,
                    securityGroupType,
                    direction,
                    rule: entry,
                },
                context,
            ),
        );
    }
    findings.push(...findDuplicateRules(group.name, direction, list.entries));
    return findings;
}

// A type override with max_rules replaces these ceilings.
function validateRuleCounts(
    group: SecurityGroupNode,
    context: ValidationContext,
): ValidationFinding[] {
    const { guardrails } = context;
    const securityGroupType = resolveSecurityGroupType(
        group.name,
        group.fields.type,
    );
    if (typeOverrideFor(guardrails, securityGroupType).maxRules !== undefined) {
        return [];
    }

    const ceilings: Record<Direction, number> = {
        ingress: guardrails.maxIngressRules,
        egress: guardrails.maxEgressRules,
    };
    return DIRECTIONS.flatMap((direction): ValidationFinding[] => {
        const count = ruleCount(ruleList(group, direction));
        const max = ceilings[direction];
        if (count <= max) {
            return [];
        }
        return [
            {
                level: "error",
                message: `Security group '${group.name}' has ${count} ${direction} rules, maximum is ${max} — too many rules make security groups hard to manage and can impact performance.\n   → Consolidate similar rules or split into multiple security groups by function.`,
                rule: "sg_rule_count_limit",
                context: securityGroupContext(group.name),
            },
        ];
    });
}

function validateTags(
    group: SecurityGroupNode,
    context: ValidationContext,
): ValidationFinding[] {
    const findings: ValidationFinding[] = [];
    const tags = group.fields.tags;
    const tagMap = isMapping(tags) ? tags : {};

    if (tags !== undefined && !isMapping(tags)) {
        findings.push({
            level: "error",
            message: `Security group '${group.name}' tags must be a mapping, got ${describeType(tags)}`,
            rule: "sg_tags_type",
            context: securityGroupContext(group.name),
        });
    }

    const required = context.guardrails.naming.requiredTags;
    const missing = required.filter((tag) => !Object.hasOwn(tagMap, tag));
    if (missing.length > 0) {
        findings.push({
            level: "error",
            message: `Security group '${group.name}' is missing required tags: ${missing.join(", ")} — all security groups must carry the mandatory tags for compliance tracking.\n   → Required tags: ${required.join(", ")}`,
            rule: "sg_required_tags",
            context: securityGroupContext(group.name),
        });
    }

    return findings;
}

export function createSecurityGroupsPass(
    deps: SecurityGroupsPassDeps,
): ValidationPass {
    return {
        name: "security-groups",
        run(
            document: SecurityGroupDocument,
            context: ValidationContext,
        ): readonly ValidationFinding[] {
            const findings: ValidationFinding[] = [];

            for (const group of securityGroupEntries(document)) {
                if (group.kind === "malformed") {
                    findings.push({
                        level: "error",
                        message: `Security group '${group.name}' must be a dictionary/object, got ${describeType(group.value)}`,
                        rule: "sg_type",
                        context: securityGroupContext(group.name),
                    });
                    continue;
                }

                findings.push(...validateDescription(group));
                for (const direction of DIRECTIONS) {
                    findings.push(
                        ...validateRules(group, direction, deps, context),
                    );
                }
                findings.push(
                    ...validateRuleCounts(group, context),
                    ...validateTags(group, context),
                );
            }

            return findings;
        },
    };
}

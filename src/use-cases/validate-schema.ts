import {
    DIRECTIONS,
    DOCUMENT_KEYS,
    isMapping,
    RULE_KEYS,
    ruleContext,
    ruleList,
    ruleNodes,
    SECURITY_GROUP_KEYS,
    securityGroupContext,
    securityGroupNodes,
    type SecurityGroupDocument,
} from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import { describeType, type ValidationPass } from "./validation-pass.js";

const REQUIRED_KEYS = ["account_id", "security_groups"] as const;
const VALID_ENVIRONMENTS: ReadonlySet<string> = new Set(["dev", "prod", "test"]);

const SORTED_DOCUMENT_KEYS = [...DOCUMENT_KEYS].sort().join(", ");
const SORTED_SG_KEYS = [...SECURITY_GROUP_KEYS].sort().join(", ");
const SORTED_RULE_KEYS = [...RULE_KEYS].sort().join(", ");

function checkTopLevel(
    document: SecurityGroupDocument,
    findings: ValidationFinding[],
): void {
    for (const key of REQUIRED_KEYS) {
        if (document.fields[key] === undefined) {
            findings.push({
                level: "error",
                message: `Required field '${key}' is missing`,
                rule: "schema_required_fields",
            });
        }
    }

    for (const key of document.unknownKeys) {
        findings.push({
            level: "error",
            message: `Unknown top-level key '${key}' — did you mean one of: ${SORTED_DOCUMENT_KEYS}?\n   → Unrecognized keys are never applied; fix the spelling or remove the key.`,
            rule: "schema_unknown_key",
        });
    }

    const environment = document.fields.environment;
    if (environment !== undefined) {
        if (typeof environment !== "string") {
            findings.push({
                level: "error",
                message: `'environment' must be a string, got ${describeType(environment)}`,
                rule: "schema_environment_type",
            });
        } else if (!VALID_ENVIRONMENTS.has(environment)) {
            findings.push({
                level: "error",
                message: `Invalid environment '${environment}' — must be one of: ${[...VALID_ENVIRONMENTS].join(", ")}\n   → This controls environment-specific guardrails and tagging.`,
                rule: "schema_invalid_environment",
            });
        }
    }

    const tags = document.fields.tags;
    if (
        tags !== undefined &&
        (!isMapping(tags) ||
            Object.values(tags).some((value) => typeof value !== "string"))
    ) {
        findings.push({
            level: "error",
            message: "'tags' must be a mapping of string keys to string values",
            rule: "schema_tags_type",
        });
    }

    if (document.securityGroups.kind === "invalid") {
        findings.push({
            level: "error",
            message: "'security_groups' must be a dictionary/object",
            rule: "schema_type",
        });
    }
}

function checkNestedKeys(
    document: SecurityGroupDocument,
    findings: ValidationFinding[],
): void {
    for (const group of securityGroupNodes(document)) {
        for (const key of group.unknownKeys) {
            findings.push({
                level: "error",
                message: `Unknown key '${key}' in security group '${group.name}' — valid keys: ${SORTED_SG_KEYS}\n   → Check the spelling; unrecognized keys are never applied.`,
                rule: "schema_unknown_sg_key",
                context: securityGroupContext(group.name),
            });
        }

        for (const direction of DIRECTIONS) {
            for (const rule of ruleNodes(ruleList(group, direction))) {
                for (const key of rule.unknownKeys) {
                    findings.push({
                        level: "error",
                        message: `Unknown key '${key}' in ${group.name} ${direction}[${rule.index}] — valid keys: ${SORTED_RULE_KEYS}\n   → Check the spelling; unrecognized keys are never applied.`,
                        rule: "schema_unknown_rule_key",
                        context: ruleContext(group.name, direction, rule.index),
                    });
                }
            }
        }
    }
}

export function createSchemaPass(): ValidationPass {
    return {
        name: "schema",
        run(document: SecurityGroupDocument): readonly ValidationFinding[] {
            const findings: ValidationFinding[] = [];
            checkTopLevel(document, findings);
            checkNestedKeys(document, findings);
            return findings;
        },
    };
}

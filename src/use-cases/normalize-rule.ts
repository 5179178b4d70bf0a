import {
    type Direction,
    type RawFields,
    type RuleEntry,
    type RuleKey,
    ruleContext,
} from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";

type Scalar = string | number | boolean | null;

export type NormalizedRule = readonly [
    protocol: Scalar,
    fromPort: Scalar,
    toPort: Scalar,
    cidrBlocks: readonly string[],
    ipv6CidrBlocks: readonly string[],
    securityGroups: readonly string[],
    prefixListIds: readonly string[],
    self: Scalar,
];

function safeString(value: unknown): string {
    if (typeof value === "string") {
        return value;
    }
    try {
        return JSON.stringify(value) ?? String(value);
    } catch {
        return String(value);
    }
}

function scalar(value: unknown): Scalar {
    if (value === undefined || value === null) {
        return null;
    }
    if (
        typeof value === "string" ||
        typeof value === "number" ||
        typeof value === "boolean"
    ) {
        return value;
    }
    return safeString(value);
}

// Lists compare order-independently; anything else collapses to one string.
function sortedStrings(value: unknown): readonly string[] {
    if (value === undefined || value === null) {
        return [];
    }
    if (Array.isArray(value)) {
        return value.map(safeString).sort();
    }
    return [safeString(value)];
}

export function normalizeRule(fields: RawFields<RuleKey>): NormalizedRule {
    return [
        scalar(fields.protocol),
        scalar(fields.from_port),
        scalar(fields.to_port),
        sortedStrings(fields.cidr_blocks),
        sortedStrings(fields.ipv6_cidr_blocks),
        sortedStrings(fields.security_groups),
        sortedStrings(fields.prefix_list_ids),
        fields.self === undefined ? false : scalar(fields.self),
    ];
}

export function normalizedRuleKey(fields: RawFields<RuleKey>): string {
    return JSON.stringify(normalizeRule(fields));
}

export function findDuplicateRules(
    securityGroupName: string,
    direction: Direction,
    rules: readonly RuleEntry[],
): ValidationFinding[] {
    const findings: ValidationFinding[] = [];
    const firstIndexByKey = new Map<string, number>();

    for (const rule of rules) {
        if (rule.kind !== "rule") {
            continue;
        }
        const key = normalizedRuleKey(rule.fields);
        const firstIndex = firstIndexByKey.get(key);
        if (firstIndex === undefined) {
            firstIndexByKey.set(key, rule.index);
            continue;
        }
        findings.push({
            level: "error",
            message: `Duplicate rule: ${securityGroupName} ${direction}[${rule.index}] is identical to ${direction}[${firstIndex}] — AWS will silently dedupe this but it indicates a copy-paste error.\n   → Remove the duplicate rule.`,
            rule: "rule_duplicate",
            context: ruleContext(securityGroupName, direction, rule.index),
        });
    }

    return findings;
}

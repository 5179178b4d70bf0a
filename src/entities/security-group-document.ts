export const DOCUMENT_KEYS = [
    "account_id",
    "environment",
    "security_groups",
    "baseline_profiles",
    "tags",
] as const;

export const SECURITY_GROUP_KEYS = [
    "description",
    "ingress",
    "egress",
    "tags",
    "type",
] as const;

export const RULE_KEYS = [
    "protocol",
    "from_port",
    "to_port",
    "cidr_blocks",
    "ipv6_cidr_blocks",
    "security_groups",
    "prefix_list_ids",
    "self",
    "description",
] as const;

export const DIRECTIONS = ["ingress", "egress"] as const;

export type DocumentKey = (typeof DOCUMENT_KEYS)[number];
export type SecurityGroupKey = (typeof SECURITY_GROUP_KEYS)[number];
export type RuleKey = (typeof RULE_KEYS)[number];
export type Direction = (typeof DIRECTIONS)[number];

/**
 * Values exactly as they appeared in the YAML. A key that was written with no
 * value is present with `null`; a key that was not written is `undefined`.
 */
export type RawFields<K extends string> = { readonly [P in K]?: unknown };

export interface RuleNode {
    readonly kind: "rule";
    readonly index: number;
    readonly fields: RawFields<RuleKey>;
    readonly unknownKeys: readonly string[];
}

export interface MalformedRuleNode {
    readonly kind: "malformed";
    readonly index: number;
    readonly value: unknown;
}

export type RuleEntry = RuleNode | MalformedRuleNode;

export type RuleList =
    | { readonly kind: "absent" }
    | { readonly kind: "list"; readonly entries: readonly RuleEntry[] }
    | { readonly kind: "invalid"; readonly value: unknown };

export interface SecurityGroupNode {
    readonly kind: "security_group";
    readonly name: string;
    readonly fields: RawFields<SecurityGroupKey>;
    readonly ingress: RuleList;
    readonly egress: RuleList;
    readonly unknownKeys: readonly string[];
}

export interface MalformedSecurityGroupNode {
    readonly kind: "malformed";
    readonly name: string;
    readonly value: unknown;
}

export type SecurityGroupEntry = SecurityGroupNode | MalformedSecurityGroupNode;

export type SecurityGroupsNode =
    | { readonly kind: "absent" }
    | {
          readonly kind: "mapping";
          readonly entries: readonly SecurityGroupEntry[];
      }
    | { readonly kind: "invalid"; readonly value: unknown };

export interface SecurityGroupDocument {
    readonly fields: RawFields<DocumentKey>;
    readonly securityGroups: SecurityGroupsNode;
    readonly unknownKeys: readonly string[];
}

export function isMapping(
    value: unknown,
): value is Readonly<Record<string, unknown>> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function securityGroupEntries(
    document: SecurityGroupDocument,
): readonly SecurityGroupEntry[] {
    return document.securityGroups.kind === "mapping"
        ? document.securityGroups.entries
        : [];
}

export function securityGroupNodes(
    document: SecurityGroupDocument,
): readonly SecurityGroupNode[] {
    return securityGroupEntries(document).filter(
        (entry): entry is SecurityGroupNode => entry.kind === "security_group",
    );
}

export function ruleList(
    group: SecurityGroupNode,
    direction: Direction,
): RuleList {
    return direction === "ingress" ? group.ingress : group.egress;
}

export function ruleEntries(list: RuleList): readonly RuleEntry[] {
    return list.kind === "list" ? list.entries : [];
}

export function ruleNodes(list: RuleList): readonly RuleNode[] {
    return ruleEntries(list).filter(
        (entry): entry is RuleNode => entry.kind === "rule",
    );
}

export function ruleCount(list: RuleList): number {
    return ruleEntries(list).length;
}

export function securityGroupContext(name: string): string {
    return `security_group.${name}`;
}

const GROUP_CONTEXT =
    /^security_group\.(.+?)(?:\.(?:ingress|egress)\[\d+\].*|\.(?:name|description)|\.tags\.(?:key|value)\..*)?$/s;

/** Inverse of the context builders; group names may contain dots. */
export function securityGroupNameFromContext(
    context: string,
): string | undefined {
    return GROUP_CONTEXT.exec(context)?.[1];
}

export function ruleContext(
    name: string,
    direction: Direction,
    index: number,
): string {
    return `security_group.${name}.${direction}[${index}]`;
}

function pickFields<K extends string>(
    raw: Readonly<Record<string, unknown>>,
    known: readonly K[],
): { fields: RawFields<K>; unknownKeys: string[] } {
    const knownSet: ReadonlySet<string> = new Set(known);
    const fields: { [P in K]?: unknown } = {};
    for (const key of known) {
        if (Object.hasOwn(raw, key)) {
            fields[key] = raw[key];
        }
    }
    const unknownKeys = Object.keys(raw)
        .filter((key) => !knownSet.has(key))
        .sort();
    return { fields, unknownKeys };
}

function buildRuleList(value: unknown): RuleList {
    if (value === undefined) {
        return { kind: "absent" };
    }
    if (!Array.isArray(value)) {
        return { kind: "invalid", value };
    }
    const entries = value.map((item: unknown, index): RuleEntry => {
        if (!isMapping(item)) {
            return { kind: "malformed", index, value: item };
        }
        const { fields, unknownKeys } = pickFields(item, RULE_KEYS);
        return { kind: "rule", index, fields, unknownKeys };
    });
    return { kind: "list", entries };
}

function buildSecurityGroup(name: string, value: unknown): SecurityGroupEntry {
    if (!isMapping(value)) {
        return { kind: "malformed", name, value };
    }
    const { fields, unknownKeys } = pickFields(value, SECURITY_GROUP_KEYS);
    return {
        kind: "security_group",
        name,
        fields,
        ingress: buildRuleList(fields.ingress),
        egress: buildRuleList(fields.egress),
        unknownKeys,
    };
}

function buildSecurityGroups(value: unknown): SecurityGroupsNode {
    if (value === undefined) {
        return { kind: "absent" };
    }
    if (!isMapping(value)) {
        return { kind: "invalid", value };
    }
    return {
        kind: "mapping",
        entries: Object.entries(value).map(([name, group]) =>
            buildSecurityGroup(name, group),
        ),
    };
}

/**
 * Splits a parsed YAML mapping into known fields and the keys nothing reads,
 * at document, security-group and rule level.
 */
export function buildSecurityGroupDocument(
    raw: Readonly<Record<string, unknown>>,
): SecurityGroupDocument {
    const { fields, unknownKeys } = pickFields(raw, DOCUMENT_KEYS);
    return {
        fields,
        securityGroups: buildSecurityGroups(fields.security_groups),
        unknownKeys,
    };
}

import type { Guardrails } from "../entities/guardrails.js";
import type { PrefixListCatalog } from "../entities/prefix-list-catalog.js";
import {
    buildSecurityGroupDocument,
    type RuleNode,
    type SecurityGroupDocument,
} from "../entities/security-group-document.js";
import type { AccountContext } from "../use-cases/load-account-context.js";
import { createGuardrailsParser } from "../use-cases/parse-guardrails.js";
import type { DocumentParseResult } from "../use-cases/parse-security-group-document.js";
import type { ValidationContext } from "../use-cases/validation-pass.js";

export const TEST_ACCOUNT_ID = "100000000001";

type Raw = Record<string, unknown>;

/** Guardrails as the parser would produce them; JSON is valid YAML. */
export function buildGuardrails(raw: Raw = {}): Guardrails {
    return createGuardrailsParser().parse(JSON.stringify(raw));
}

export function buildPrefixListCatalog(
    names: readonly string[] = [],
): PrefixListCatalog {
    return {
        prefixLists: new Map(names.map((name) => [name, { entries: [] }])),
    };
}

export function buildValidationContext(options?: {
    readonly guardrails?: Guardrails;
    readonly prefixLists?: readonly string[];
    readonly directoryName?: string;
}): ValidationContext {
    return {
        guardrails: options?.guardrails ?? buildGuardrails(),
        prefixLists: buildPrefixListCatalog(options?.prefixLists),
        directoryName: options?.directoryName ?? TEST_ACCOUNT_ID,
    };
}

export function buildRule(overrides: Raw = {}): Raw {
    return {
        protocol: "tcp",
        from_port: 443,
        to_port: 443,
        cidr_blocks: ["10.1.0.0/16"],
        description: "HTTPS from the app subnet",
        ...overrides,
    };
}

export function buildSecurityGroup(overrides: Raw = {}): Raw {
    return {
        description: "Application servers",
        ingress: [buildRule()],
        ...overrides,
    };
}

export function buildDocumentRaw(
    securityGroups: Record<string, unknown>,
    overrides: Raw = {},
): Raw {
    return {
        account_id: TEST_ACCOUNT_ID,
        environment: "dev",
        security_groups: securityGroups,
        ...overrides,
    };
}

export function buildDocument(
    securityGroups: Record<string, unknown>,
    overrides: Raw = {},
): SecurityGroupDocument {
    return buildSecurityGroupDocument(buildDocumentRaw(securityGroups, overrides));
}

/** The rule node for `ingress[0]` of a one-group document. */
export function buildRuleNode(fields: Raw, index = 0): RuleNode {
    const rules = Array.from({ length: index + 1 }, () => buildRule());
    rules[index] = fields;
    const document = buildDocument({
        "app-servers": buildSecurityGroup({ ingress: rules }),
    });
    const securityGroups = document.securityGroups;
    if (securityGroups.kind !== "mapping") {
        throw new Error("expected a security group mapping");
    }
    const group = securityGroups.entries[0];
    if (group?.kind !== "security_group" || group.ingress.kind !== "list") {
        throw new Error("expected a security group with an ingress list");
    }
    const rule = group.ingress.entries[index];
    if (rule?.kind !== "rule") {
        throw new Error("expected a rule mapping");
    }
    return rule;
}

export function buildAccountContext(
    document: DocumentParseResult,
    guardrails: Guardrails = buildGuardrails(),
): AccountContext {
    return {
        accountDir: `/repo/accounts/${TEST_ACCOUNT_ID}`,
        directoryName: TEST_ACCOUNT_ID,
        accountId: TEST_ACCOUNT_ID,
        guardrails,
        prefixLists: buildPrefixListCatalog(),
        document,
    };
}

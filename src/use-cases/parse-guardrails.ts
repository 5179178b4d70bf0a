import type { Guardrails, TypeOverride } from "../entities/guardrails.js";
import { isMapping } from "../entities/security-group-document.js";
import { type GuardrailsInput, GuardrailsSchema } from "./guardrails.schema.js";
import { loadYaml } from "./parse-yaml.js";

export interface GuardrailsParser {
    parse(content: string): Guardrails;
}

function toTypeOverride(
    input: GuardrailsInput["type_overrides"][string],
): TypeOverride {
    return {
        allowedProtocols: input.allowed_protocols,
        requiredEgress: input.required_egress?.map((rule) => ({
            protocol: rule.protocol,
            fromPort: rule.from_port,
            toPort: rule.to_port,
            cidrBlocks: rule.cidr_blocks,
            ipv6CidrBlocks: rule.ipv6_cidr_blocks,
        })),
        maxRules: input.max_rules,
        maxRangeSize: input.max_range_size,
    };
}

function toGuardrails(input: GuardrailsInput): Guardrails {
    const { validation } = input;
    const typeOverrides: Record<string, TypeOverride> = {};
    for (const [type, override] of Object.entries(input.type_overrides)) {
        typeOverrides[type] = toTypeOverride(override);
    }

    return {
        blockedCidrs: validation.blocked_cidrs,
        blockedPorts: validation.blocked_ports,
        maxRangeSize: validation.port_ranges.max_range_size,
        maxIngressRules: validation.rules.max_ingress_rules,
        maxEgressRules: validation.rules.max_egress_rules,
        naming: {
            securityGroupPattern: validation.naming.security_group_pattern,
            maxNameLength: validation.naming.max_name_length,
            requiredTags: validation.naming.required_tags,
            reservedPrefixes: validation.naming.reserved_prefixes,
        },
        typeOverrides,
        baselineProfiles: {
            available: input.baseline_profiles.available,
            dependencies: input.baseline_profiles.dependencies,
            mutuallyExclusive: input.baseline_profiles.mutually_exclusive,
        },
        quotas: {
            securityGroupsPerVpc: input.quotas.security_groups_per_vpc,
            rulesPerSecurityGroup: input.quotas.rules_per_security_group,
            securityGroupsPerAccount: input.quotas.security_groups_per_account,
            warningThresholdPercent: input.quotas.warning_threshold_percent,
        },
    };
}

export function createGuardrailsParser(): GuardrailsParser {
    return {
        parse(content: string): Guardrails {
            const raw = loadYaml(content);
            if (raw === undefined || raw === null) {
                throw new Error("guardrails document is empty");
            }
            if (!isMapping(raw)) {
                throw new Error("guardrails document must be a mapping");
            }
            return toGuardrails(GuardrailsSchema.parse(raw));
        },
    };
}

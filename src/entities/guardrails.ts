export interface RequiredEgressRule {
    readonly protocol?: string | undefined;
    readonly fromPort?: number | undefined;
    readonly toPort?: number | undefined;
    readonly cidrBlocks: readonly string[];
    readonly ipv6CidrBlocks: readonly string[];
}

export interface TypeOverride {
    readonly allowedProtocols?: readonly string[] | undefined;
    readonly requiredEgress?: readonly RequiredEgressRule[] | undefined;
    readonly maxRules?: number | undefined;
    readonly maxRangeSize?: number | undefined;
}

export interface NamingPolicy {
    readonly securityGroupPattern: string;
    readonly maxNameLength: number;
    readonly requiredTags: readonly string[];
    readonly reservedPrefixes: readonly string[];
}

export interface BaselineProfilePolicy {
    readonly available: readonly string[];
    readonly dependencies: Readonly<Record<string, readonly string[]>>;
    readonly mutuallyExclusive: readonly (readonly string[])[];
}

export interface QuotaPolicy {
    readonly securityGroupsPerVpc: number;
    readonly rulesPerSecurityGroup: number;
    readonly securityGroupsPerAccount: number;
    readonly warningThresholdPercent: number;
}

export interface Guardrails {
    readonly blockedCidrs: readonly string[];
    readonly blockedPorts: readonly number[];
    readonly maxRangeSize: number;
    readonly maxIngressRules: number;
    readonly maxEgressRules: number;
    readonly naming: NamingPolicy;
    readonly typeOverrides: Readonly<Record<string, TypeOverride>>;
    readonly baselineProfiles: BaselineProfilePolicy;
    readonly quotas: QuotaPolicy;
}

export function typeOverrideFor(
    guardrails: Guardrails,
    securityGroupType: string,
): TypeOverride {
    return guardrails.typeOverrides[securityGroupType] ?? {};
}

// Names must match from the first character; a trailing `$` is up to the pattern.
export function compileNamePattern(pattern: string): RegExp {
    return new RegExp(`^(?:${pattern})`);
}

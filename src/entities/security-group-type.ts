export const SECURITY_GROUP_TYPES = [
    "eks-nodes",
    "nlb",
    "web",
    "alb",
    "database",
    "general",
] as const;

export type SecurityGroupType = (typeof SECURITY_GROUP_TYPES)[number];

const KNOWN_TYPES: ReadonlySet<string> = new Set(SECURITY_GROUP_TYPES);

export function isSecurityGroupType(value: unknown): value is SecurityGroupType {
    return typeof value === "string" && KNOWN_TYPES.has(value);
}

// Order matters: "eks-node-web" is eks-nodes, "web-db" is web.
export function inferSecurityGroupType(name: string): SecurityGroupType {
    const lower = name.toLowerCase();

    if (lower.includes("eks") && lower.includes("node")) {
        return "eks-nodes";
    }
    if (lower.includes("nlb") || lower.includes("network-lb")) {
        return "nlb";
    }
    if (lower.includes("web") || lower.includes("http")) {
        return "web";
    }
    if (lower.includes("alb") || lower.includes("application-lb")) {
        return "alb";
    }
    if (
        lower.includes("rds") ||
        lower.includes("database") ||
        lower.includes("db")
    ) {
        return "database";
    }
    return "general";
}

/**
 * A declared `type` wins when it names a known type; otherwise the type is
 * inferred from the name.
 */
export function resolveSecurityGroupType(
    name: string,
    declaredType: unknown,
): SecurityGroupType {
    if (isSecurityGroupType(declaredType)) {
        return declaredType;
    }
    return inferSecurityGroupType(name);
}

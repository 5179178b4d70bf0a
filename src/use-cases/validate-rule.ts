import {
    type AddressFamily,
    isOpenInternet,
    parseCidr,
    RFC1918_SUPERNETS,
} from "../entities/cidr.js";
import {
    type Guardrails,
    type RequiredEgressRule,
    typeOverrideFor,
} from "../entities/guardrails.js";
import {
    isAwsManagedPrefixList,
    type PrefixListCatalog,
} from "../entities/prefix-list-catalog.js";
import {
    type Direction,
    ruleContext,
    type RuleNode,
} from "../entities/security-group-document.js";
import type { SecurityGroupType } from "../entities/security-group-type.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import {
    describeType,
    formatValue,
    type ValidationContext,
} from "./validation-pass.js";

const VALID_PROTOCOLS: ReadonlySet<string> = new Set([
    "tcp",
    "udp",
    "icmp",
    "icmpv6",
    "ah",
    "esp",
    "gre",
    "all",
    "-1",
]);

const PORTED_PROTOCOLS: ReadonlySet<string> = new Set(["tcp", "udp"]);

const MAX_PORT = 65535;
const MAX_PROTOCOL_NUMBER = 255;

const SOURCE_FIELDS = [
    "cidr_blocks",
    "ipv6_cidr_blocks",
    "security_groups",
    "self",
    "prefix_list_ids",
] as const;

const CIDR_FIELDS: readonly {
    readonly field: "cidr_blocks" | "ipv6_cidr_blocks";
    readonly family: AddressFamily;
}[] = [
    { field: "cidr_blocks", family: "ipv4" },
    { field: "ipv6_cidr_blocks", family: "ipv6" },
];

export const PORT_NAMES: ReadonlyMap<number, string> = new Map([
    [21, "FTP"],
    [22, "SSH"],
    [23, "Telnet"],
    [25, "SMTP"],
    [53, "DNS"],
    [80, "HTTP"],
    [110, "POP3"],
    [135, "NetBIOS/RPC"],
    [139, "NetBIOS/SMB"],
    [143, "IMAP"],
    [443, "HTTPS"],
    [445, "SMB"],
    [993, "IMAPS"],
    [995, "POP3S"],
    [1433, "MSSQL"],
    [3306, "MySQL"],
    [3389, "RDP"],
    [5432, "PostgreSQL"],
    [6379, "Redis"],
    [27017, "MongoDB"],
]);

const REMOTE_ACCESS_PORTS: readonly (readonly [number, string])[] = [
    [22, "SSH"],
    [3389, "RDP"],
];

const DATABASE_PORTS: readonly (readonly [number, string])[] = [
    [3306, "MySQL"],
    [5432, "PostgreSQL"],
    [1433, "MSSQL"],
    [27017, "MongoDB"],
    [6379, "Redis"],
];

interface BlockedPortGuidance {
    readonly reason: string;
    readonly suggestion: string;
}

const BLOCKED_PORT_GUIDANCE: ReadonlyMap<number, BlockedPortGuidance> = (() => {
    const lateralMovement: BlockedPortGuidance = {
        reason: "commonly exploited for lateral movement attacks. Not needed for cloud workloads",
        suggestion:
            "Remove this rule. If you need Windows RPC, contact the security team.",
    };
    const plainTextCredentials: BlockedPortGuidance = {
        reason: "insecure protocols that transmit credentials in plain text",
        suggestion:
            "Use secure alternatives (SFTP, encrypted email protocols).",
    };
    return new Map([
        [135, lateralMovement],
        [139, lateralMovement],
        [
            23,
            {
                reason: "transmits data in plain text, easily intercepted by attackers",
                suggestion:
                    "Use SSH (port 22) or AWS Systems Manager Session Manager instead.",
            },
        ],
        [
            3389,
            {
                reason: "commonly brute-forced and vulnerable to exploits",
                suggestion:
                    "Use AWS Systems Manager Session Manager for Windows access.",
            },
        ],
        [21, plainTextCredentials],
        [25, plainTextCredentials],
    ]);
})();

const DEFAULT_BLOCKED_PORT_GUIDANCE: BlockedPortGuidance = {
    reason: "blocked for security reasons",
    suggestion: "Remove this rule or contact the security team if required.",
};

export interface RuleValidationInput {
    readonly securityGroupName: string;
    readonly securityGroupType: SecurityGroupType;
    readonly direction: Direction;
    readonly rule: RuleNode;
}

export interface RuleValidator {
    validate(
        input: RuleValidationInput,
        context: ValidationContext,
    ): readonly ValidationFinding[];
}

export function describePort(port: number): string {
    const name = PORT_NAMES.get(port);
    return name === undefined ? String(port) : `${port} (${name})`;
}

/** Returns the protocol as written, or `undefined` when it is not a scalar. */
export function protocolText(value: unknown): string | undefined {
    if (typeof value === "string") {
        return value;
    }
    if (typeof value === "number" && Number.isFinite(value)) {
        return String(value);
    }
    return undefined;
}

export function isValidProtocol(protocol: string): boolean {
    if (VALID_PROTOCOLS.has(protocol)) {
        return true;
    }
    const trimmed = protocol.trim();
    if (!/^[+-]?\d+$/.test(trimmed)) {
        return false;
    }
    const value = Number(trimmed);
    return value >= 0 && value <= MAX_PROTOCOL_NUMBER;
}

function parsePort(value: unknown): number | undefined {
    if (typeof value === "number") {
        return Number.isInteger(value) ? value : undefined;
    }
    if (typeof value === "string") {
        const trimmed = value.trim();
        return /^[+-]?\d+$/.test(trimmed) ? Number(trimmed) : undefined;
    }
    return undefined;
}

function cidrList(value: unknown): readonly unknown[] {
    if (Array.isArray(value)) {
        return value;
    }
    return typeof value === "string" ? [value] : [];
}

function stringArrayEquals(value: unknown, expected: readonly string[]): boolean {
    const actual = value === undefined ? [] : value;
    return (
        Array.isArray(actual) &&
        actual.length === expected.length &&
        actual.every((item, index) => item === expected[index])
    );
}

function matchesRequiredEgress(
    rule: RuleNode,
    required: RequiredEgressRule,
): boolean {
    const { fields } = rule;
    return (
        protocolText(fields.protocol) === required.protocol &&
        fields.from_port === required.fromPort &&
        fields.to_port === required.toPort &&
        stringArrayEquals(fields.cidr_blocks, required.cidrBlocks) &&
        stringArrayEquals(fields.ipv6_cidr_blocks, required.ipv6CidrBlocks)
    );
}

function isSecurityGroupReference(reference: string): boolean {
    return (
        reference.startsWith("sg-") ||
        /^[\p{L}\p{N}]+$/u.test(reference) ||
        reference.includes("-")
    );
}

interface RuleScope {
    readonly input: RuleValidationInput;
    readonly fields: RuleNode["fields"];
    readonly guardrails: Guardrails;
    readonly prefixLists: PrefixListCatalog;
    readonly location: string;
    readonly context: string;
}

function finding(
    scope: RuleScope,
    level: ValidationFinding["level"],
    rule: string,
    message: string,
): ValidationFinding {
    return { level, message, rule, context: scope.context };
}

function validatePorts(scope: RuleScope): ValidationFinding[] {
    const { from_port: rawFrom, to_port: rawTo } = scope.fields;
    if (
        rawFrom === undefined ||
        rawFrom === null ||
        rawTo === undefined ||
        rawTo === null
    ) {
        return [
            finding(
                scope,
                "error",
                "rule_required_ports",
                `TCP/UDP rule in ${scope.location} requires 'from_port' and 'to_port'`,
            ),
        ];
    }

    const findings: ValidationFinding[] = [];
    const ports: number[] = [];
    for (const [field, raw] of [
        ["from_port", rawFrom],
        ["to_port", rawTo],
    ] as const) {
        const port = parsePort(raw);
        if (port === undefined) {
            findings.push(
                finding(
                    scope,
                    "error",
                    "rule_invalid_port_type",
                    `Invalid ${field} '${formatValue(raw)}' in ${scope.location} (must be a number)`,
                ),
            );
            return findings;
        }
        if (port < 0 || port > MAX_PORT) {
            findings.push(
                finding(
                    scope,
                    "error",
                    "rule_invalid_port",
                    `Invalid ${field} '${formatValue(raw)}' in ${scope.location} (must be 0-${MAX_PORT})`,
                ),
            );
        }
        ports.push(port);
    }

    const [fromPort = 0, toPort = 0] = ports;
    if (fromPort > toPort) {
        findings.push(
            finding(
                scope,
                "error",
                "rule_invalid_port_range",
                `Invalid port range in ${scope.location}: from_port (${fromPort}) > to_port (${toPort})`,
            ),
        );
        return findings;
    }

    findings.push(
        ...validateRangeSize(scope, fromPort, toPort),
        ...validateBlockedPorts(scope, fromPort, toPort),
    );
    if (scope.input.direction === "ingress") {
        findings.push(...validateHighRiskPorts(scope, fromPort, toPort));
    }
    return findings;
}

function validateRangeSize(
    scope: RuleScope,
    fromPort: number,
    toPort: number,
): ValidationFinding[] {
    const override = typeOverrideFor(
        scope.guardrails,
        scope.input.securityGroupType,
    );
    const maxRangeSize = override.maxRangeSize ?? scope.guardrails.maxRangeSize;
    const rangeSize = toPort - fromPort + 1;
    if (rangeSize <= maxRangeSize) {
        return [];
    }
    return [
        finding(
            scope,
            "error",
            "rule_port_range_too_large",
            `Port range ${fromPort}-${toPort} is too broad (${rangeSize} ports, max ${maxRangeSize}) — this effectively opens all ports.\n` +
                "   → Narrow to specific ports your application needs (e.g., 443, 8080).\n" +
                '   → If this is for EKS node communication, set type: "eks-nodes" to allow ephemeral ranges.',
        ),
    ];
}

function validateBlockedPorts(
    scope: RuleScope,
    fromPort: number,
    toPort: number,
): ValidationFinding[] {
    return [...new Set(scope.guardrails.blockedPorts)]
        .filter((port) => port >= fromPort && port <= toPort)
        .sort((a, b) => a - b)
        .map((port) => {
            const guidance =
                BLOCKED_PORT_GUIDANCE.get(port) ?? DEFAULT_BLOCKED_PORT_GUIDANCE;
            return finding(
                scope,
                "error",
                "rule_blocked_port",
                `Port ${describePort(port)} is blocked — ${guidance.reason}.\n   → ${guidance.suggestion}`,
            );
        });
}

// Sources that are security groups or prefix lists are exempt.
function validateHighRiskPorts(
    scope: RuleScope,
    fromPort: number,
    toPort: number,
): ValidationFinding[] {
    const cidrSourced =
        cidrList(scope.fields.cidr_blocks).length > 0 ||
        cidrList(scope.fields.ipv6_cidr_blocks).length > 0;
    if (!cidrSourced) {
        return [];
    }

    const inRange = ([port]: readonly [number, string]) =>
        fromPort <= port && port <= toPort;

    return [
        ...REMOTE_ACCESS_PORTS.filter(inRange).map(([port, name]) =>
            finding(
                scope,
                "warning",
                "high_risk_pattern",
                `HIGH: ${name} (port ${port}) ingress from CIDR — any host in that range gets ${name} access. PCI DSS Req 1.3.2`,
            ),
        ),
        ...DATABASE_PORTS.filter(inRange).map(([port, name]) =>
            finding(
                scope,
                "warning",
                "high_risk_pattern",
                `HIGH: ${name} (port ${port}) ingress from CIDR — CIDR-based database access is a common audit finding. PCI DSS Req 1.3.1`,
            ),
        ),
    ];
}

function validateBroadInternalCidr(scope: RuleScope): ValidationFinding[] {
    const broad = cidrList(scope.fields.cidr_blocks).some(
        (cidr) => typeof cidr === "string" && RFC1918_SUPERNETS.has(cidr),
    );
    if (!broad) {
        return [];
    }
    return [
        finding(
            scope,
            "warning",
            "broad_cidr_pattern",
            "MEDIUM: Ingress from overly broad internal CIDR (e.g. 10.0.0.0/8) — scope to specific VPC or subnet CIDRs. PCI DSS Req 1.2.1",
        ),
    ];
}

function validateSources(scope: RuleScope): ValidationFinding[] {
    const hasSource = SOURCE_FIELDS.some(
        (field) => scope.fields[field] !== undefined,
    );
    if (!hasSource) {
        return [
            finding(
                scope,
                "error",
                "rule_missing_source",
                `Rule in ${scope.location} must specify at least one source/destination (${SOURCE_FIELDS.join(", ")})`,
            ),
        ];
    }

    const findings: ValidationFinding[] = [];
    for (const { field, family } of CIDR_FIELDS) {
        findings.push(...validateCidrField(scope, field, family));
    }

    const self = scope.fields.self;
    if (self !== undefined && typeof self !== "boolean") {
        findings.push(
            finding(
                scope,
                "error",
                "rule_self_type",
                `'self' in ${scope.location} must be true or false, got "${formatValue(self)}"`,
            ),
        );
    }

    findings.push(
        ...validateSecurityGroupReferences(scope),
        ...validatePrefixListReferences(scope),
    );
    return findings;
}

function validateCidrField(
    scope: RuleScope,
    field: "cidr_blocks" | "ipv6_cidr_blocks",
    family: AddressFamily,
): ValidationFinding[] {
    const value = scope.fields[field];
    if (value === undefined) {
        return [];
    }

    // A bare string is reported and still checked as a single CIDR.
    if (typeof value === "string") {
        return [
            finding(
                scope,
                "error",
                "rule_cidr_type",
                `'${field}' in ${scope.location} must be a list, not a bare string.\n   → Change: ${field}: "${value}"\n   → To:     ${field}: ["${value}"]`,
            ),
            ...validateCidr(scope, value, family),
        ];
    }

    if (!Array.isArray(value)) {
        return [
            finding(
                scope,
                "error",
                "rule_cidr_type",
                `'${field}' in ${scope.location} must be a list, got ${describeType(value)}`,
            ),
        ];
    }

    return value.flatMap((cidr: unknown) =>
        typeof cidr === "string"
            ? validateCidr(scope, cidr, family)
            : [
                  finding(
                      scope,
                      "error",
                      "rule_cidr_item_type",
                      `CIDR block in ${scope.location} must be a string, got ${describeType(cidr)}: ${formatValue(cidr)}`,
                  ),
              ],
    );
}

function isRequiredEgress(scope: RuleScope): boolean {
    const override = typeOverrideFor(
        scope.guardrails,
        scope.input.securityGroupType,
    );
    return (override.requiredEgress ?? []).some((required) =>
        matchesRequiredEgress(scope.input.rule, required),
    );
}

function describePortSpan(fields: RuleNode["fields"]): string {
    const { from_port: fromPort, to_port: toPort } = fields;
    if (fromPort === undefined && toPort === undefined) {
        return "all ports";
    }
    const from = formatValue(fromPort ?? 0);
    const to = formatValue(toPort ?? 0);
    return from === to ? `port ${from}` : `ports ${from}-${to}`;
}

function validateCidr(
    scope: RuleScope,
    cidr: string,
    family: AddressFamily,
): ValidationFinding[] {
    const parsed = parseCidr(cidr, family);
    if (!parsed.ok) {
        return [
            finding(
                scope,
                "error",
                "rule_invalid_cidr",
                `Invalid CIDR block '${cidr}' in ${scope.location}: ${parsed.reason}`,
            ),
        ];
    }

    const openInternet = isOpenInternet(cidr, family);
    const { direction, securityGroupType } = scope.input;

    const findings: ValidationFinding[] = [];
    if (scope.guardrails.blockedCidrs.includes(cidr)) {
        const message =
            direction === "ingress"
                ? `${cidr} ingress is not allowed — this opens the port to the entire internet.\n` +
                  "   → Use a specific CIDR, security group reference, or prefix list instead.\n" +
                  '   → Example: prefix_list_ids: ["corporate-networks"]'
                : `${cidr} egress detected — unrestricted outbound access. Consider scoping to specific CIDRs or prefix lists.\n` +
                  '   → Use security group references or prefix_list_ids: ["corporate-networks"]';
        findings.push(finding(scope, "error", "rule_blocked_cidr", message));
    }

    if (!openInternet) {
        return findings;
    }

    // Only the open-egress warning is waived; blocked_cidrs still applies.
    if (direction === "egress" && isRequiredEgress(scope)) {
        findings.push(
            finding(
                scope,
                "info",
                "rule_required_egress_exception",
                `${cidr} egress in ${scope.location} matches a required egress rule for ${securityGroupType} security groups`,
            ),
        );
        return findings;
    }

    if (direction === "ingress") {
        findings.push(
            finding(
                scope,
                "error",
                "rule_open_internet",
                `${cidr} ingress in ${scope.location} is open to the entire internet.\n` +
                    "   → Use a specific CIDR, security group reference, or prefix list instead.",
            ),
        );
        return findings;
    }

    // HTTPS-only egress to the internet is normal.
    const { from_port: fromPort, to_port: toPort } = scope.fields;
    if (fromPort !== 443 || toPort !== 443) {
        findings.push(
            finding(
                scope,
                "warning",
                "rule_open_egress",
                `MEDIUM: Egress to ${cidr} on ${describePortSpan(scope.fields)} — unrestricted non-HTTPS outbound. PCI DSS Req 1.3.4`,
            ),
        );
    }
    return findings;
}

function validateSecurityGroupReferences(scope: RuleScope): ValidationFinding[] {
    const references = scope.fields.security_groups;
    if (references === undefined) {
        return [];
    }
    if (!Array.isArray(references)) {
        return [
            finding(
                scope,
                "error",
                "rule_sg_ref_type",
                `'security_groups' in ${scope.location} must be a list`,
            ),
        ];
    }

    const findings: ValidationFinding[] = [];
    for (const reference of references) {
        if (typeof reference !== "string") {
            findings.push(
                finding(
                    scope,
                    "error",
                    "rule_sg_ref_type",
                    `Security group reference in ${scope.location} must be a string, got ${describeType(reference)}`,
                ),
            );
        } else if (!isSecurityGroupReference(reference)) {
            findings.push(
                finding(
                    scope,
                    "warning",
                    "rule_sg_reference_format",
                    `Security group reference '${reference}' in ${scope.location} may be invalid`,
                ),
            );
        }
    }
    return findings;
}

function validatePrefixListReferences(scope: RuleScope): ValidationFinding[] {
    const references = scope.fields.prefix_list_ids;
    if (references === undefined) {
        return [];
    }
    if (!Array.isArray(references)) {
        return [
            finding(
                scope,
                "error",
                "rule_prefix_list_type",
                `'prefix_list_ids' in ${scope.location} must be a list`,
            ),
        ];
    }

    const findings: ValidationFinding[] = [];
    for (const reference of references) {
        if (typeof reference !== "string") {
            findings.push(
                finding(
                    scope,
                    "error",
                    "rule_prefix_list_type",
                    `Prefix list reference in ${scope.location} must be a string, got ${describeType(reference)}`,
                ),
            );
        } else if (isAwsManagedPrefixList(reference)) {
            findings.push(
                finding(
                    scope,
                    "info",
                    "rule_aws_prefix_list",
                    `Using AWS managed prefix list '${reference}' in ${scope.location}`,
                ),
            );
        } else if (!scope.prefixLists.prefixLists.has(reference)) {
            findings.push(
                finding(
                    scope,
                    "error",
                    "rule_undefined_prefix_list",
                    `Undefined prefix list '${reference}' in ${scope.location}`,
                ),
            );
        }
    }
    return findings;
}

export function createRuleValidator(): RuleValidator {
    return {
        validate(
            input: RuleValidationInput,
            context: ValidationContext,
        ): readonly ValidationFinding[] {
            const { securityGroupName, direction, rule } = input;
            const scope: RuleScope = {
                input,
                fields: rule.fields,
                guardrails: context.guardrails,
                prefixLists: context.prefixLists,
                location: `${securityGroupName} ${direction}[${rule.index}]`,
                context: ruleContext(securityGroupName, direction, rule.index),
            };

            if (scope.fields.protocol === undefined) {
                return [
                    finding(
                        scope,
                        "error",
                        "rule_required_protocol",
                        `Rule in ${scope.location} is missing 'protocol'`,
                    ),
                ];
            }

            const findings: ValidationFinding[] = [];
            const protocol = protocolText(scope.fields.protocol);
            if (protocol === undefined || !isValidProtocol(protocol)) {
                findings.push(
                    finding(
                        scope,
                        "error",
                        "rule_invalid_protocol",
                        `Invalid protocol '${formatValue(scope.fields.protocol)}' in ${scope.location}`,
                    ),
                );
            }

            if (protocol !== undefined && PORTED_PROTOCOLS.has(protocol)) {
                findings.push(...validatePorts(scope));
            }
            if (direction === "ingress") {
                findings.push(...validateBroadInternalCidr(scope));
            }
            findings.push(...validateSources(scope));

            return findings;
        },
    };
}

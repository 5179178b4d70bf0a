import {
    DIRECTIONS,
    isMapping,
    ruleList,
    ruleNodes,
    type SecurityGroupDocument,
    type SecurityGroupNode,
    securityGroupContext,
    securityGroupEntries,
} from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import type { ValidationPass } from "./validation-pass.js";

const WHITESPACE_CONTROLS: ReadonlySet<number> = new Set([
    0x09, 0x0a, 0x0b, 0x0c, 0x0d,
]);

function isPrintableAscii(codePoint: number): boolean {
    return (
        (codePoint >= 0x20 && codePoint <= 0x7e) ||
        WHITESPACE_CONTROLS.has(codePoint)
    );
}

function toCodePointLabel(codePoint: number): string {
    return `U+${codePoint.toString(16).toUpperCase().padStart(4, "0")}`;
}

// Invisible characters are shown escaped so the message stays readable.
function displayCharacter(character: string, codePoint: number): string {
    if (/^[\p{L}\p{N}\p{P}\p{S}]$/u.test(character)) {
        return `'${character}'`;
    }
    return `'\\u{${codePoint.toString(16)}}'`;
}

/** Returns a finding for the first non-printable character, or nothing. */
export function findNonAscii(
    value: string,
    fieldPath: string,
): ValidationFinding | undefined {
    let position = 0;
    for (const character of value) {
        const codePoint = character.codePointAt(0) ?? 0;
        if (!isPrintableAscii(codePoint)) {
            return {
                level: "error",
                message: `Non-ASCII character ${displayCharacter(character, codePoint)} (${toCodePointLabel(codePoint)}) found in ${fieldPath} at position ${position} — only ASCII-printable characters are allowed. Non-ASCII characters cause Terraform errors.`,
                rule: "unicode_character",
                context: fieldPath,
            };
        }
        position++;
    }
    return undefined;
}

interface TextField {
    readonly value: unknown;
    readonly path: string;
}

function textFields(group: SecurityGroupNode): TextField[] {
    const base = securityGroupContext(group.name);
    const fields: TextField[] = [
        { value: group.fields.description, path: `${base}.description` },
    ];

    const tags = group.fields.tags;
    if (isMapping(tags)) {
        for (const [key, value] of Object.entries(tags)) {
            fields.push(
                { value: key, path: `${base}.tags.key.${key}` },
                { value, path: `${base}.tags.value.${key}` },
            );
        }
    }

    for (const direction of DIRECTIONS) {
        for (const rule of ruleNodes(ruleList(group, direction))) {
            const rulePath = `${base}.${direction}[${rule.index}]`;
            fields.push({
                value: rule.fields.description,
                path: `${rulePath}.description`,
            });
            for (const cidrField of ["cidr_blocks", "ipv6_cidr_blocks"] as const) {
                const cidrs = rule.fields[cidrField];
                if (typeof cidrs === "string") {
                    fields.push({
                        value: cidrs,
                        path: `${rulePath}.${cidrField}`,
                    });
                    continue;
                }
                if (!Array.isArray(cidrs)) {
                    continue;
                }
                cidrs.forEach((cidr: unknown, index) => {
                    fields.push({
                        value: cidr,
                        path: `${rulePath}.${cidrField}[${index}]`,
                    });
                });
            }
        }
    }

    return fields;
}

export function createAsciiPass(): ValidationPass {
    return {
        name: "ascii",
        run(document: SecurityGroupDocument): readonly ValidationFinding[] {
            const findings: ValidationFinding[] = [];

            for (const entry of securityGroupEntries(document)) {
                const candidates: TextField[] = [
                    {
                        value: entry.name,
                        path: `${securityGroupContext(entry.name)}.name`,
                    },
                    ...(entry.kind === "security_group" ? textFields(entry) : []),
                ];
                for (const { value, path } of candidates) {
                    if (typeof value !== "string") {
                        continue;
                    }
                    const finding = findNonAscii(value, path);
                    if (finding) {
                        findings.push(finding);
                    }
                }
            }

            return findings;
        },
    };
}

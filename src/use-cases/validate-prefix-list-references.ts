import { isAwsManagedPrefixList } from "../entities/prefix-list-catalog.js";
import {
    DIRECTIONS,
    ruleList,
    ruleNodes,
    type SecurityGroupDocument,
    securityGroupNodes,
} from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import { PREFIX_LISTS_FILE } from "./load-account-context.js";
import type { ValidationContext, ValidationPass } from "./validation-pass.js";

/** Custom prefix-list names referenced anywhere, in first-reference order. */
export function collectPrefixListReferences(
    document: SecurityGroupDocument,
): readonly string[] {
    const referenced = new Set<string>();
    for (const group of securityGroupNodes(document)) {
        for (const direction of DIRECTIONS) {
            for (const rule of ruleNodes(ruleList(group, direction))) {
                const ids = rule.fields.prefix_list_ids;
                if (!Array.isArray(ids)) {
                    continue;
                }
                for (const id of ids) {
                    if (typeof id === "string" && !isAwsManagedPrefixList(id)) {
                        referenced.add(id);
                    }
                }
            }
        }
    }
    return [...referenced];
}

export function createPrefixListReferencesPass(): ValidationPass {
    return {
        name: "prefix-list-references",
        run(
            document: SecurityGroupDocument,
            context: ValidationContext,
        ): readonly ValidationFinding[] {
            return collectPrefixListReferences(document)
                .filter((name) => !context.prefixLists.prefixLists.has(name))
                .map((name): ValidationFinding => ({
                    level: "error",
                    message: `Referenced prefix list '${name}' is not defined in ${PREFIX_LISTS_FILE}`,
                    rule: "undefined_prefix_list_reference",
                }));
        },
    };
}

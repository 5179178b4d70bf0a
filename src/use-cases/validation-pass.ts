import type { Guardrails } from "../entities/guardrails.js";
import type { PrefixListCatalog } from "../entities/prefix-list-catalog.js";
import type { SecurityGroupDocument } from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";

export interface ValidationContext {
    readonly guardrails: Guardrails;
    readonly prefixLists: PrefixListCatalog;
    readonly directoryName: string;
}

export interface ValidationPass {
    readonly name: string;
    run(
        document: SecurityGroupDocument,
        context: ValidationContext,
    ): readonly ValidationFinding[];
}

export function describeType(value: unknown): string {
    if (value === null || value === undefined) {
        return "null";
    }
    if (Array.isArray(value)) {
        return "list";
    }
    if (typeof value === "object") {
        return "mapping";
    }
    if (typeof value === "number") {
        return Number.isInteger(value) ? "integer" : "float";
    }
    return typeof value;
}

export function formatValue(value: unknown): string {
    return typeof value === "string" ? value : JSON.stringify(value) ?? "null";
}

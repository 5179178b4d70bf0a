import {
    buildSecurityGroupDocument,
    isMapping,
    type SecurityGroupDocument,
} from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import { loadYaml, YamlSyntaxError } from "./parse-yaml.js";

export type DocumentParseResult =
    | { readonly ok: true; readonly document: SecurityGroupDocument }
    | { readonly ok: false; readonly finding: ValidationFinding };

export interface SecurityGroupDocumentParser {
    parse(content: string): DocumentParseResult;
}

function fatal(rule: string, message: string): DocumentParseResult {
    return { ok: false, finding: { level: "error", message, rule } };
}

export function createSecurityGroupDocumentParser(): SecurityGroupDocumentParser {
    return {
        parse(content: string): DocumentParseResult {
            let raw: unknown;
            try {
                raw = loadYaml(content);
            } catch (error) {
                if (error instanceof YamlSyntaxError) {
                    return fatal(
                        "yaml_syntax",
                        `YAML syntax error: ${error.message}`,
                    );
                }
                throw error;
            }

            if (raw === undefined || raw === null) {
                return fatal("yaml_content", "security-groups.yaml is empty");
            }
            if (!isMapping(raw)) {
                return fatal(
                    "yaml_content",
                    "security-groups.yaml must contain a mapping at the top level",
                );
            }

            if (Object.keys(raw).length === 0) {
                return fatal("yaml_content", "security-groups.yaml is empty");
            }

            return { ok: true, document: buildSecurityGroupDocument(raw) };
        },
    };
}

import { basename, join, resolve } from "node:path";
import {
    AccountIdUnresolvableError,
    ConfigurationNotFoundError,
    PolicyDocumentInvalidError,
} from "../entities/errors.js";
import type { Guardrails } from "../entities/guardrails.js";
import {
    EMPTY_PREFIX_LIST_CATALOG,
    type PrefixListCatalog,
} from "../entities/prefix-list-catalog.js";
import type { GuardrailsParser } from "./parse-guardrails.js";
import type { PrefixListCatalogParser } from "./parse-prefix-lists.js";
import type {
    DocumentParseResult,
    SecurityGroupDocumentParser,
} from "./parse-security-group-document.js";
import type { PolicyFileStore } from "./policy-file-store.port.js";

export const GUARDRAILS_FILE = "guardrails.yaml";
export const PREFIX_LISTS_FILE = "prefix-lists.yaml";
export const SECURITY_GROUPS_FILE = "security-groups.yaml";

const ACCOUNT_ID_PATTERN = /^\d{12}$/;

export interface AccountContext {
    readonly accountDir: string;
    readonly directoryName: string;
    readonly accountId: string;
    readonly guardrails: Guardrails;
    readonly prefixLists: PrefixListCatalog;
    readonly document: DocumentParseResult;
}

export interface AccountContextLoaderDeps {
    readonly fileStore: PolicyFileStore;
    readonly guardrailsParser: GuardrailsParser;
    readonly prefixListParser: PrefixListCatalogParser;
    readonly documentParser: SecurityGroupDocumentParser;
}

export interface AccountContextLoader {
    load(accountDir: string): Promise<AccountContext>;
}

export function isAccountId(value: string): boolean {
    return ACCOUNT_ID_PATTERN.test(value);
}

export function extractAccountId(
    directoryName: string,
    document: DocumentParseResult,
): string {
    if (isAccountId(directoryName)) {
        return directoryName;
    }
    if (document.ok) {
        const declared = document.document.fields.account_id;
        if (typeof declared === "string" || typeof declared === "number") {
            return String(declared);
        }
    }
    throw new AccountIdUnresolvableError(directoryName);
}

function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function parsePolicy<T>(path: string, content: string, parse: (c: string) => T): T {
    try {
        return parse(content);
    } catch (error) {
        throw new PolicyDocumentInvalidError(path, describeError(error));
    }
}

export function createAccountContextLoader(
    deps: AccountContextLoaderDeps,
): AccountContextLoader {
    async function loadGuardrails(startDir: string): Promise<Guardrails> {
        const path = await deps.fileStore.locateUpward(startDir, GUARDRAILS_FILE);
        if (path === undefined) {
            throw new ConfigurationNotFoundError(GUARDRAILS_FILE, startDir);
        }
        const content = await deps.fileStore.readText(path);
        if (content === undefined) {
            throw new ConfigurationNotFoundError(GUARDRAILS_FILE, startDir);
        }
        return parsePolicy(path, content, (c) => deps.guardrailsParser.parse(c));
    }

    async function loadPrefixLists(startDir: string): Promise<PrefixListCatalog> {
        const path = await deps.fileStore.locateUpward(
            startDir,
            PREFIX_LISTS_FILE,
        );
        const content =
            path === undefined ? undefined : await deps.fileStore.readText(path);
        if (path === undefined || content === undefined) {
            return EMPTY_PREFIX_LIST_CATALOG;
        }
        return parsePolicy(path, content, (c) => deps.prefixListParser.parse(c));
    }

    async function loadDocument(accountDir: string): Promise<DocumentParseResult> {
        const content = await deps.fileStore.readText(
            join(accountDir, SECURITY_GROUPS_FILE),
        );
        if (content === undefined) {
            return {
                ok: false,
                finding: {
                    level: "error",
                    message: `${SECURITY_GROUPS_FILE} not found in ${accountDir} — this file is required to define security groups for the account.\n   → Create ${SECURITY_GROUPS_FILE} with your security group definitions.`,
                    rule: "file_exists",
                },
            };
        }
        return deps.documentParser.parse(content);
    }

    return {
        async load(accountDir: string): Promise<AccountContext> {
            const resolvedDir = resolve(accountDir);
            const directoryName = basename(resolvedDir);

            const guardrails = await loadGuardrails(resolvedDir);
            const prefixLists = await loadPrefixLists(resolvedDir);
            const document = await loadDocument(resolvedDir);

            return {
                accountDir: resolvedDir,
                directoryName,
                accountId: extractAccountId(directoryName, document),
                guardrails,
                prefixLists,
                document,
            };
        },
    };
}

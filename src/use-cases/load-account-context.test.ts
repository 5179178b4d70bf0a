import { dirname, join } from "node:path";
import { describe, expect, it } from "vitest";
import {
    AccountIdUnresolvableError,
    ConfigurationNotFoundError,
    PolicyDocumentInvalidError,
} from "../entities/errors.js";
import { createAccountContextLoader } from "./load-account-context.js";
import { createGuardrailsParser } from "./parse-guardrails.js";
import { createPrefixListCatalogParser } from "./parse-prefix-lists.js";
import { createSecurityGroupDocumentParser } from "./parse-security-group-document.js";
import type { PolicyFileStore } from "./policy-file-store.port.js";

const GUARDRAILS = "validation:\n  blocked_ports: [23]\n";
const SECURITY_GROUPS = [
    "account_id: '100000000001'",
    "security_groups:",
    "  app-servers:",
    "    description: Application servers",
].join("\n");

function createInMemoryFileStore(
    files: Readonly<Record<string, string>>,
): PolicyFileStore {
    return {
        async locateUpward(startDir, fileName) {
            let current = startDir;
            for (;;) {
                const candidate = join(current, fileName);
                if (Object.hasOwn(files, candidate)) {
                    return candidate;
                }
                const parent = dirname(current);
                if (parent === current) {
                    return undefined;
                }
                current = parent;
            }
        },
        async readText(path) {
            return files[path];
        },
    };
}

function buildLoader(files: Readonly<Record<string, string>>) {
    return createAccountContextLoader({
        fileStore: createInMemoryFileStore(files),
        guardrailsParser: createGuardrailsParser(),
        prefixListParser: createPrefixListCatalogParser(),
        documentParser: createSecurityGroupDocumentParser(),
    });
}

describe("AccountContextLoader", () => {
    describe("given guardrails in a parent directory", () => {
        it("should load the account with an empty prefix-list catalog", async () => {
            // Arrange
            const loader = buildLoader({
                "/repo/guardrails.yaml": GUARDRAILS,
                "/repo/accounts/100000000001/security-groups.yaml":
                    SECURITY_GROUPS,
            });

            // Act
            const result = await loader.load("/repo/accounts/100000000001");

            // Assert
            expect(result.accountDir).toBe("/repo/accounts/100000000001");
            expect(result.directoryName).toBe("100000000001");
            expect(result.accountId).toBe("100000000001");
            expect(result.guardrails.blockedPorts).toEqual([23]);
            expect(result.prefixLists.prefixLists.size).toBe(0);
            expect(result.document.ok).toBe(true);
        });

        it("should prefer the nearest prefix-lists.yaml", async () => {
            // Arrange
            const loader = buildLoader({
                "/repo/guardrails.yaml": GUARDRAILS,
                "/repo/prefix-lists.yaml": "prefix_lists:\n  outer:\n",
                "/repo/accounts/prefix-lists.yaml": "prefix_lists:\n  inner:\n",
                "/repo/accounts/100000000001/security-groups.yaml":
                    SECURITY_GROUPS,
            });

            // Act
            const result = await loader.load("/repo/accounts/100000000001");

            // Assert
            expect([...result.prefixLists.prefixLists.keys()]).toEqual([
                "inner",
            ]);
        });
    });

    describe("given no guardrails anywhere", () => {
        it("should reject with ConfigurationNotFoundError", async () => {
            // Arrange
            const loader = buildLoader({
                "/repo/accounts/100000000001/security-groups.yaml":
                    SECURITY_GROUPS,
            });

            // Act & Assert
            await expect(
                loader.load("/repo/accounts/100000000001"),
            ).rejects.toThrow(ConfigurationNotFoundError);
        });
    });

    describe("given a prefix-lists.yaml that is not a mapping", () => {
        it("should reject with the file path and reason", async () => {
            // Arrange
            const loader = buildLoader({
                "/repo/guardrails.yaml": GUARDRAILS,
                "/repo/prefix-lists.yaml": "- corporate-networks\n",
                "/repo/accounts/100000000001/security-groups.yaml":
                    SECURITY_GROUPS,
            });

            // Act & Assert
            const error = await loader
                .load("/repo/accounts/100000000001")
                .catch((e: unknown) => e);
            expect(error).toBeInstanceOf(PolicyDocumentInvalidError);
            expect(error).toHaveProperty(
                "message",
                "Failed to load /repo/prefix-lists.yaml: prefix list document must be a mapping",
            );
        });
    });

    describe("given no security-groups.yaml", () => {
        it("should return a file_exists finding instead of a document", async () => {
            // Arrange
            const loader = buildLoader({ "/repo/guardrails.yaml": GUARDRAILS });

            // Act
            const result = await loader.load("/repo/accounts/100000000001");

            // Assert
            expect(result.document).toEqual({
                ok: false,
                finding: {
                    level: "error",
                    message:
                        "security-groups.yaml not found in /repo/accounts/100000000001 — this file is required to define security groups for the account.\n   → Create security-groups.yaml with your security group definitions.",
                    rule: "file_exists",
                },
            });
        });
    });

    describe("given a directory not named after an account", () => {
        it("should take the account ID from the document", async () => {
            // Arrange
            const loader = buildLoader({
                "/repo/guardrails.yaml": GUARDRAILS,
                "/repo/accounts/sandbox/security-groups.yaml":
                    "account_id: 100000000003\nsecurity_groups: {}\n",
            });

            // Act
            const result = await loader.load("/repo/accounts/sandbox");

            // Assert
            expect(result.accountId).toBe("100000000003");
        });

        it("should reject when the document has no account_id", async () => {
            // Arrange
            const loader = buildLoader({ "/repo/guardrails.yaml": GUARDRAILS });

            // Act & Assert
            await expect(loader.load("/repo/accounts/sandbox")).rejects.toThrow(
                AccountIdUnresolvableError,
            );
        });
    });
});

import { readFile, stat } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import type { PolicyFileStore } from "../use-cases/policy-file-store.port.js";

function isMissing(error: unknown): boolean {
    return (
        error instanceof Error &&
        "code" in error &&
        (error.code === "ENOENT" || error.code === "ENOTDIR")
    );
}

async function isFile(path: string): Promise<boolean> {
    try {
        return (await stat(path)).isFile();
    } catch (error) {
        if (isMissing(error)) {
            return false;
        }
        throw error;
    }
}

export function createLocalPolicyFileStore(): PolicyFileStore {
    return {
        async locateUpward(
            startDir: string,
            fileName: string,
        ): Promise<string | undefined> {
            let current = resolve(startDir);
            for (;;) {
                const candidate = join(current, fileName);
                if (await isFile(candidate)) {
                    return candidate;
                }
                const parent = dirname(current);
                if (parent === current) {
                    return undefined;
                }
                current = parent;
            }
        },

        async readText(path: string): Promise<string | undefined> {
            try {
                return await readFile(path, "utf-8");
            } catch (error) {
                if (isMissing(error)) {
                    return undefined;
                }
                throw error;
            }
        },
    };
}

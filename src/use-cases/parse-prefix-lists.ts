import {
    EMPTY_PREFIX_LIST_CATALOG,
    type PrefixListCatalog,
    type PrefixListDefinition,
} from "../entities/prefix-list-catalog.js";
import { isMapping } from "../entities/security-group-document.js";
import { PrefixListsSchema } from "./prefix-lists.schema.js";
import { loadYaml } from "./parse-yaml.js";

export interface PrefixListCatalogParser {
    parse(content: string): PrefixListCatalog;
}

export function createPrefixListCatalogParser(): PrefixListCatalogParser {
    return {
        parse(content: string): PrefixListCatalog {
            const raw = loadYaml(content);
            if (raw === undefined || raw === null) {
                return EMPTY_PREFIX_LIST_CATALOG;
            }
            if (!isMapping(raw)) {
                throw new Error("prefix list document must be a mapping");
            }

            const parsed = PrefixListsSchema.parse(raw);
            const prefixLists = new Map<string, PrefixListDefinition>();
            for (const [name, definition] of Object.entries(
                parsed.prefix_lists,
            )) {
                prefixLists.set(name, {
                    description: definition?.description,
                    entries: definition?.entries ?? [],
                });
            }
            return { prefixLists };
        },
    };
}

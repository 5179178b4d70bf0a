export interface PrefixListDefinition {
    readonly description?: string | undefined;
    readonly entries: readonly string[];
}

export interface PrefixListCatalog {
    readonly prefixLists: ReadonlyMap<string, PrefixListDefinition>;
}

export const EMPTY_PREFIX_LIST_CATALOG: PrefixListCatalog = {
    prefixLists: new Map(),
};

const AWS_MANAGED_PREFIX = "pl-";

export function isAwsManagedPrefixList(reference: string): boolean {
    return reference.startsWith(AWS_MANAGED_PREFIX);
}

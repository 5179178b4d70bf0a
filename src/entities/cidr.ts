import { isIPv4, isIPv6 } from "node:net";

export type AddressFamily = "ipv4" | "ipv6";

export interface ParsedCidr {
    readonly address: string;
    readonly prefixLength: number;
    readonly family: AddressFamily;
}

export type CidrParseResult =
    | { readonly ok: true; readonly cidr: ParsedCidr }
    | { readonly ok: false; readonly reason: string };

const MAX_PREFIX: Readonly<Record<AddressFamily, number>> = {
    ipv4: 32,
    ipv6: 128,
};

export const OPEN_INTERNET_CIDRS: Readonly<Record<AddressFamily, string>> = {
    ipv4: "0.0.0.0/0",
    ipv6: "::/0",
};

export const RFC1918_SUPERNETS: ReadonlySet<string> = new Set([
    "10.0.0.0/8",
    "172.16.0.0/12",
    "192.168.0.0/16",
]);

/**
 * Parses `address[/prefix]` for the given family. Host bits may be set; a
 * bare address is a single-host network.
 */
export function parseCidr(value: string, family: AddressFamily): CidrParseResult {
    const slash = value.indexOf("/");
    const address = slash === -1 ? value : value.substring(0, slash);
    const prefixText = slash === -1 ? undefined : value.substring(slash + 1);

    const validAddress = family === "ipv4" ? isIPv4(address) : isIPv6(address);
    if (!validAddress) {
        const label = family === "ipv4" ? "IPv4" : "IPv6";
        return {
            ok: false,
            reason: `'${address}' is not a valid ${label} address`,
        };
    }

    const maxPrefix = MAX_PREFIX[family];
    if (prefixText === undefined) {
        return { ok: true, cidr: { address, prefixLength: maxPrefix, family } };
    }

    if (!/^\d+$/.test(prefixText) || Number(prefixText) > maxPrefix) {
        return {
            ok: false,
            reason: `'${prefixText}' is not a valid netmask (expected 0-${maxPrefix})`,
        };
    }

    return {
        ok: true,
        cidr: { address, prefixLength: Number(prefixText), family },
    };
}

export function isOpenInternet(value: string, family: AddressFamily): boolean {
    return value === OPEN_INTERNET_CIDRS[family];
}

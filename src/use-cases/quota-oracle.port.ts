export type UsageScope =
    | { readonly kind: "vpc"; readonly vpcId: string }
    | { readonly kind: "account" };

export interface CurrentUsage {
    readonly securityGroups: number;
    readonly totalRules: number;
}

export interface QuotaOracle {
    listVpcIds(): Promise<readonly string[]>;
    currentUsage(scope: UsageScope): Promise<CurrentUsage>;
    /** Resolves to `undefined` when the quota is not known to the provider. */
    serviceLimit(quotaCode: string): Promise<number | undefined>;
}

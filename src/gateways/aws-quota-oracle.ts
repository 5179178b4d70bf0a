import {
    type DescribeSecurityGroupsCommandInput,
    EC2Client,
    paginateDescribeSecurityGroups,
    paginateDescribeVpcs,
    type SecurityGroup,
} from "@aws-sdk/client-ec2";
import {
    GetServiceQuotaCommand,
    NoSuchResourceException,
    ServiceQuotasClient,
} from "@aws-sdk/client-service-quotas";
import type {
    CurrentUsage,
    QuotaOracle,
    UsageScope,
} from "../use-cases/quota-oracle.port.js";

const EC2_SERVICE_CODE = "ec2";
const DEFAULT_REGION = "us-east-1";

export interface AwsQuotaOracleDeps {
    readonly ec2: EC2Client;
    readonly serviceQuotas: ServiceQuotasClient;
}

export function resolveAwsRegion(
    explicit: string | undefined,
    env: NodeJS.ProcessEnv = process.env,
): string {
    return (
        explicit || env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION
    );
}

export function createAwsQuotaOracleDeps(region: string): AwsQuotaOracleDeps {
    return {
        ec2: new EC2Client({ region }),
        serviceQuotas: new ServiceQuotasClient({ region }),
    };
}

function countRules(group: SecurityGroup): number {
    return (
        (group.IpPermissions?.length ?? 0) +
        (group.IpPermissionsEgress?.length ?? 0)
    );
}

function securityGroupQuery(
    scope: UsageScope,
): DescribeSecurityGroupsCommandInput {
    if (scope.kind === "account") {
        return {};
    }
    return { Filters: [{ Name: "vpc-id", Values: [scope.vpcId] }] };
}

export function createAwsQuotaOracle(deps: AwsQuotaOracleDeps): QuotaOracle {
    return {
        async listVpcIds(): Promise<readonly string[]> {
            const vpcIds: string[] = [];
            const pages = paginateDescribeVpcs(
                { client: deps.ec2 },
                { Filters: [{ Name: "state", Values: ["available"] }] },
            );
            for await (const page of pages) {
                for (const vpc of page.Vpcs ?? []) {
                    if (vpc.VpcId) {
                        vpcIds.push(vpc.VpcId);
                    }
                }
            }
            return vpcIds;
        },

        async currentUsage(scope: UsageScope): Promise<CurrentUsage> {
            let securityGroups = 0;
            let totalRules = 0;
            const pages = paginateDescribeSecurityGroups(
                { client: deps.ec2 },
                securityGroupQuery(scope),
            );
            for await (const page of pages) {
                for (const group of page.SecurityGroups ?? []) {
                    securityGroups++;
                    totalRules += countRules(group);
                }
            }
            return { securityGroups, totalRules };
        },

        async serviceLimit(quotaCode: string): Promise<number | undefined> {
            try {
                const response = await deps.serviceQuotas.send(
                    new GetServiceQuotaCommand({
                        ServiceCode: EC2_SERVICE_CODE,
                        QuotaCode: quotaCode,
                    }),
                );
                const value = response.Quota?.Value;
                return value === undefined ? undefined : Math.trunc(value);
            } catch (error) {
                if (error instanceof NoSuchResourceException) {
                    return undefined;
                }
                throw error;
            }
        },
    };
}

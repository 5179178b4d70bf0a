import { z } from "zod";
import { compileNamePattern } from "../entities/guardrails.js";

const DEFAULT_SECURITY_GROUP_PATTERN = "^[a-z0-9][a-z0-9-]*[a-z0-9]$";

function isCompilablePattern(pattern: string): boolean {
    try {
        compileNamePattern(pattern);
        return true;
    } catch {
        return false;
    }
}

const PortSchema = z.number().int().min(0).max(65535);

const RequiredEgressRuleSchema = z.object({
    protocol: z.union([z.string(), z.number()]).transform(String).optional(),
    from_port: PortSchema.optional(),
    to_port: PortSchema.optional(),
    cidr_blocks: z.array(z.string()).default([]),
    ipv6_cidr_blocks: z.array(z.string()).default([]),
    description: z.string().optional(),
});

const TypeOverrideSchema = z.object({
    allowed_protocols: z
        .array(z.union([z.string(), z.number()]).transform(String))
        .optional(),
    required_egress: z.array(RequiredEgressRuleSchema).optional(),
    max_rules: z.number().int().positive().optional(),
    max_range_size: z.number().int().positive().optional(),
});

export const GuardrailsSchema = z.object({
    validation: z
        .object({
            blocked_cidrs: z.array(z.string()).default([]),
            blocked_ports: z.array(PortSchema).default([]),
            port_ranges: z
                .object({
                    max_range_size: z.number().int().positive().default(1000),
                })
                .default({}),
            rules: z
                .object({
                    max_ingress_rules: z.number().int().positive().default(60),
                    max_egress_rules: z.number().int().positive().default(60),
                })
                .default({}),
            naming: z
                .object({
                    security_group_pattern: z
                        .string()
                        .refine(isCompilablePattern, {
                            message:
                                "security_group_pattern must be a valid regular expression",
                        })
                        .default(DEFAULT_SECURITY_GROUP_PATTERN),
                    max_name_length: z.number().int().positive().default(63),
                    required_tags: z.array(z.string()).default([]),
                    reserved_prefixes: z
                        .array(z.string())
                        .default(["default", "baseline", "aws-", "amazon-"]),
                })
                .default({}),
        })
        .default({}),
    type_overrides: z.record(TypeOverrideSchema).default({}),
    baseline_profiles: z
        .object({
            available: z
                .array(z.string())
                .default(["vpc-endpoints", "eks-internet", "eks-standard"]),
            dependencies: z.record(z.array(z.string())).default({
                "eks-standard": ["vpc-endpoints"],
                "eks-internet": ["vpc-endpoints"],
            }),
            mutually_exclusive: z
                .array(z.array(z.string()))
                .default([["eks-standard", "eks-internet"]]),
        })
        .default({}),
    quotas: z
        .object({
            security_groups_per_vpc: z.number().int().positive().default(2500),
            rules_per_security_group: z
                .number()
                .int()
                .positive()
                .default(120),
            security_groups_per_account: z
                .number()
                .int()
                .positive()
                .default(10000),
            warning_threshold_percent: z.number().min(0).max(100).default(80),
        })
        .default({}),
});

export type GuardrailsInput = z.infer<typeof GuardrailsSchema>;

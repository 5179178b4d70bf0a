import type { BaselineProfilePolicy } from "../entities/guardrails.js";
import type { SecurityGroupDocument } from "../entities/security-group-document.js";
import type { ValidationFinding } from "../entities/validation-result.js";
import {
    describeType,
    type ValidationContext,
    type ValidationPass,
} from "./validation-pass.js";

function findDuplicates(profiles: readonly string[]): string[] {
    const seen = new Set<string>();
    const duplicates = new Set<string>();
    for (const profile of profiles) {
        if (seen.has(profile)) {
            duplicates.add(profile);
        }
        seen.add(profile);
    }
    return [...duplicates];
}

function dependenciesOf(
    policy: BaselineProfilePolicy,
    profile: string,
): readonly string[] {
    return Object.hasOwn(policy.dependencies, profile)
        ? (policy.dependencies[profile] ?? [])
        : [];
}

function checkProfiles(
    declared: readonly unknown[],
    policy: BaselineProfilePolicy,
): ValidationFinding[] {
    const findings: ValidationFinding[] = [];
    const available = new Set(policy.available);
    const names: string[] = [];

    declared.forEach((profile, index) => {
        if (typeof profile !== "string") {
            findings.push({
                level: "error",
                message: `baseline_profiles[${index}] must be a string, got ${describeType(profile)}`,
                rule: "baseline_profile_type",
            });
            return;
        }
        names.push(profile);
        if (!available.has(profile)) {
            findings.push({
                level: "error",
                message: `Baseline profile '${profile}' does not exist. Available profiles: ${policy.available.join(", ")}\n   → Pick one of the published baseline profiles.`,
                rule: "baseline_profile_name",
            });
        }
    });

    const duplicates = findDuplicates(names);
    if (duplicates.length > 0) {
        findings.push({
            level: "warning",
            message: `Duplicate baseline profiles found: ${duplicates.join(", ")}`,
            rule: "baseline_profile_duplicates",
        });
    }

    const declaredSet = new Set(names);
    for (const exclusive of policy.mutuallyExclusive) {
        const conflicts = [...new Set(exclusive)]
            .filter((profile) => declaredSet.has(profile))
            .sort();
        if (conflicts.length > 1) {
            findings.push({
                level: "error",
                message: `Profiles ${conflicts.join(", ")} cannot be used together — pick one of them per account.`,
                rule: "baseline_profile_conflict",
            });
        }
    }

    const effective = new Set(declaredSet);
    for (const profile of declaredSet) {
        for (const dependency of dependenciesOf(policy, profile)) {
            effective.add(dependency);
            if (!declaredSet.has(dependency)) {
                findings.push({
                    level: "info",
                    message: `Profile '${profile}' requires '${dependency}' — it will be auto-deployed by the platform.`,
                    rule: "baseline_profile_dependency",
                });
            }
        }
    }

    if (effective.size > 0) {
        findings.push({
            level: "info",
            message: `Will deploy baseline profiles: ${[...effective].sort().join(", ")}`,
            rule: "baseline_profiles_info",
        });
    }

    return findings;
}

export function createBaselineProfilesPass(): ValidationPass {
    return {
        name: "baseline-profiles",
        run(
            document: SecurityGroupDocument,
            context: ValidationContext,
        ): readonly ValidationFinding[] {
            const declared = document.fields.baseline_profiles;
            if (declared === undefined) {
                return [];
            }
            if (!Array.isArray(declared)) {
                return [
                    {
                        level: "error",
                        message: "'baseline_profiles' must be a list",
                        rule: "baseline_profiles_type",
                    },
                ];
            }
            return checkProfiles(declared, context.guardrails.baselineProfiles);
        },
    };
}

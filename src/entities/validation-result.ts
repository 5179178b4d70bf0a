export type FindingLevel = "error" | "warning" | "info";

export type ExitCode = 0 | 1 | 2;

export interface ValidationFinding {
    readonly level: FindingLevel;
    readonly message: string;
    readonly rule: string;
    readonly context?: string | undefined;
}

export interface ValidationSummary {
    readonly errors: readonly ValidationFinding[];
    readonly warnings: readonly ValidationFinding[];
    readonly info: readonly ValidationFinding[];
    add(finding: ValidationFinding): void;
    addAll(findings: readonly ValidationFinding[]): void;
    exitCode(): ExitCode;
}

export function exitCodeFor(
    hasErrors: boolean,
    hasWarnings: boolean,
): ExitCode {
    if (hasErrors) {
        return 1;
    }
    if (hasWarnings) {
        return 2;
    }
    return 0;
}

export function createValidationSummary(
    initial?: readonly ValidationFinding[],
): ValidationSummary {
    const errors: ValidationFinding[] = [];
    const warnings: ValidationFinding[] = [];
    const info: ValidationFinding[] = [];

    const summary: ValidationSummary = {
        errors,
        warnings,
        info,
        add(finding: ValidationFinding): void {
            if (finding.level === "error") {
                errors.push(finding);
            } else if (finding.level === "warning") {
                warnings.push(finding);
            } else {
                info.push(finding);
            }
        },
        addAll(findings: readonly ValidationFinding[]): void {
            for (const finding of findings) {
                summary.add(finding);
            }
        },
        exitCode(): ExitCode {
            return exitCodeFor(errors.length > 0, warnings.length > 0);
        },
    };

    if (initial) {
        summary.addAll(initial);
    }
    return summary;
}

export function withoutWarnings(
    summary: ValidationSummary,
): ValidationSummary {
    return createValidationSummary([...summary.errors, ...summary.info]);
}

/**
 * Promotes warnings to errors when the summary has warnings but no errors.
 * Promoted findings keep their rule and context and are appended after any
 * existing errors.
 */
export function withWarningsAsErrors(
    summary: ValidationSummary,
): ValidationSummary {
    if (summary.errors.length > 0 || summary.warnings.length === 0) {
        return summary;
    }
    const promoted = summary.warnings.map(
        (w): ValidationFinding => ({ ...w, level: "error" }),
    );
    return createValidationSummary([...promoted, ...summary.info]);
}

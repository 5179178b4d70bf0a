export class ConfigurationNotFoundError extends Error {
    readonly fileName: string;
    readonly startDir: string;

    constructor(fileName: string, startDir: string) {
        super(
            `Could not find ${fileName} in ${startDir} or any parent directory`,
        );
        this.name = "ConfigurationNotFoundError";
        this.fileName = fileName;
        this.startDir = startDir;
    }
}

export class PolicyDocumentInvalidError extends Error {
    readonly path: string;

    constructor(path: string, reason: string) {
        super(`Failed to load ${path}: ${reason}`);
        this.name = "PolicyDocumentInvalidError";
        this.path = path;
    }
}

export class AccountIdUnresolvableError extends Error {
    readonly directoryName: string;

    constructor(directoryName: string) {
        super(
            `Could not determine account ID from directory '${directoryName}' — name the directory after the 12-digit account ID or set account_id in security-groups.yaml`,
        );
        this.name = "AccountIdUnresolvableError";
        this.directoryName = directoryName;
    }
}

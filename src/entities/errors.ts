export class ConfigurationError extends Error {
    readonly issues: readonly string[];

    constructor(issues: readonly string[]) {
        super(`Invalid validation configuration: ${issues.join("; ")}`);
        this.name = "ConfigurationError";
        this.issues = issues;
    }
}

export class ValidationCancelledError extends Error {
    constructor(message = "Validation was cancelled") {
        super(message);
        this.name = "ValidationCancelledError";
    }
}

export class MigrationError extends Error {
    readonly exitCode: number;
    readonly details?: unknown;

    constructor(message: string, exitCode = 1, details?: unknown) {
        super(message);
        this.name = new.target.name;
        this.exitCode = exitCode;
        this.details = details;
    }
}

/** Bad or missing run configuration. The CLI exits with status 2. */
export class ConfigError extends MigrationError {
    constructor(message: string, details?: unknown) {
        super(message, 2, details);
    }
}

/** The CSV header lacks one or more expected columns. */
export class SchemaValidationError extends MigrationError {
    constructor(message: string, details?: unknown) {
        super(message, 1, details);
    }
}

export class IndexProvisioningError extends MigrationError {
    constructor(message: string, details?: unknown) {
        super(message, 1, details);
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

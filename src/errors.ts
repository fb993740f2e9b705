/**
 * Base class for every failure the tool reports to the user.
 */
export class NpmStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'NpmStateError';
    }
}

/**
 * Option combination that cannot be reconciled. Raised before any command runs.
 */
export class TaskValidationError extends NpmStateError {
    constructor(message: string) {
        super(message);
        this.name = 'TaskValidationError';
    }
}

/**
 * Package manager exited non-zero on a command whose failure is fatal.
 */
export class CommandExecutionError extends NpmStateError {
    public readonly status: number;
    public readonly stdout: string;
    public readonly stderr: string;

    constructor(message: string, status: number, stdout: string, stderr: string) {
        super(message);
        this.name = 'CommandExecutionError';
        this.status = status;
        this.stdout = stdout;
        this.stderr = stderr;
    }
}

export class ConfigError extends NpmStateError {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

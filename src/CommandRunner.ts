import { spawnSync } from 'node:child_process';
import which from 'which';
import { NpmStateError } from './errors';

export interface CommandResult {
    status: number;
    stdout: string;
    stderr: string;
}

/**
 * Seam between the reconciler and the operating system. Tests replace it with
 * a recorder that replays captured npm output.
 */
export interface CommandRunner {
    run(argv: string[], cwd?: string): CommandResult;
    resolveExecutable(name: string): string;
}

/**
 * Runs commands synchronously without a shell, capturing both streams.
 */
export class SpawnCommandRunner implements CommandRunner {
    public run(argv: string[], cwd?: string): CommandResult {
        const [command, ...args] = argv;
        if (!command) {
            throw new NpmStateError('Cannot run an empty command');
        }

        const result = spawnSync(command, args, {
            cwd,
            encoding: 'utf-8',
            stdio: 'pipe',
            shell: false,
            maxBuffer: 64 * 1024 * 1024
        });

        if (result.error) {
            throw new NpmStateError(`Failed to run ${command}: ${result.error.message}`);
        }

        return {
            status: result.status ?? 1,
            stdout: result.stdout ?? '',
            stderr: result.stderr ?? ''
        };
    }

    public resolveExecutable(name: string): string {
        const resolved = which.sync(name, { nothrow: true });
        if (!resolved) {
            throw new NpmStateError(`Failed to find required executable ${name}`);
        }
        return resolved;
    }
}

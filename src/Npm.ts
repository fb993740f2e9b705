import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { CommandRunner } from './CommandRunner';
import { CommandExecutionError, NpmStateError } from './errors';
import { logDebug } from './logger';
import {
    classifyListTree,
    mergeOutdatedIntoSets,
    outdatedFromReport,
    parseJson,
    parseLegacyOutdated,
    parseOutdatedReport
} from './NpmOutput';
import { NpmListTreeSchema, type NpmListTree } from './types/Npm';
import type { PackageSets, PackageTask } from './types/State';

interface ExecOptions {
    /** read-only commands still run when the proxy is in check mode */
    runInCheckMode?: boolean;
    allowFailure?: boolean;
}

export interface NpmOptions {
    checkMode?: boolean;
}

export function expandPath(p: string): string {
    if (p.startsWith('~') && p !== '~' && !p.startsWith('~/')) {
        throw new NpmStateError(`~user paths are not supported: ${p}`);
    }
    const expanded = p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p;
    return path.resolve(expanded);
}

/**
 * Command proxy around the npm executable, scoped to one package task.
 */
export default class Npm {
    private readonly task: PackageTask;
    private readonly runner: CommandRunner;
    private readonly checkMode: boolean;
    private readonly executable: string[];
    private readonly nameVersion?: string;
    private cwd?: string;

    constructor(task: PackageTask, runner: CommandRunner, options: NpmOptions = {}) {
        this.task = task;
        this.runner = runner;
        this.checkMode = options.checkMode ?? false;

        const executable = task.executable ?? process.env.NPM_STATE_EXECUTABLE;
        this.executable = executable ? executable.split(' ').filter(Boolean) : [runner.resolveExecutable('npm')];

        if (task.name) {
            this.nameVersion = task.version ? `${task.name}@${task.version}` : task.name;
        }
    }

    public get requestedVersion(): string | undefined {
        return this.task.version;
    }

    /**
     * Full argv for a subcommand, with the task's flags appended in the order npm
     * has always been called with.
     */
    public buildCommand(args: string[]): string[] {
        const cmd = [...this.executable, ...args];

        if (this.task.global) cmd.push('--global');
        if (this.task.production) cmd.push('--production');
        if (this.task.ignoreScripts) cmd.push('--ignore-scripts');
        if (this.nameVersion) cmd.push(this.nameVersion);
        if (this.task.registry) cmd.push('--registry', this.task.registry);

        return cmd;
    }

    private exec(args: string[], options: ExecOptions = {}): string {
        const { runInCheckMode = false, allowFailure = false } = options;

        if (this.checkMode && !runInCheckMode) {
            logDebug('command', 'Skipped in check mode', { args });
            return '';
        }

        const argv = this.buildCommand(args);
        const cwd = this.workingDirectory();

        logDebug('command', 'Running package manager', { argv, cwd });
        const result = this.runner.run(argv, cwd);
        logDebug('command', 'Package manager finished', {
            status: result.status,
            stdoutLen: result.stdout.length,
            stderrLen: result.stderr.length
        });

        if (result.status !== 0 && !allowFailure) {
            const message = result.stderr.trim() || result.stdout.trim() || `${argv.join(' ')} exited with code ${result.status}`;
            throw new CommandExecutionError(message, result.status, result.stdout, result.stderr);
        }

        return result.stdout;
    }

    /**
     * Creates the task directory on first use.
     */
    private workingDirectory(): string | undefined {
        if (!this.task.path) return undefined;
        if (this.cwd) return this.cwd;

        const dir = expandPath(this.task.path);
        let isDirectory: boolean;
        try {
            if (!fs.existsSync(dir)) {
                fs.mkdirSync(dir, { recursive: true });
            }
            isDirectory = fs.statSync(dir).isDirectory();
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw new NpmStateError(`Unable to use path ${dir}: ${reason}`);
        }
        if (!isDirectory) {
            throw new NpmStateError(`path ${dir} is not a directory`);
        }

        this.cwd = dir;
        return dir;
    }

    /**
     * Top-level dependency tree as reported by `npm list --json`. npm exits
     * non-zero whenever the tree has problems, so only the output matters.
     */
    public tree(): NpmListTree {
        const output = this.exec(['list', '--json'], { runInCheckMode: true, allowFailure: true });
        const data = output.trim() ? parseJson(output) : {};
        const tree = NpmListTreeSchema.safeParse(data);
        if (!tree.success) {
            throw new NpmStateError(`Unable to parse npm list output:\n${output}`);
        }
        return tree.data;
    }

    /**
     * Gather installed and missing modules. `npm list` comes first; `npm outdated`
     * then fills in devDependencies that `list` leaves out of a project where
     * nothing is installed yet.
     */
    public list(): PackageSets {
        let sets = classifyListTree(this.tree(), this.requestedVersion);

        const outdatedOutput = this.exec(['outdated', '--json'], { runInCheckMode: true, allowFailure: true });
        const report = parseOutdatedReport(outdatedOutput);
        if (report) {
            sets = mergeOutdatedIntoSets(sets, report);
        }

        if (this.task.name && !sets.installed.has(this.task.name)) {
            sets.missing.add(this.task.name);
        }

        logDebug('reconcile', 'Package sets', {
            installed: [...sets.installed],
            missing: [...sets.missing]
        });

        return sets;
    }

    /**
     * Outdated modules, from `npm outdated --json` when the installed npm supports
     * it, otherwise from its plain-text output.
     */
    public listOutdated(): Set<string> {
        const output = this.exec(['outdated', '--json'], { runInCheckMode: true, allowFailure: true });
        const report = parseOutdatedReport(output);
        if (report) {
            return outdatedFromReport(report, this.requestedVersion);
        }

        logDebug('parse', 'Falling back to plain npm outdated output');
        return parseLegacyOutdated(this.exec(['outdated'], { runInCheckMode: true, allowFailure: true }));
    }

    public install(): string {
        return this.exec(['install']);
    }

    public update(): string {
        return this.exec(['update']);
    }

    public uninstall(): string {
        return this.exec(['uninstall']);
    }
}

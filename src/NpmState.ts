import { AsciiTable3 } from 'ascii-table3';
import chalk from 'chalk';
import { SpawnCommandRunner, type CommandRunner } from './CommandRunner';
import { NpmStateError, TaskValidationError } from './errors';
import { logDebug, setDebugLogging } from './logger';
import { initManifest, loadManifest, MANIFEST_FILE_NAME } from './Manifest';
import Npm from './Npm';
import { reconcile, validateTask } from './reconcile';
import type { DesiredState, PackageTask, TaskReport } from './types/State';

export type CliOptions = {
    name?: string;
    path?: string;
    packageVersion?: string;
    global?: boolean;
    production?: boolean;
    ignoreScripts?: boolean;
    registry?: string;
    state?: DesiredState;
    executable?: string;
    check?: boolean;
    config?: string | boolean;
    init?: boolean;
    json?: boolean;
    verbose?: boolean;
};

// flags that describe one package and have no meaning next to a manifest
const SINGLE_PACKAGE_FLAGS: ReadonlyArray<[keyof CliOptions, string]> = [
    ['name', '--name'],
    ['path', '--path'],
    ['packageVersion', '--package-version'],
    ['global', '--global'],
    ['production', '--production'],
    ['ignoreScripts', '--ignore-scripts'],
    ['registry', '--registry'],
    ['state', '--state'],
    ['executable', '--executable']
];

export interface RunSummary {
    changed: boolean;
    results: TaskReport[];
    error?: string;
}

export default class NpmState {
    private options: CliOptions;
    private runner: CommandRunner;

    constructor(options: CliOptions, runner: CommandRunner = new SpawnCommandRunner()) {
        this.options = options;
        this.runner = runner;

        setDebugLogging(options.verbose ?? false);
    }

    /**
     * Runs whatever the options ask for and returns the process exit code.
     */
    public execute(): number {
        if (this.options.init) {
            return this.initManifestFile();
        }

        let tasks: PackageTask[];
        try {
            tasks = this.collectTasks();
            // every task is checked before npm runs for any of them
            tasks.forEach(validateTask);
        } catch (error) {
            if (error instanceof NpmStateError) {
                return this.fail({ changed: false, results: [], error: error.message });
            }
            throw error;
        }

        const summary = this.run(tasks);
        if (summary.error !== undefined) {
            return this.fail(summary);
        }

        this.output(summary);
        return 0;
    }

    /**
     * Reconcile tasks in order, stopping at the first failure.
     */
    public run(tasks: PackageTask[]): RunSummary {
        const checkMode = this.options.check ?? false;
        const results: TaskReport[] = [];

        for (const task of tasks) {
            try {
                const npm = new Npm(task, this.runner, { checkMode });
                const result = reconcile(npm, task);
                logDebug('reconcile', 'Task reconciled', { name: task.name, action: result.action, changed: result.changed });

                results.push({
                    name: this.describePackage(task),
                    location: this.describeLocation(task),
                    state: task.state,
                    action: result.action,
                    changed: result.changed
                });
            } catch (error) {
                if (error instanceof NpmStateError) {
                    return { changed: results.some((r) => r.changed), results, error: error.message };
                }
                throw error;
            }
        }

        return { changed: results.some((r) => r.changed), results };
    }

    private collectTasks(): PackageTask[] {
        const { config } = this.options;

        if (config) {
            const conflicting = SINGLE_PACKAGE_FLAGS.filter(([key]) => {
                const value = this.options[key];
                return value !== undefined && value !== false;
            }).map(([, flag]) => flag);
            if (conflicting.length > 0) {
                throw new TaskValidationError(`--config cannot be combined with ${conflicting.join(', ')}`);
            }
            return loadManifest(typeof config === 'string' ? config : MANIFEST_FILE_NAME);
        }

        return [
            {
                name: this.options.name,
                path: this.options.path,
                version: this.options.packageVersion,
                global: this.options.global ?? false,
                production: this.options.production ?? false,
                ignoreScripts: this.options.ignoreScripts ?? false,
                registry: this.options.registry,
                state: this.options.state ?? 'present',
                executable: this.options.executable
            }
        ];
    }

    private describePackage(task: PackageTask): string {
        if (!task.name) return '(package.json)';
        return task.version ? `${task.name}@${task.version}` : task.name;
    }

    private describeLocation(task: PackageTask): string {
        return task.global ? 'global' : task.path ?? '';
    }

    private output(summary: RunSummary) {
        if (this.options.json) {
            console.log(JSON.stringify(summary, null, 2));
            return;
        }
        this.outputTerminal(summary);
    }

    private outputTerminal(summary: RunSummary) {
        const check = this.options.check ?? false;

        const rows = summary.results.map((r) => [
            r.name,
            r.location,
            r.state,
            r.action,
            r.changed ? chalk.yellowBright.bold(check ? 'would change' : 'changed') : chalk.green('ok')
        ]);

        const table = new AsciiTable3(check ? 'npm-state (check mode)' : 'npm-state')
            .setHeading('Package', 'Location', 'State', 'Action', 'Result')
            .setStyle('unicode-round')
            .addRowMatrix(rows);

        console.log(table.toString());

        const changed = summary.results.filter((r) => r.changed).length;
        console.log(`${changed} changed, ${summary.results.length - changed} ok`);
    }

    private fail(summary: RunSummary): number {
        if (this.options.json) {
            console.log(JSON.stringify(summary, null, 2));
            return 1;
        }

        if (summary.results.length > 0) {
            this.outputTerminal(summary);
        }
        console.error(chalk.red.bold(`✗ ${summary.error ?? 'failed'}`));
        return 1;
    }

    /**
     * Creates a .npm-state.json pinning what is currently installed
     */
    private initManifestFile(): number {
        const dir = this.options.path ?? process.cwd();

        console.log(`Initializing ${MANIFEST_FILE_NAME}...`);
        try {
            const manifestPath = initManifest(dir, this.runner, this.options.executable);
            console.log(chalk.green(`✓ Successfully created ${MANIFEST_FILE_NAME}`));
            console.log(`\nFile created at: ${manifestPath}`);
            console.log('\nEvery installed top-level package is pinned to its current version.');
            console.log('Adjust versions or states, then run with --config.');
            return 0;
        } catch (error) {
            if (error instanceof NpmStateError) {
                console.error(chalk.red(`Error: ${error.message}`));
                return 1;
            }
            throw error;
        }
    }
}

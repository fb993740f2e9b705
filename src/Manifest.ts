import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import type { CommandRunner } from './CommandRunner';
import { ConfigError } from './errors';
import { logDebug } from './logger';
import Npm from './Npm';
import { classifyListTree } from './NpmOutput';
import type { NpmListTree } from './types/Npm';
import { DESIRED_STATES, type PackageTask } from './types/State';

export const MANIFEST_FILE_NAME = '.npm-state.json';

/**
 * Settings shared by every package entry; an entry may override any of them.
 */
const TaskDefaultsSchema = z
    .object({
        path: z.string().min(1, 'path cannot be empty').optional(),
        global: z.boolean().optional(),
        production: z.boolean().optional(),
        ignoreScripts: z.boolean().optional(),
        registry: z.string().min(1, 'registry cannot be empty').optional(),
        executable: z.string().min(1, 'executable cannot be empty').optional()
    })
    .strict();

const PackageEntrySchema = TaskDefaultsSchema.extend({
    /** omitted: install whatever package.json in `path` declares */
    name: z.string().min(1, 'name cannot be empty').optional(),
    version: z.string().min(1, 'version cannot be empty').optional(),
    state: z.enum(DESIRED_STATES).optional()
}).strict();

export const ManifestSchema = z
    .object({
        $schema: z.string().optional(),
        defaults: TaskDefaultsSchema.optional(),
        packages: z.array(PackageEntrySchema).min(1, 'packages must list at least one entry')
    })
    .strict();

export type Manifest = z.infer<typeof ManifestSchema>;
export type PackageEntry = z.infer<typeof PackageEntrySchema>;

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`).join('\n');
}

/**
 * Relative paths in a manifest are relative to the manifest itself, not to
 * wherever the tool was started.
 */
function resolveEntryPath(p: string | undefined, baseDir: string): string | undefined {
    if (p === undefined) return undefined;
    if (p === '~' || p.startsWith('~/') || path.isAbsolute(p)) return p;
    return path.resolve(baseDir, p);
}

export function toTasks(manifest: Manifest, baseDir: string): PackageTask[] {
    const defaults = manifest.defaults ?? {};

    return manifest.packages.map((entry): PackageTask => {
        const merged = { ...defaults, ...entry };
        return {
            name: merged.name,
            path: resolveEntryPath(merged.path, baseDir),
            version: merged.version,
            global: merged.global ?? false,
            production: merged.production ?? false,
            ignoreScripts: merged.ignoreScripts ?? false,
            registry: merged.registry,
            state: merged.state ?? 'present',
            executable: merged.executable
        };
    });
}

/**
 * Load and validate a manifest file, returning one task per package entry.
 */
export function loadManifest(manifestPath: string): PackageTask[] {
    const absolutePath = path.resolve(manifestPath);

    if (!fs.existsSync(absolutePath)) {
        throw new ConfigError(`Manifest not found: ${absolutePath}`);
    }

    let raw: unknown;
    try {
        raw = JSON.parse(fs.readFileSync(absolutePath, 'utf-8'));
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Error reading ${absolutePath}: ${reason}`);
    }

    const parsed = ManifestSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(`Invalid manifest ${absolutePath}:\n${formatIssues(parsed.error)}`);
    }

    logDebug('config', 'Loaded manifest', { path: absolutePath, packages: parsed.data.packages.length });
    return toTasks(parsed.data, path.dirname(absolutePath));
}

/**
 * Manifest that pins every installed top-level dependency of a tree to its
 * current version.
 */
export function manifestFromTree(tree: NpmListTree): Manifest {
    const { installed } = classifyListTree(tree);
    const dependencies = tree.dependencies ?? {};

    const packages: PackageEntry[] = Array.from(installed)
        .sort((a, b) => a.localeCompare(b))
        .map((name): PackageEntry => {
            const version = dependencies[name]?.version;
            return version ? { name, version, state: 'present' } : { name, state: 'present' };
        });

    return {
        defaults: { path: '.' },
        packages
    };
}

/**
 * Write a manifest for the project in `dir`, populated from what is installed
 * there now. Returns the path written.
 */
export function initManifest(dir: string, runner: CommandRunner, executable?: string): string {
    const manifestPath = path.join(path.resolve(dir), MANIFEST_FILE_NAME);

    if (fs.existsSync(manifestPath)) {
        throw new ConfigError(`${MANIFEST_FILE_NAME} already exists.`);
    }

    const npm = new Npm(
        {
            path: dir,
            global: false,
            production: false,
            ignoreScripts: false,
            state: 'present',
            executable
        },
        runner
    );

    const manifest = manifestFromTree(npm.tree());
    if (manifest.packages.length === 0) {
        throw new ConfigError(`No installed packages found in ${path.resolve(dir)}`);
    }

    try {
        fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 4) + '\n', 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Error writing ${manifestPath}: ${reason}`);
    }
    return manifestPath;
}

import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { CommandResult } from '../CommandRunner';
import { ConfigError } from '../errors';
import { initManifest, loadManifest, manifestFromTree, MANIFEST_FILE_NAME } from '../Manifest';
import { NpmListTreeSchema } from '../types/Npm';
import { readFixture } from './helpers/fixtures';
import { FakeCommandRunner } from './helpers/FakeCommandRunner';

describe('Manifest', () => {
    let tmp: string;

    beforeEach(() => {
        tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'npm-state-manifest-'));
    });

    afterEach(() => {
        fs.rmSync(tmp, { recursive: true, force: true });
    });

    function writeManifest(content: unknown): string {
        const file = path.join(tmp, MANIFEST_FILE_NAME);
        fs.writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
        return file;
    }

    describe('loadManifest', () => {
        it('applies defaults and lets entries override them', () => {
            const file = writeManifest({
                defaults: { path: 'app', registry: 'http://registry.example.test', ignoreScripts: true },
                packages: [
                    { name: 'left-pad', version: '1.3.0' },
                    { name: 'browserify', global: true, state: 'latest', ignoreScripts: false }
                ]
            });

            expect(loadManifest(file)).toEqual([
                {
                    name: 'left-pad',
                    path: path.join(tmp, 'app'),
                    version: '1.3.0',
                    global: false,
                    production: false,
                    ignoreScripts: true,
                    registry: 'http://registry.example.test',
                    state: 'present',
                    executable: undefined
                },
                {
                    name: 'browserify',
                    path: path.join(tmp, 'app'),
                    version: undefined,
                    global: true,
                    production: false,
                    ignoreScripts: false,
                    registry: 'http://registry.example.test',
                    state: 'latest',
                    executable: undefined
                }
            ]);
        });

        it('keeps absolute and home-relative paths as written', () => {
            const file = writeManifest({
                packages: [{ path: '/srv/app' }, { path: '~/work/app' }]
            });

            expect(loadManifest(file).map((t) => t.path)).toEqual(['/srv/app', '~/work/app']);
        });

        it('rejects unknown keys and states', () => {
            const file = writeManifest({
                packages: [{ name: 'kleur', state: 'installed', flavour: 'x' }]
            });

            expect(() => loadManifest(file)).toThrow(ConfigError);
            expect(() => loadManifest(file)).toThrow(/packages\.0\.state/);
            expect(() => loadManifest(file)).toThrow(/Unrecognized key\(s\) in object: 'flavour'/);
        });

        it('rejects an empty package list', () => {
            const file = writeManifest({ packages: [] });

            expect(() => loadManifest(file)).toThrow('packages: packages must list at least one entry');
        });

        it('reports invalid JSON', () => {
            const file = writeManifest('{ "packages": [');

            expect(() => loadManifest(file)).toThrow(`Error reading ${file}`);
        });

        it('reports a missing file', () => {
            const file = path.join(tmp, 'nope.json');

            expect(() => loadManifest(file)).toThrow(`Manifest not found: ${file}`);
        });
    });

    describe('manifestFromTree', () => {
        it('pins installed top-level packages and skips missing ones', () => {
            const tree = NpmListTreeSchema.parse(JSON.parse(readFixture('list-project.json')));

            expect(manifestFromTree(tree)).toEqual({
                defaults: { path: '.' },
                packages: [
                    { name: 'kleur', version: '4.1.5', state: 'present' },
                    { name: 'left-pad', version: '1.3.0', state: 'present' }
                ]
            });
        });
    });

    describe('initManifest', () => {
        it('writes a manifest from npm list output', () => {
            const runner = new FakeCommandRunner().respond('list --json', {
                status: 1,
                stdout: readFixture('list-project.json')
            });

            const written = initManifest(tmp, runner, 'npm');

            expect(written).toBe(path.join(tmp, MANIFEST_FILE_NAME));
            expect(runner.calls).toEqual([{ argv: ['npm', 'list', '--json'], cwd: tmp }]);
            expect(JSON.parse(fs.readFileSync(written, 'utf-8'))).toEqual({
                defaults: { path: '.' },
                packages: [
                    { name: 'kleur', version: '4.1.5', state: 'present' },
                    { name: 'left-pad', version: '1.3.0', state: 'present' }
                ]
            });
        });

        it('produces a manifest that loads back into tasks', () => {
            const runner = new FakeCommandRunner().respond('list --json', { stdout: readFixture('list-project.json') });

            const tasks = loadManifest(initManifest(tmp, runner, 'npm'));

            expect(tasks.map((t) => [t.name, t.version, t.path])).toEqual([
                ['kleur', '4.1.5', tmp],
                ['left-pad', '1.3.0', tmp]
            ]);
        });

        it('refuses to overwrite an existing manifest', () => {
            writeManifest({ packages: [{ name: 'kleur' }] });
            const runner = new FakeCommandRunner();

            expect(() => initManifest(tmp, runner, 'npm')).toThrow('.npm-state.json already exists.');
            expect(runner.calls).toEqual([]);
        });

        it('reports a manifest that cannot be written', () => {
            const manifestPath = path.join(tmp, MANIFEST_FILE_NAME);
            // something else claims the file name while npm is listing
            class RacingRunner extends FakeCommandRunner {
                public run(argv: string[], cwd?: string): CommandResult {
                    fs.mkdirSync(manifestPath);
                    return super.run(argv, cwd);
                }
            }
            const runner = new RacingRunner().respond('list --json', { stdout: readFixture('list-project.json') });

            let caught: unknown;
            try {
                initManifest(tmp, runner, 'npm');
            } catch (error) {
                caught = error;
            }
            expect(caught).toBeInstanceOf(ConfigError);
            expect(String(caught)).toContain(`Error writing ${manifestPath}: `);
            expect(fs.statSync(manifestPath).isDirectory()).toBe(true);
        });

        it('fails when nothing is installed', () => {
            const runner = new FakeCommandRunner().respond('list --json', { stdout: '{}' });

            expect(() => initManifest(tmp, runner, 'npm')).toThrow(`No installed packages found in ${tmp}`);
            expect(fs.existsSync(path.join(tmp, MANIFEST_FILE_NAME))).toBe(false);
        });
    });
});

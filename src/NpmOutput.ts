import { logWarning } from './logger';
import {
    NpmErrorReportSchema,
    NpmOutdatedReportSchema,
    type NpmListTree,
    type NpmOutdatedInfo,
    type NpmOutdatedReport
} from './types/Npm';
import type { PackageSets } from './types/State';

/**
 * Parse command output as JSON. Returns undefined for empty or non-JSON output
 * so callers can pick their own fallback.
 */
export function parseJson(text: string): unknown {
    const trimmed = text.trim();
    if (trimmed.length === 0) return undefined;

    try {
        return JSON.parse(trimmed);
    } catch (err) {
        logWarning('parse', 'Output is not JSON', err instanceof Error ? err : undefined);
        return undefined;
    }
}

/**
 * Validate `npm outdated --json` output. Anything that is not an object keyed by
 * package name yields undefined.
 */
export function parseOutdatedReport(text: string): NpmOutdatedReport | undefined {
    const data = parseJson(text);
    if (data === undefined) return undefined;

    const failure = NpmErrorReportSchema.safeParse(data);
    if (failure.success) {
        logWarning('parse', `npm outdated reported an error: ${failure.data.error.summary ?? failure.data.error.code ?? 'unknown'}`);
        return undefined;
    }

    const parsed = NpmOutdatedReportSchema.safeParse(data);
    if (!parsed.success) {
        logWarning('parse', `Unexpected npm outdated output: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
        return undefined;
    }
    return parsed.data;
}

function entriesOf(value: NpmOutdatedReport[string]): NpmOutdatedInfo[] {
    return Array.isArray(value) ? value : [value];
}

/**
 * Split top-level dependencies of an `npm list --json` tree into installed and
 * missing. A dependency counts as missing when npm flags it missing or invalid,
 * or when a version was requested and a different one is installed.
 */
export function classifyListTree(tree: NpmListTree, requestedVersion?: string): PackageSets {
    const installed = new Set<string>();
    const missing = new Set<string>();

    for (const [dep, info] of Object.entries(tree.dependencies ?? {})) {
        if (info.missing) {
            missing.add(dep);
        } else if (info.invalid) {
            missing.add(dep);
        } else if (requestedVersion && info.version !== undefined && info.version !== requestedVersion) {
            missing.add(dep);
        } else {
            installed.add(dep);
        }
    }

    return { installed, missing };
}

/**
 * `npm list` omits devDependencies of a project where nothing has been
 * installed yet, while `npm outdated` reports them. Fold that report in:
 * anything with a location is installed, anything without a current version
 * is missing.
 */
export function mergeOutdatedIntoSets(sets: PackageSets, report: NpmOutdatedReport): PackageSets {
    const installed = new Set(sets.installed);
    const missing = new Set(sets.missing);

    for (const [pkg, value] of Object.entries(report)) {
        if (!missing.has(pkg) && entriesOf(value).some((info) => Boolean(info.location))) {
            installed.add(pkg);
        }
    }

    for (const [pkg, value] of Object.entries(report)) {
        if (!installed.has(pkg) && !entriesOf(value).some((info) => info.current !== undefined)) {
            missing.add(pkg);
        }
    }

    return { installed, missing };
}

function isOutdated(info: NpmOutdatedInfo, requestedVersion?: string): boolean {
    if (info.current === undefined) return false;
    if (requestedVersion) {
        return info.current !== requestedVersion;
    }
    return info.current !== info.wanted;
}

export function outdatedFromReport(report: NpmOutdatedReport, requestedVersion?: string): Set<string> {
    const outdated = new Set<string>();

    for (const [pkg, value] of Object.entries(report)) {
        if (entriesOf(value).some((info) => isOutdated(info, requestedVersion))) {
            outdated.add(pkg);
        }
    }

    return outdated;
}

/**
 * Split a line of plain `npm outdated` output into package name and the rest.
 * Old npm printed `name@wanted ...`, newer releases print columns separated by
 * whitespace. The leading `@` of a scoped name is not a separator.
 */
export function splitLegacyOutdatedLine(line: string): [string, string] {
    const start = line.startsWith('@') ? 1 : 0;
    const match = /[\s@]/.exec(line.slice(start));
    if (!match) return [line, ''];

    const at = start + match.index;
    return [line.slice(0, at), line.slice(at + 1)];
}

/**
 * Every package named in plain-text `npm outdated` output. The wanted version
 * is not available in this format, so every listed package counts.
 */
export function parseLegacyOutdated(text: string): Set<string> {
    const outdated = new Set<string>();

    for (const line of text.split(/\r?\n/)) {
        if (!line.trim()) continue;

        const [pkg, other] = splitLegacyOutdatedLine(line);
        if (pkg.toLowerCase() === 'package' && other.toLowerCase().includes('current')) {
            continue;
        }
        outdated.add(pkg);
    }

    return outdated;
}

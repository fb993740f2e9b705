export const DESIRED_STATES = ['present', 'absent', 'latest'] as const;

export type DesiredState = (typeof DESIRED_STATES)[number];

/**
 * Declarative description of one package (or of a whole package.json when
 * `name` is omitted) and the state it should be in.
 */
export interface PackageTask {
    name?: string;
    path?: string;
    version?: string;
    global: boolean;
    production: boolean;
    ignoreScripts: boolean;
    registry?: string;
    state: DesiredState;
    executable?: string;
}

export type ReconcileAction = 'install' | 'update' | 'uninstall' | 'none';

export interface PackageSets {
    installed: Set<string>;
    missing: Set<string>;
}

export interface ReconcileResult extends PackageSets {
    changed: boolean;
    action: ReconcileAction;
    outdated?: Set<string>;
}

export interface TaskReport {
    name: string;
    location: string;
    state: DesiredState;
    action: ReconcileAction;
    changed: boolean;
}

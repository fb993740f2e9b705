import { TaskValidationError } from './errors';
import { logDebug } from './logger';
import Npm from './Npm';
import type { PackageTask, ReconcileResult } from './types/State';

/**
 * Reject option combinations that cannot be reconciled. Runs before npm is touched.
 */
export function validateTask(task: PackageTask): void {
    if (!task.path && !task.global) {
        throw new TaskValidationError('path must be specified when not using global');
    }
    if (task.state === 'absent' && !task.name) {
        throw new TaskValidationError('uninstalling a package is only available for named packages');
    }
    if (task.state === 'latest' && task.version) {
        throw new TaskValidationError('when requesting latest you cannot request a specific version');
    }
    if (task.state === 'absent' && task.version) {
        throw new TaskValidationError('when uninstalling packages you cannot request a specific version');
    }
}

/**
 * Compare what npm reports against the desired state and run at most one
 * mutating command to close the gap.
 */
export function reconcile(npm: Npm, task: PackageTask): ReconcileResult {
    const { installed, missing } = npm.list();

    switch (task.state) {
        case 'present': {
            // nothing installed at all also means a package.json install is due
            if (missing.size > 0 || installed.size === 0) {
                npm.install();
                return { changed: true, action: 'install', installed, missing };
            }
            break;
        }
        case 'latest': {
            const outdated = npm.listOutdated();
            logDebug('reconcile', 'Outdated packages', { outdated: [...outdated] });

            // `npm update <pkg>` is a no-op for a package that was never installed
            if (installed.size === 0 || (task.name && !installed.has(task.name))) {
                npm.install();
                return { changed: true, action: 'install', installed, missing, outdated };
            }
            if (missing.size > 0 || outdated.size > 0) {
                npm.update();
                return { changed: true, action: 'update', installed, missing, outdated };
            }
            return { changed: false, action: 'none', installed, missing, outdated };
        }
        case 'absent': {
            if (task.name && installed.has(task.name)) {
                npm.uninstall();
                return { changed: true, action: 'uninstall', installed, missing };
            }
            break;
        }
    }

    return { changed: false, action: 'none', installed, missing };
}

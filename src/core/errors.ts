import { envVarsFor } from './roots.js';
import { FailureCode, ResolutionFailure, SearchRoot } from '../types/uri.js';

export class RoboticsUriError extends Error {
    readonly code: FailureCode;
    readonly failure: ResolutionFailure;

    constructor(failure: ResolutionFailure) {
        super(formatFailure(failure));
        this.name = 'RoboticsUriError';
        this.code = failure.code;
        this.failure = failure;
    }
}

export function describeRoot(root: SearchRoot): string {
    return root.source ?? 'search path';
}

/**
 * Renders a failure for humans. `NOT_FOUND` lists every probed path in the order it was tried.
 */
export function formatFailure(failure: ResolutionFailure): string {
    if (failure.code !== 'NOT_FOUND') {
        return failure.message;
    }

    if (failure.probes.length === 0) {
        const vars = failure.scheme === 'file' ? [] : envVarsFor(failure.scheme);
        return `${failure.message}: no search paths are configured (set ${vars.join(', ')} or pass search directories)`;
    }

    const lines = [`${failure.message}. Searched ${failure.probes.length} location${failure.probes.length === 1 ? '' : 's'}:`];
    for (const probe of failure.probes) {
        const origin = probe.root ? `${describeRoot(probe.root)}, ${probe.layout}` : probe.layout;
        lines.push(`  - ${probe.path} (${origin})`);
    }
    return lines.join('\n');
}

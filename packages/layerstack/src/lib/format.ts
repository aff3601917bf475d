// layerstack/src/lib/format.ts
// Render failures as plain lines for build/warm tooling.
//
//   error VALIDATION_FAILED: routes/http build failed with 2 violations
//     - MISSING_ROUTE_FIELD [routes, layer 2 app, key /x]: route "/x" is missing methods
//     - ...

import { LayerstackError, type Failure } from './errors.js';
import { formatErrorMessage } from './helpers.js';

/** Bracketed location summary, or '' when nothing is known. */
export function describeLocation(failure: Failure): string {
    const parts: string[] = [];
    if (failure.kind) parts.push(failure.mode ? `${failure.kind}/${failure.mode}` : failure.kind);
    if (failure.layerIndex !== undefined) {
        parts.push(`layer ${failure.layerIndex}${failure.layerIdentity ? ` ${failure.layerIdentity}` : ''}`);
    } else if (failure.layerIdentity) {
        parts.push(failure.layerIdentity);
    }
    if (failure.providerPosition !== undefined) parts.push(`provider #${failure.providerPosition}`);
    if (failure.key !== undefined) parts.push(`key ${failure.key}`);
    return parts.length > 0 ? `[${parts.join(', ')}]` : '';
}

function failureLine(failure: Failure): string {
    const location = describeLocation(failure);
    return location ? `${failure.code} ${location}: ${failure.message}` : `${failure.code}: ${failure.message}`;
}

/**
 * One header line, then one indented line per violation. Errors from
 * outside this package are reported by message only.
 */
export function formatFailureLines(error: unknown): string[] {
    if (!(error instanceof LayerstackError)) {
        return [`error: ${formatErrorMessage(error)}`];
    }
    const failure = error.toFailure();
    const lines = [`error ${failureLine(failure)}`];
    for (const violation of failure.violations ?? []) {
        lines.push(`  - ${failureLine(violation)}`);
    }
    return lines;
}

import { StateError } from '../types/index.js';
import type { RecordSet, RecordSetStatus } from './types.js';

/**
 * Throw StateError unless the record set is in one of the allowed states.
 *
 * @param set - Record set handed to a stage
 * @param allowed - States the stage accepts
 * @param stage - Stage name used in the error message
 */
export function assertStatus<S extends RecordSetStatus>(
    set: RecordSet,
    allowed: readonly S[],
    stage: string
): asserts set is Extract<RecordSet, { status: S }> {
    const accepted: readonly RecordSetStatus[] = allowed;
    if (!accepted.includes(set.status)) {
        throw new StateError(
            `${stage} requires a ${allowed.join(' or ')} record set, got "${set.status}"`
        );
    }
}

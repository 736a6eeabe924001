/**
 * Batch runner: repeat a whole list of calls instead of each call in place.
 * @module core/batch
 *
 * With three repeats, `[A, B]` runs as A B A B A B. Every call is attempted
 * once as early as possible, which matters when a retry of A would
 * otherwise delay the first attempt of B by a full retry cycle.
 */
import type {LedController, OperationCall} from './LedController';

/**
 * Run `calls` against one controller. The controller's repeat count is set
 * to 1 while the batch runs and restored afterwards, also on failure.
 */
export const runBatch = async (controller: LedController, calls: readonly OperationCall[]): Promise<void> => {
    const rounds = controller.repeatCommands;
    controller.setRepeatCommands(1);
    try {
        for (let round = 0; round < rounds; round++) {
            for (const call of calls) {
                await controller.execute(...call);
            }
        }
    } finally {
        controller.setRepeatCommands(rounds);
    }
};

import { MongoBulkWriteError, type WriteError } from "mongodb";
import type { BatchWriteResult } from "../../ports/SyncStore";

const writeErrorsOf = (err: MongoBulkWriteError): WriteError[] => {
  const { writeErrors } = err;
  return Array.isArray(writeErrors) ? writeErrors : [writeErrors];
};

/**
 * Runs an unordered bulk write for `keys` (one per operation, same order) and splits the
 * outcome per record. Rejected operations come back in `failed`; everything else committed.
 * Errors that are not per-operation (connection lost, write concern) propagate.
 */
export const runBatchWrite = async (keys: string[], bulkWrite: () => Promise<unknown>): Promise<BatchWriteResult> => {
  try {
    await bulkWrite();
    return { committed: [...keys], failed: [] };
  } catch (err) {
    if (!(err instanceof MongoBulkWriteError)) throw err;

    const writeErrors = writeErrorsOf(err);
    if (writeErrors.length === 0) throw err;

    const reasons = new Map<number, string>();
    for (const writeError of writeErrors) {
      reasons.set(writeError.index, writeError.errmsg ?? `write error ${String(writeError.code)}`);
    }

    const committed: string[] = [];
    const failed: BatchWriteResult["failed"] = [];
    keys.forEach((naturalKey, index) => {
      const reason = reasons.get(index);
      if (reason == null) committed.push(naturalKey);
      else failed.push({ naturalKey, reason });
    });
    return { committed, failed };
  }
};

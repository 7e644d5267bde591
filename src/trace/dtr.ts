import { v4 as uuidv4 } from "uuid";
import { contentHash, merkleRoot } from "../shared/hash.js";
import type { DTRRecord, DTRType } from "../shared/types.js";

export type DTRInput = Omit<
  DTRRecord,
  "traceId" | "caseId" | "chainPosition" | "initiatedAt" | "completedAt" | "durationMs" | "hashChain"
> & {
  initiatedAt: Date;
  completedAt: Date;
};

/**
 * DTR Recorder: the hash-chained decision trace of one analysis run.
 * Each pipeline phase appends one record.
 */
export class DTRRecorder {
  private chain: DTRRecord[] = [];
  private readonly caseId: string;

  constructor(caseId: string) {
    this.caseId = caseId;
  }

  /**
   * Record a new DTR step. Automatically chains hashes.
   */
  record(params: DTRInput): DTRRecord {
    const traceId = uuidv4();
    const chainPosition = this.chain.length;
    const previousHash =
      chainPosition > 0 ? this.chain[chainPosition - 1].hashChain.contentHash : null;

    // Build record without hash fields first
    const recordContent: Omit<DTRRecord, "hashChain"> = {
      traceId,
      caseId: this.caseId,
      traceType: params.traceType,
      chainPosition,
      initiatedAt: params.initiatedAt.toISOString(),
      completedAt: params.completedAt.toISOString(),
      durationMs: params.completedAt.getTime() - params.initiatedAt.getTime(),
      inputLineage: params.inputLineage,
      parameters: params.parameters,
      reasoningChain: params.reasoningChain,
      outputContent: params.outputContent,
      validationResults: params.validationResults,
    };

    const cHash = contentHash(recordContent);
    const allHashes = [...this.chain.map((r) => r.hashChain.contentHash), cHash];

    const record: DTRRecord = {
      ...recordContent,
      hashChain: {
        contentHash: cHash,
        previousHash,
        merkleRoot: merkleRoot(allHashes),
      },
    };

    this.chain.push(record);
    return record;
  }

  /** Records of one trace type, in chain order. */
  byType(traceType: DTRType): DTRRecord[] {
    return this.chain.filter((r) => r.traceType === traceType);
  }

  /** Get the full chain of DTRs. */
  getChain(): DTRRecord[] {
    return [...this.chain];
  }

  validateChain(): { valid: boolean; errors: string[] } {
    return validateChain(this.chain);
  }
}

/**
 * Verify positions, previous-hash links and content hashes of a chain,
 * e.g. one read back from trace.jsonl.
 */
export function validateChain(chain: readonly DTRRecord[]): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (let i = 0; i < chain.length; i++) {
    const record = chain[i];

    if (record.chainPosition !== i) {
      errors.push(`DTR ${i}: chain position mismatch (expected ${i}, got ${record.chainPosition})`);
    }

    if (i === 0 && record.hashChain.previousHash !== null) {
      errors.push(`DTR 0: previous hash should be null`);
    }
    if (i > 0 && record.hashChain.previousHash !== chain[i - 1].hashChain.contentHash) {
      errors.push(`DTR ${i}: previous hash does not match prior DTR content hash`);
    }

    const { hashChain, ...contentWithoutHash } = record;
    if (hashChain.contentHash !== contentHash(contentWithoutHash)) {
      errors.push(`DTR ${i}: content hash mismatch`);
    }
  }

  return { valid: errors.length === 0, errors };
}

import { z } from 'zod';
import type { FeedforwardPolicy } from '../policy';
import { parseOrThrow } from '../../utils/validation';

/**
 * Serialization helpers for {@link FeedforwardPolicy}.
 *
 * Format version 1 stores the four parameter groups verbatim plus the hidden
 * activation name, so a snapshot predicts identically after a round trip.
 */

/** Current policy JSON format version. */
export const POLICY_FORMAT_VERSION = 1;

const finiteVector = (length: number) => z.array(z.number()).length(length);

/** Schema for {@link PolicyJSON}. Dimensions are part of the contract. */
export const policySchema = z.object({
  formatVersion: z.literal(POLICY_FORMAT_VERSION),
  hiddenActivation: z.enum(['logistic', 'relu']),
  inputWeights: z.array(finiteVector(4)).length(8),
  outputWeights: finiteVector(8),
  hiddenBias: finiteVector(8),
  outputBias: z.number(),
});

/** Plain-object form of a policy. */
export type PolicyJSON = z.infer<typeof policySchema>;

/**
 * Produce the versioned JSON form. Arrays are copied.
 */
export function toJSONImpl(this: FeedforwardPolicy): PolicyJSON {
  return {
    formatVersion: POLICY_FORMAT_VERSION,
    hiddenActivation: this.hiddenActivation,
    inputWeights: this.inputWeights.map((row) => [...row]),
    outputWeights: [...this.outputWeights],
    hiddenBias: [...this.hiddenBias],
    outputBias: this.outputBias,
  };
}

/**
 * Validate an unknown value as {@link PolicyJSON}.
 *
 * @throws Error listing every schema violation.
 */
export function parsePolicyJSON(json: unknown): PolicyJSON {
  return parseOrThrow(policySchema, json, 'policy');
}

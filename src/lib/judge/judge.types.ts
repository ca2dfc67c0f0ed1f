/**
 * Judge Types
 */

export interface CorrectnessInput {
  /** The prompt that was asked */
  inputs: string;
  /** The captured answer */
  outputs: string;
  /** The dataset's reference answer */
  referenceOutputs: string;
}

export interface CorrectnessVerdict {
  key: 'correctness';
  score: boolean;
  reasoning: string;
}

export interface CorrectnessJudge {
  readonly name: string;
  isAvailable(): boolean;
  evaluate(input: CorrectnessInput): Promise<CorrectnessVerdict>;
}

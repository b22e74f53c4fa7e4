export interface DelimitedWriterOptions {
  prefix: string;
  step: string;
  suffix: string;
}

/**
 * Mutates the options record being built. Options are applied in order, so a
 * later option wins for any field it sets.
 */
export type DelimitedWriterOption = (options: DelimitedWriterOptions) => void;

export type JoinPart = string | Uint8Array;

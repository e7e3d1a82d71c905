import { RankedTrack } from './audio-track.interface';

export type SelectionReason =
  | 'no-audio' // Nothing to choose from
  | 'single-track'
  | 'ranked' // Best admissible track by score
  | 'fallback' // Nothing admissible, broadly playable guess
  | 'no-fallback'; // Nothing admissible and nothing to guess

export interface SelectionResult {
  index: number | null; // null: keep the host's default
  reason: SelectionReason;
  ranking: RankedTrack[];
}

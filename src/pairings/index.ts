// src/pairings/index.ts
import type { MatchRecord, Standing } from '../standings/types';
import {
  generateSwissPairings,
  type SwissPairingOptions,
  type SwissPairingResult,
} from './swiss';

export type PairingMode = 'swiss';

export type PairingRequest = {
  mode: 'swiss';
  standings: ReadonlyArray<Standing>;
  history: ReadonlyArray<MatchRecord>;
  options?: SwissPairingOptions;
};

export type PairingResult = SwissPairingResult;

/** Strategy facade for pairing generation. */
export function generatePairings(req: PairingRequest): PairingResult {
  switch (req.mode) {
    case 'swiss':
      return generateSwissPairings(req.standings, req.history, req.options);
    default: {
      // Exhaustiveness guard for future modes
      const _exhaustive: never = req.mode;
      return _exhaustive;
    }
  }
}

// Re-exports (public API surface)
export {
  generateSwissPairings,
  pairKey,
  playedPairs,
  type SwissPairingOptions,
  type SwissPairingResult,
} from './swiss';
